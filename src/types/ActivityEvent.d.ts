export type ActivityEventType = "command" | "system";

export type ActivityEvent = {
  id: string;
  timestamp: string;
  type: ActivityEventType;
  action: string;
  detail: string;
  surfaceId?: string;
  invocationId?: string;
};
