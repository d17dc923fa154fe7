export type CommandPreset = {
  key: string;
  description: string;
  executablePath: string; // absolute, never looked up through PATH
  args: string[];
};
