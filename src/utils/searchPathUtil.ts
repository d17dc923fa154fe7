import path from "node:path";

// Install prefixes of the system and of the common third-party package managers.
export const conventionalSearchPaths = [
  "/usr/local/bin",
  "/opt/homebrew/bin",
  "/opt/local/bin",
  "/usr/bin",
  "/bin",
  "/usr/sbin",
  "/sbin",
] as const;

/**
 * Build the PATH handed to child processes: inherited entries first, then the
 * configured extras, then the conventional prefixes. Duplicates and empty
 * entries are dropped.
 */
export const buildSearchPath = (
  inherited: string | undefined,
  extra: readonly string[] = [],
): string => {
  const entries: string[] = [];
  const seen = new Set<string>();

  const push = (entry: string) => {
    if (entry.length === 0 || seen.has(entry)) return;
    seen.add(entry);
    entries.push(entry);
  };

  for (const entry of (inherited ?? "").split(path.delimiter)) push(entry);
  for (const entry of extra) push(entry);
  for (const entry of conventionalSearchPaths) push(entry);

  return entries.join(path.delimiter);
};
