export const COMMAND_NAMES = [
  "repos",
  "teams",
  "branches",
  "get-rules",
  "set-default-rules",
  "set-repo-rules"
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}
