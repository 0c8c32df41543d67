export type SlashCommandName =
  | "help"
  | "skills"
  | "search"
  | "clear"
  | "sessions"
  | "load"
  | "save"
  | "status"
  | "settings"
  | "quit";

export type SlashCommandSpec = {
  name: SlashCommandName;
  usage: string;
  description: string;
  aliases: string[];
};

export const SLASH_COMMANDS: SlashCommandSpec[] = [
  { name: "help", usage: "/help", description: "show available commands", aliases: [] },
  { name: "skills", usage: "/skills", description: "list skills on the tool server", aliases: [] },
  { name: "search", usage: "/search <query>", description: "search skills by keyword", aliases: [] },
  { name: "clear", usage: "/clear", description: "save and start a fresh conversation", aliases: [] },
  { name: "sessions", usage: "/sessions", description: "list recent conversations", aliases: [] },
  { name: "load", usage: "/load <N|id>", description: "resume a saved conversation", aliases: [] },
  { name: "save", usage: "/save", description: "save the current conversation", aliases: [] },
  { name: "status", usage: "/status", description: "show model, tools and token usage", aliases: [] },
  { name: "settings", usage: "/settings", description: "edit api key, model and directories", aliases: ["model"] },
  { name: "quit", usage: "/quit", description: "save and exit", aliases: ["exit"] },
];

export type ParsedSlashCommand =
  | { kind: "known"; name: SlashCommandName; raw: string; arg: string }
  | { kind: "unknown"; raw: string; arg: string };

/**
 * Splits `/name rest of line` into the command and at most one free-text
 * argument. Returns null for input that is not a command.
 */
export function parseSlashCommand(input: string): ParsedSlashCommand | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/")) {
    return null;
  }

  const spaceIndex = trimmed.search(/\s/);
  const raw = (spaceIndex === -1 ? trimmed : trimmed.slice(0, spaceIndex)).toLowerCase();
  const arg = spaceIndex === -1 ? "" : trimmed.slice(spaceIndex + 1).trim();
  const spec = findSlashCommand(raw.slice(1));
  if (!spec) {
    return { kind: "unknown", raw, arg };
  }
  return { kind: "known", name: spec.name, raw, arg };
}

export function findSlashCommand(name: string): SlashCommandSpec | undefined {
  const lower = name.toLowerCase();
  return SLASH_COMMANDS.find((command) => command.name === lower || command.aliases.includes(lower));
}

/** Commands whose name or alias starts with the typed prefix, for autocomplete. */
export function suggestSlashCommands(input: string): SlashCommandSpec[] {
  const trimmed = input.trimStart();
  if (!trimmed.startsWith("/") || /\s/.test(trimmed)) {
    return [];
  }
  const prefix = trimmed.slice(1).toLowerCase();
  return SLASH_COMMANDS.filter(
    (command) => command.name.startsWith(prefix) || command.aliases.some((alias) => alias.startsWith(prefix)),
  );
}

export function formatHelpText(): string {
  const width = Math.max(...SLASH_COMMANDS.map((command) => command.usage.length));
  const lines = SLASH_COMMANDS.map((command) => {
    const aliases = command.aliases.length > 0 ? ` (alias: ${command.aliases.map((alias) => `/${alias}`).join(", ")})` : "";
    return `  ${command.usage.padEnd(width)}  ${command.description}${aliases}`;
  });
  return ["Commands:", ...lines].join("\n");
}

export function formatUnknownCommand(raw: string): string {
  return `Unknown command: ${raw}. Type /help for commands.`;
}
