export type Command =
  | { kind: "ask"; query: string }
  | { kind: "open"; path: string }
  | { kind: "history" }
  | { kind: "clear" }
  | { kind: "help" }
  | { kind: "exit" }
  | { kind: "empty" }
  | { kind: "unknown"; name: string };

export const HELP_TEXT = [
  "Ask a question about the open contract, or use a command:",
  "  /open <path>   load a PDF, .txt or .md contract",
  "  /history       show this conversation",
  "  /clear         forget this conversation",
  "  /help          show this help",
  "  /exit          quit",
].join("\n");

export function parseCommand(line: string): Command {
  const input = line.trim();
  if (input === "") return { kind: "empty" };
  if (!input.startsWith("/")) return { kind: "ask", query: input };

  const space = input.indexOf(" ");
  const name = (space < 0 ? input.slice(1) : input.slice(1, space)).toLowerCase();
  const rest = space < 0 ? "" : input.slice(space + 1).trim();

  switch (name) {
    case "open":
      return rest === "" ? { kind: "unknown", name: "open (missing path)" } : { kind: "open", path: rest };
    case "history":
      return { kind: "history" };
    case "clear":
      return { kind: "clear" };
    case "help":
    case "?":
      return { kind: "help" };
    case "exit":
    case "quit":
      return { kind: "exit" };
    default:
      return { kind: "unknown", name };
  }
}
