/**
 * Line commands for the interactive terminal session.
 *
 * Every line starting with "/" is a command; anything else submits an
 * industry name.
 */

export type SessionCommand =
  | { kind: "industry"; industry: string }
  | { kind: "key"; credential: string }
  | { kind: "model"; model: string }
  | { kind: "rerun" }
  | { kind: "quit" }
  | { kind: "usage"; message: string };

export const COMMAND_HELP = [
  "Commands:",
  "  /key <value>     Set the OpenAI API key",
  "  /model <name>    Choose the model",
  "  /rerun           Re-evaluate the current industry",
  "  /quit            Exit",
  "Any other line generates a report for that industry.",
].join("\n");

export function parseCommand(raw: string): SessionCommand {
  const line = raw.trim();
  if (!line.startsWith("/")) {
    return { kind: "industry", industry: line };
  }

  const [name = "", ...rest] = line.split(/\s+/);
  const argument = rest.join(" ");

  switch (name) {
    case "/quit":
      return { kind: "quit" };
    case "/rerun":
      return { kind: "rerun" };
    case "/key":
      return argument === ""
        ? { kind: "usage", message: "Usage: /key <value>" }
        : { kind: "key", credential: argument };
    case "/model":
      return argument === ""
        ? { kind: "usage", message: "Usage: /model <name>" }
        : { kind: "model", model: argument };
    default:
      return { kind: "usage", message: `Unknown command ${name}.\n${COMMAND_HELP}` };
  }
}
