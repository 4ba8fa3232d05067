// src/protocol/commands.ts
// Closed command set of the watch protocol and the reply-length table

import serverCommandTable from "./serverCommands.json";

export const DEFAULT_REPLY_LENGTH = "0002";

export const POSITION_TOKENS = ["UD", "UD2", "PP"] as const;
export type PositionToken = (typeof POSITION_TOKENS)[number];

/**
 * Tagged variant over every token the dispatcher knows.
 * `unrecognized` is explicit instead of a fall-through.
 */
export type CommandKind =
  | { kind: "linkKeep"; token: "LK" }
  | { kind: "alarm"; token: "AL" }
  | { kind: "position"; token: PositionToken }
  | { kind: "config"; token: "CONFIG" }
  | { kind: "image"; token: "img" }
  | { kind: "serverAck"; token: string; replyLength: string }
  | { kind: "unrecognized"; token: string };

// token -> reply length field ("0004" / "0006" / "0008")
const serverCommandLengths: ReadonlyMap<string, string> = new Map(
  Object.entries(serverCommandTable).flatMap(([length, tokens]) =>
    tokens.map((token): [string, string] => [token, length])
  )
);

export const SERVER_COMMANDS: readonly string[] = [...serverCommandLengths.keys()];

export const isServerCommand = (token: string): boolean => serverCommandLengths.has(token);

/** Fixed lookup, never computed from content. Unknown tokens get "0002". */
export const replyLengthFor = (token: string): string =>
  serverCommandLengths.get(token) ?? DEFAULT_REPLY_LENGTH;

const isPositionToken = (token: string): token is PositionToken =>
  (POSITION_TOKENS as readonly string[]).includes(token);

/** First comma field of the content, or the whole content when there is no comma */
export const commandToken = (content: string): string => {
  const comma = content.indexOf(",");
  return comma === -1 ? content : content.slice(0, comma);
};

// Exact, case-sensitive match
export function classifyCommand(token: string): CommandKind {
  if (token === "LK") return { kind: "linkKeep", token };
  if (token === "AL") return { kind: "alarm", token };
  if (token === "CONFIG") return { kind: "config", token };
  if (token === "img") return { kind: "image", token };
  if (isPositionToken(token)) return { kind: "position", token };
  if (isServerCommand(token)) return { kind: "serverAck", token, replyLength: replyLengthFor(token) };
  return { kind: "unrecognized", token };
}
