// src/protocol/messageParser.ts
import { ParsedMessage } from "./types";
import { FormatError, LengthMismatchError, ProtocolError } from "./errors";

export type ParseResult =
  | { ok: true; message: ParsedMessage }
  | { ok: false; error: ProtocolError };

const DECIMAL_INT = /^[+-]?\d+$/;
const HEX_INT = /^[+-]?[0-9a-fA-F]+$/;

/**
 * Reads the 4-character length field: decimal when it is one, otherwise hexadecimal
 * ("000D" -> 13). Returns null when the field is neither.
 */
export const parseLengthField = (field: string): number | null => {
  if (DECIMAL_INT.test(field)) return parseInt(field, 10);
  if (HEX_INT.test(field)) return parseInt(field, 16);
  return null;
};

/**
 * Parse a raw frame such as `[3G*8800000015*000D*LK,50,100,100]`.
 * Throws FormatError / LengthMismatchError; no side effects.
 */
export function parseMessage(raw: string): ParsedMessage {
  if (!raw.startsWith("[") || !raw.endsWith("]")) {
    throw new FormatError("Frame must be enclosed in [ and ]");
  }

  const fields = raw.slice(1, -1).split("*");
  if (fields.length !== 4) {
    throw new FormatError(`Expected 4 '*' separated fields, got ${fields.length}`);
  }

  const [manufacturer, deviceId, lengthField, content] = fields;

  const declaredLength = parseLengthField(lengthField);
  if (declaredLength === null) {
    throw new FormatError(`Invalid length field: ${lengthField}`);
  }

  // character count, not bytes
  if (declaredLength !== content.length) {
    throw new LengthMismatchError(declaredLength, content.length);
  }

  return { manufacturer, deviceId, declaredLength, content };
}

export function tryParseMessage(raw: string): ParseResult {
  try {
    return { ok: true, message: parseMessage(raw) };
  } catch (err) {
    if (err instanceof ProtocolError) return { ok: false, error: err };
    throw err;
  }
}
