// src/protocol/commandDispatcher.ts
// Routes a parsed message to its command handler: zero or one reply, one or more records

import { CommandRecord, ParsedMessage } from "./types";
import { CommandKind, classifyCommand, commandToken } from "./commands";
import { UnknownCommandError } from "./errors";
import {
  decodeAlarm,
  extractImage,
  extractPosition,
  imageRecord,
  positionRecord,
} from "./fieldExtractors";
import { formatFrame } from "./responseFormatter";

export interface DispatchResult {
  command: CommandKind;
  reply: string | null;
  records: CommandRecord[];
}

const reply = (msg: ParsedMessage, lengthField: string, body: string): string =>
  formatFrame(msg.manufacturer, msg.deviceId, lengthField, body);

const assertNever = (value: never): never => {
  throw new Error(`Unhandled command kind: ${JSON.stringify(value)}`);
};

/**
 * Dispatch one parsed message. The baseline record is always produced, even for
 * tokens nobody handles.
 */
export function dispatchMessage(msg: ParsedMessage, receivedAt: Date = new Date()): DispatchResult {
  const token = commandToken(msg.content);
  const command = classifyCommand(token);

  const records: CommandRecord[] = [
    {
      kind: "baseline",
      deviceId: msg.deviceId,
      type: token,
      rawContent: msg.content,
      receivedAt,
    },
  ];

  switch (command.kind) {
    case "linkKeep":
      return { command, records, reply: reply(msg, "0002", "LK") };

    case "alarm": {
      // Flags are only logged; the baseline record keeps the raw status word
      const alarm = decodeAlarm(msg.content);
      console.log(
        `🚨 Alarm from ${msg.deviceId}: bits=${alarm.bits} fallDown=${alarm.fallDown} sos=${alarm.sos}`
      );
      return { command, records, reply: reply(msg, "0002", "AL") };
    }

    case "position": {
      const fields = extractPosition(msg.content);
      if (fields) records.push(positionRecord(msg.deviceId, msg.content, fields, receivedAt));
      return { command, records, reply: null };
    }

    case "config":
      return { command, records, reply: reply(msg, "0006", "CONFIG,1") };

    case "image": {
      const fields = extractImage(msg.content);
      if (fields) records.push(imageRecord(msg.deviceId, token, msg.content, fields, receivedAt));
      return { command, records, reply: null };
    }

    case "serverAck":
      return { command, records, reply: reply(msg, command.replyLength, command.token) };

    case "unrecognized":
      console.warn(`⚠️ ${new UnknownCommandError(token).message} (device ${msg.deviceId})`);
      return { command, records, reply: null };

    default:
      return assertNever(command);
  }
}
