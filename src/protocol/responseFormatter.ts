// src/protocol/responseFormatter.ts
import { OutboundCommand } from "./types";

// Outbound commands always go out under this prefix, whatever the device sent
export const OUTBOUND_MANUFACTURER = "3G";

export const zeroPad4 = (n: number): string => String(n).padStart(4, "0");

export const formatFrame = (
  manufacturer: string,
  deviceId: string,
  lengthField: string,
  body: string
): string => `[${manufacturer}*${deviceId}*${lengthField}*${body}]`;

/**
 * Frame for a server-initiated command: [3G*deviceId*LEN*command + extraContent]
 * where LEN is the computed character count of command + extraContent.
 */
export function composeCommand(deviceId: string, command: string, extraContent: string): string {
  const body = command + extraContent;
  return formatFrame(OUTBOUND_MANUFACTURER, deviceId, zeroPad4(body.length), body);
}

export const renderOutbound = (outbound: OutboundCommand): string =>
  composeCommand(outbound.deviceId, outbound.commandToken, outbound.extraContent);
