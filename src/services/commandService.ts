// src/services/commandService.ts
// Server-initiated commands (admin API -> device)

import { composeCommand } from "../protocol/responseFormatter";
import { DeviceTransport } from "../protocol/types";

/** Default content for the commands the admin API can send without a body */
export const PRESET_COMMANDS: Readonly<Record<string, string>> = {
  APN: ",cmnet,,,20634",
  UPLOAD: ",600",
  CR: "",
  SOS1: ",00000000000",
  IP: ",113.81.229.9,5900",
};

export interface SentCommand {
  frame: string;
  delivered: boolean;
}

export class CommandService {
  private transport: DeviceTransport;

  constructor(transport: DeviceTransport) {
    this.transport = transport;
  }

  /** Compose [3G*deviceId*LEN*command+content] and hand it to the transport */
  deliver(deviceId: string, command: string, content: string = ""): SentCommand {
    const frame = composeCommand(deviceId, command, content);
    console.log(`📡 Sending command: ${frame}`);
    const delivered = this.transport.send(deviceId, frame);
    return { frame, delivered };
  }

  /** Fire-and-forget; returns the composed frame */
  sendCommand(deviceId: string, command: string, content: string = ""): string {
    return this.deliver(deviceId, command, content).frame;
  }

  /** Returns null when the command has no preset */
  sendPreset(deviceId: string, command: string): SentCommand | null {
    if (!Object.prototype.hasOwnProperty.call(PRESET_COMMANDS, command)) return null;
    return this.deliver(deviceId, command, PRESET_COMMANDS[command]);
  }
}
