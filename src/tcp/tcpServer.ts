// src/tcp/tcpServer.ts
import net from "net";
import { FrameHandler } from "../services/frameHandler";
import { DeviceRegistry } from "../services/deviceRegistry";
import { emitToRoom, ROOMS, EVENTS } from "../utils/socketHelper";
import { describeError } from "../protocol/errors";
import { TcpConfig } from "../config/tcp";
import { FrameSplitter, encodeFrame } from "./frameSplitter";

export interface TcpServerDeps {
  frameHandler: FrameHandler;
  registry: DeviceRegistry;
  config: TcpConfig;
}

/**
 * Wire one accepted socket: CRLF framing, strictly sequential frame processing,
 * reply write-back on the same connection.
 */
export function handleConnection(client: net.Socket, deps: TcpServerDeps): void {
  const { frameHandler, registry, config } = deps;
  const peer = `${client.remoteAddress}:${client.remotePort}`;
  const splitter = new FrameSplitter(config.maxFrameBytes);

  client.setNoDelay(config.noDelay);
  client.setKeepAlive(config.keepAlive, config.keepAliveInitialDelayMs);
  console.log("📡 TCP client connected:", peer);

  // Next frame starts only after the previous one is fully handled
  let pending: Promise<void> = Promise.resolve();

  const processFrame = async (frame: string) => {
    const outcome = await frameHandler.handle(frame);
    if (!outcome.message) return;

    const { deviceId } = outcome.message;
    const firstSeen = !registry.isConnected(deviceId);
    registry.touch(deviceId, client);
    if (firstSeen) emitToRoom(ROOMS.ADMINS, EVENTS.DEVICE_CONNECTED, { deviceId, peer });

    if (outcome.reply && !client.destroyed) {
      client.write(encodeFrame(outcome.reply));
    }
  };

  client.on("data", (data: Buffer) => {
    for (const frame of splitter.push(data)) {
      pending = pending
        .then(() => processFrame(frame))
        .catch((err) => {
          console.error(`❌ Error handling frame from ${peer}:`, describeError(err));
        });
    }
  });

  client.on("close", () => {
    for (const deviceId of registry.release(client)) {
      emitToRoom(ROOMS.ADMINS, EVENTS.DEVICE_DISCONNECTED, { deviceId, peer });
    }
    console.log("❌ TCP client disconnected:", peer);
  });

  client.on("error", (err) => {
    console.error(`⚠️ TCP client error (${peer}):`, err.message);
  });
}

export async function startTcpServer(deps: TcpServerDeps): Promise<net.Server> {
  const server = net.createServer((client) => handleConnection(client, deps));

  return new Promise<net.Server>((resolve, reject) => {
    server.once("error", (err) => {
      console.error("❌ TCP server error:", err);
      reject(err);
    });
    server.listen(deps.config.port, deps.config.host, () => {
      console.log(`✅ Watch TCP server listening on ${deps.config.host}:${deps.config.port}`);
      resolve(server);
    });
  });
}
