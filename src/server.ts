// src/server.ts
import http from "http";
import { Server as SocketIOServer } from "socket.io";
import dotenv from "dotenv";
import { connectDB, disconnectDB } from "./config/db";
import { redisClient, cacheHelpers } from "./config/redis";
import { tcpConfig } from "./config/tcp";
import { createApp } from "./app";
import { startTcpServer } from "./tcp/tcpServer";
import { FrameHandler } from "./services/frameHandler";
import { DeviceRegistry } from "./services/deviceRegistry";
import { CommandService } from "./services/commandService";
import { MongoRecordStore } from "./services/recordStore";
import { cacheLocationListener } from "./services/locationCache";
import { setSocketIO, emitDeviceRecord, ROOMS } from "./utils/socketHelper";
import { cleanupQueue } from "./workers/queue";
import { createCleanupWorker } from "./workers/cleanupWorker";
import { scheduleCronJobs } from "./workers/cronJobs";
import { isValidDeviceId } from "./utils/validation";

dotenv.config();

const HTTP_PORT = Number(process.env.PORT) || 3000;

async function start() {
  await connectDB();

  const store = new MongoRecordStore();
  const registry = new DeviceRegistry();
  const commands = new CommandService(registry);
  const frameHandler = new FrameHandler({
    store,
    listeners: [emitDeviceRecord, cacheLocationListener(cacheHelpers)],
  });

  const app = createApp({ store, registry, commands, locations: cacheHelpers });
  const server = http.createServer(app);

  const io = new SocketIOServer(server, {
    cors: { origin: process.env.CORS_ORIGIN || "*" },
  });
  setSocketIO(io);

  // Dashboards join the admin room and/or per-device rooms
  io.on("connection", (socket) => {
    console.log("🧠 Socket connected:", socket.id);

    socket.on("joinRoom", (data: { role?: string; deviceId?: string }) => {
      if (data?.role === "admin" || data?.role === "admins") socket.join(ROOMS.ADMINS);
      if (typeof data?.deviceId === "string" && isValidDeviceId(data.deviceId)) {
        socket.join(ROOMS.device(data.deviceId));
      }
      console.log(`👥 ${socket.id} joined rooms:`, data);
    });

    socket.on("disconnect", () => {
      console.log("❌ Socket disconnected:", socket.id);
    });
  });

  server.listen(HTTP_PORT, () => {
    console.log(`🚀 HTTP + Socket.IO running on port ${HTTP_PORT}`);
  });

  const tcpServer = await startTcpServer({ frameHandler, registry, config: tcpConfig });

  const cleanupWorker = createCleanupWorker(store);
  const cronTasks = scheduleCronJobs();

  const shutdown = async (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down...`);
    cronTasks.forEach((task) => task.stop());
    tcpServer.close();
    io.close();
    server.close();
    await cleanupWorker.close();
    await cleanupQueue.close();
    await redisClient.quit();
    await disconnectDB();
    process.exit(0);
  };

  process.once("SIGINT", () => {
    shutdown("SIGINT").catch((err) => {
      console.error("❌ Shutdown failed:", err);
      process.exit(1);
    });
  });
  process.once("SIGTERM", () => {
    shutdown("SIGTERM").catch((err) => {
      console.error("❌ Shutdown failed:", err);
      process.exit(1);
    });
  });
}

start().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
