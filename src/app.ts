// src/app.ts
// Admin API: Express application setup with security middleware

import express from "express";
import cors from "cors";
import dotenv from "dotenv";

import { securityHeaders, restrictMethods, apiRateLimiter } from "./middleware/security";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createDeviceController, DeviceControllerDeps } from "./controllers/deviceController";
import { createDeviceRoutes } from "./routes/deviceRoutes";

dotenv.config();

export type AppDeps = DeviceControllerDeps;

export function createApp(deps: AppDeps) {
  const app = express();

  // ============================================================================
  // SECURITY MIDDLEWARE (Applied in order)
  // ============================================================================

  app.use(securityHeaders);
  app.use(restrictMethods);

  const corsOptions = {
    origin: process.env.CORS_ORIGIN || "*",
    methods: ["GET", "POST"],
    allowedHeaders: ["Content-Type", "Authorization"],
  };
  app.use(cors(corsOptions));

  // Command bodies are tiny
  app.use(express.json({ limit: "100kb" }));

  app.use("/api", apiRateLimiter);

  // ============================================================================
  // ROUTES
  // ============================================================================

  app.use("/api/devices", createDeviceRoutes(createDeviceController(deps)));

  // Health check endpoint
  app.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "Watch tracker gateway is up",
      timestamp: new Date().toISOString(),
      connectedDevices: deps.registry.size,
    });
  });

  // ============================================================================
  // ERROR HANDLING (Must be last)
  // ============================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
