// src/controllers/deviceController.ts
// Device records, cached positions and outbound commands

import { Request, Response } from "express";
import { wrapAsync, AppError } from "../middleware/errorHandler";
import { isValidCommandContent, isValidCommandToken, toPositiveInt, validateRequired } from "../utils/validation";
import { CommandService } from "../services/commandService";
import { DeviceRegistry } from "../services/deviceRegistry";
import { LocationCache } from "../services/locationCache";
import { RecordStore } from "../protocol/types";

export interface DeviceControllerDeps {
  store: RecordStore;
  registry: DeviceRegistry;
  commands: CommandService;
  locations: LocationCache;
}

export const createDeviceController = ({ store, registry, commands, locations }: DeviceControllerDeps) => {
  // GET /api/devices: Devices with a live TCP connection
  const getConnectedDevices = (_req: Request, res: Response) => {
    const devices = registry.sessions();
    res.status(200).json({ success: true, count: devices.length, devices });
  };

  // GET /api/devices/:deviceId/records?type=UD&page=1&limit=20
  const getDeviceRecords = wrapAsync(async (req: Request, res: Response) => {
    const { deviceId } = req.params;
    const type = typeof req.query.type === "string" ? req.query.type : undefined;

    if (req.query.type !== undefined && (type === undefined || !isValidCommandToken(type))) {
      throw new AppError("Invalid type filter", 400);
    }

    // Max 100 per page
    const pageNum = toPositiveInt(req.query.page, 1);
    const limitNum = Math.min(100, toPositiveInt(req.query.limit, 20));

    const { records, total } = await store.findByDevice(deviceId, {
      type,
      skip: (pageNum - 1) * limitNum,
      limit: limitNum,
    });

    res.status(200).json({
      success: true,
      count: records.length,
      total,
      page: pageNum,
      pages: Math.ceil(total / limitNum),
      records,
    });
  });

  // GET /api/devices/:deviceId/location: Last cached position
  const getDeviceLocation = wrapAsync(async (req: Request, res: Response) => {
    const { deviceId } = req.params;
    const location = await locations.getDeviceLocation(deviceId);
    if (!location) {
      throw new AppError("No cached location for this device", 404);
    }
    res.status(200).json({ success: true, deviceId, location });
  });

  // POST /api/devices/:deviceId/commands: { command, content? }
  const sendDeviceCommand = (req: Request, res: Response) => {
    const body: Record<string, unknown> = req.body ?? {};

    const missing = validateRequired(body, ["command"]);
    if (missing.length > 0) {
      throw new AppError(`Missing required fields: ${missing.join(", ")}`, 400);
    }

    const { command } = body;
    const content = body.content ?? "";
    if (typeof command !== "string" || !isValidCommandToken(command)) {
      throw new AppError("Invalid command format", 400);
    }
    if (!isValidCommandContent(content)) {
      throw new AppError("Invalid command content", 400);
    }

    const sent = commands.deliver(req.params.deviceId, command, content);
    res.status(202).json({ success: true, ...sent });
  };

  // POST /api/devices/:deviceId/commands/:command: Preset command with default content
  const sendPresetCommand = (req: Request, res: Response) => {
    const { deviceId, command } = req.params;
    const sent = commands.sendPreset(deviceId, command);
    if (!sent) {
      throw new AppError("Unsupported preset command", 400);
    }
    res.status(202).json({ success: true, ...sent });
  };

  return { getConnectedDevices, getDeviceRecords, getDeviceLocation, sendDeviceCommand, sendPresetCommand };
};

export type DeviceController = ReturnType<typeof createDeviceController>;
