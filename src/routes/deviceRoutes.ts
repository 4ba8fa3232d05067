import express from "express";
import { DeviceController } from "../controllers/deviceController";
import { commandRateLimiter, validateDeviceParams } from "../middleware/security";

export const createDeviceRoutes = (controller: DeviceController) => {
  const router = express.Router();

  router.get("/", controller.getConnectedDevices);
  router.get("/:deviceId/records", validateDeviceParams, controller.getDeviceRecords);
  router.get("/:deviceId/location", validateDeviceParams, controller.getDeviceLocation);

  // Commands pushed to the watch
  router.post("/:deviceId/commands", commandRateLimiter, validateDeviceParams, controller.sendDeviceCommand);
  router.post("/:deviceId/commands/:command", commandRateLimiter, validateDeviceParams, controller.sendPresetCommand);

  return router;
};
