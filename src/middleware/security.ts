// src/middleware/security.ts
// Security middleware: Helmet, rate limiting, parameter validation

import { Request, Response, NextFunction } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { isValidCommandToken, isValidDeviceId } from "../utils/validation";

/**
 * Helmet configuration for security headers
 * The API only serves JSON
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
});

/**
 * General API rate limiter
 * Prevents API abuse
 */
export const apiRateLimiter = rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minute
  max: 100, // 100 requests per minute
  message: "Too many requests, please slow down",
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Strict rate limiter for commands pushed to devices
 */
export const commandRateLimiter = rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minute
  max: 20, // 20 commands per minute
  message: "Rate limit exceeded for device commands",
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Validate :deviceId and :command route params before they reach a frame
 */
export const validateDeviceParams = (req: Request, res: Response, next: NextFunction): void => {
  const { deviceId, command } = req.params;

  if (deviceId !== undefined && !isValidDeviceId(deviceId)) {
    res.status(400).json({ success: false, message: "Invalid deviceId format" });
    return;
  }

  if (command !== undefined && !isValidCommandToken(command)) {
    res.status(400).json({ success: false, message: "Invalid command format" });
    return;
  }

  next();
};

/**
 * Prevent dangerous HTTP methods
 * Only allow safe methods
 */
export const restrictMethods = (req: Request, res: Response, next: NextFunction): void => {
  const allowedMethods = ["GET", "POST", "OPTIONS"];
  if (!allowedMethods.includes(req.method)) {
    res.status(405).json({
      message: "Method not allowed",
      allowed: allowedMethods,
    });
    return;
  }
  next();
};
