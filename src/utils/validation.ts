// src/utils/validation.ts
// Input validation utilities for the admin API

/**
 * Validate watch device id (the second `*` field of a frame)
 */
export const isValidDeviceId = (deviceId: string): boolean => {
  return /^[0-9A-Za-z]{1,32}$/.test(deviceId);
};

/**
 * Validate command token (APN, UPLOAD, bodytemp2...)
 */
export const isValidCommandToken = (command: string): boolean => {
  return /^[A-Za-z0-9]{1,32}$/.test(command);
};

/**
 * Validate extra command content
 * Frame delimiters would corrupt the outgoing frame
 */
export const isValidCommandContent = (content: unknown): content is string => {
  return typeof content === "string" && !/[[\]*\r\n]/.test(content);
};

/**
 * Parse a positive integer query parameter, falling back when absent or invalid
 */
export const toPositiveInt = (value: unknown, fallback: number): number => {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
};

/**
 * Validate required fields
 * Returns array of missing fields
 */
export const validateRequired = (data: Record<string, unknown>, required: string[]): string[] => {
  const missing: string[] = [];
  for (const field of required) {
    if (data[field] === undefined || data[field] === null || data[field] === "") {
      missing.push(field);
    }
  }
  return missing;
};
