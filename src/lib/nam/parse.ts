import { ATTR_UPTIME, INTEGER_CHANNELS, MAC_PATTERN, RENAME_KEY_MAP } from "./const.js";
import { CannotGetMac, InvalidSensorData } from "./errors.js";

/** Sensor channel name to value, e.g. `{ sds_p1: 12, bme280_pressure: 1012 }`. */
export type Reading = Record<string, number>;

export type ParsedReading = {
  reading: Reading;
  softwareVersion: string | null;
};

type SensorDataValue = {
  value_type: string;
  value: unknown;
};

export function parseNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || value.trim() === "") return null;
  const n = Number(value);
  if (!Number.isFinite(n)) return null;
  return n;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSensorDataValue(value: unknown): value is SensorDataValue {
  return isRecord(value) && typeof value.value_type === "string" && "value" in value;
}

/**
 * Rounds half to even on the exact binary value, so `12.5` gives 12, `0.25` gives 0.2
 * and `0.15` (stored just below 0.15) gives 0.1.
 */
export function roundHalfEven(value: number, digits = 0): number {
  const rounded = Number(value.toFixed(digits));
  const rest = Math.abs(value).toFixed(digits + 30).slice(-30);
  if (!/^50*$/.test(rest)) return rounded;

  // Exact tie: toFixed went away from zero, step back if that left an odd last digit
  const factor = 10 ** digits;
  const units = Math.round(Math.abs(rounded) * factor);
  if (units % 2 === 0) return rounded;
  return (Math.sign(value) * (units - 1)) / factor;
}

function parseFlatMapping(body: Record<string, unknown>): Map<string, number> {
  const channels = new Map<string, number>();

  for (const [key, raw] of Object.entries(body)) {
    if (key === "software_version") continue;
    const value = parseNumber(raw);
    if (value === null) {
      throw new InvalidSensorData(`Invalid value for sensor ${key}`);
    }
    channels.set(key, value);
  }

  return channels;
}

/**
 * Normalizes the firmware's `sensordatavalues` list: lower-cased channel names,
 * one decimal place, pressure in hPa, whole numbers for particulate, CO2 and
 * signal channels, then the renames from {@link RENAME_KEY_MAP}.
 */
function parseDeviceDocument(body: Record<string, unknown>): Map<string, number> {
  const items = body.sensordatavalues;
  if (!Array.isArray(items)) {
    throw new InvalidSensorData("Invalid sensor data");
  }

  const channels = new Map<string, number>();

  for (const item of items) {
    if (!isSensorDataValue(item)) {
      throw new InvalidSensorData("Invalid sensor data");
    }
    const value = parseNumber(item.value);
    if (value === null) {
      throw new InvalidSensorData(`Invalid value for sensor ${item.value_type}`);
    }
    channels.set(item.value_type.toLowerCase(), roundHalfEven(value, 1));
  }

  for (const [key, value] of channels) {
    if (key.includes("pressure")) {
      channels.set(key, roundHalfEven(value / 100));
    }
    if (INTEGER_CHANNELS.has(key)) {
      channels.set(key, roundHalfEven(value));
    }
  }

  for (const [oldKey, newKey] of RENAME_KEY_MAP) {
    const value = channels.get(oldKey);
    if (value === undefined) continue;
    channels.delete(oldKey);
    channels.set(newKey, value);
  }

  if (ATTR_UPTIME in body) {
    const uptime = parseNumber(body[ATTR_UPTIME]);
    if (uptime === null) {
      throw new InvalidSensorData("Invalid uptime");
    }
    channels.set(ATTR_UPTIME, Math.trunc(uptime));
  }

  return channels;
}

/**
 * Validates a decoded data document and turns it into a {@link Reading}.
 *
 * Accepts either the firmware's own document (with a `sensordatavalues` list) or a
 * flat `{ channel: value }` mapping, which is returned as-is apart from numeric
 * strings becoming numbers. `requiredKeys` are checked against the final channel
 * names.
 */
export function parseReading(body: unknown, requiredKeys: readonly string[] = []): ParsedReading {
  if (!isRecord(body)) {
    throw new InvalidSensorData("Invalid sensor data");
  }

  const channels = "sensordatavalues" in body ? parseDeviceDocument(body) : parseFlatMapping(body);

  if (channels.size === 0) {
    throw new InvalidSensorData("No sensor data");
  }

  const missing = requiredKeys.filter((key) => !channels.has(key));
  if (missing.length > 0) {
    throw new InvalidSensorData(`Missing sensor data: ${missing.join(", ")}`);
  }

  return {
    reading: Object.fromEntries(channels),
    softwareVersion: typeof body.software_version === "string" ? body.software_version : null,
  };
}

export function parseMacAddress(text: string): string {
  const match = MAC_PATTERN.exec(text);
  if (!match) {
    throw new CannotGetMac("Cannot get MAC address from device");
  }
  return match[0];
}
