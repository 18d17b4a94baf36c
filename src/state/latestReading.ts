import type { Reading } from "../lib/nam/index.js";

export type LatestReading = {
  reading: Reading;
  updatedAt: number;
};

let latest: LatestReading | null = null;
let lastError: string | null = null;
let macAddress: string | null = null;

export function setLatest(reading: Reading, updatedAt: number = Date.now()): void {
  latest = { reading, updatedAt };
  lastError = null;
}

export function getLatest(): LatestReading | null {
  return latest;
}

// Keeps the previous reading; only the error is replaced
export function setLatestError(message: string): void {
  lastError = message;
}

export function getLatestError(): string | null {
  return lastError;
}

export function setMacAddress(next: string): void {
  macAddress = next;
}

export function getMacAddress(): string | null {
  return macAddress;
}

export function resetState(): void {
  latest = null;
  lastError = null;
  macAddress = null;
}
