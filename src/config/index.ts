import "dotenv/config";

const PORT = Number(process.env.PORT ?? 3000);

const NAM_HOST = process.env.NAM_HOST ?? "";
const NAM_USERNAME = process.env.NAM_USERNAME || undefined;
const NAM_PASSWORD = process.env.NAM_PASSWORD || undefined;
const NAM_POLL_INTERVAL_MS = Number(process.env.NAM_POLL_INTERVAL_MS ?? 60_000);
const NAM_REQUEST_TIMEOUT_MS = Number(process.env.NAM_REQUEST_TIMEOUT_MS ?? 10_000);
const NAM_REQUIRED_KEYS = process.env.NAM_REQUIRED_KEYS ?? "";

export const config = {
  PORT,
  nam: {
    host: NAM_HOST,
    username: NAM_USERNAME,
    password: NAM_PASSWORD,
    pollIntervalMs: NAM_POLL_INTERVAL_MS,
    requestTimeoutMs: NAM_REQUEST_TIMEOUT_MS,
    requiredKeys: NAM_REQUIRED_KEYS.split(",")
      .map((key) => key.trim())
      .filter((key) => key.length > 0),
  },
} as const;
