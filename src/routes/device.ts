import { Router, type Request, type Response } from "express";

import { ApiError, InvalidSensorData, type NettigoAirMonitor } from "../lib/nam/index.js";
import { pollOnce } from "../services/namPoller.js";
import { getMacAddress } from "../state/latestReading.js";

function sendDeviceError(res: Response, err: unknown, action: string): void {
  if (err instanceof ApiError || err instanceof InvalidSensorData) {
    res.status(502).json({ ok: false, error: err.message });
    return;
  }
  if (err instanceof Error && err.name === "TimeoutError") {
    res.status(504).json({ ok: false, error: "Device did not respond in time" });
    return;
  }
  console.error(`Error during device ${action}`, err);
  res.status(500).json({ ok: false, error: `Failed to ${action} device` });
}

export function createDeviceRouter(client: NettigoAirMonitor, timeoutMs: number): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      device: {
        host: client.host,
        macAddress: getMacAddress(),
        softwareVersion: client.softwareVersion,
      },
    });
  });

  router.post("/refresh", async (_req: Request, res: Response) => {
    try {
      const latest = await pollOnce(client, timeoutMs);
      res.json({ ok: true, latest });
    } catch (err) {
      sendDeviceError(res, err, "refresh");
    }
  });

  router.post("/restart", async (_req: Request, res: Response) => {
    try {
      await client.restart({ signal: AbortSignal.timeout(timeoutMs) });
      console.log(`[NAM] Restart requested for ${client.host}`);
      res.json({ ok: true });
    } catch (err) {
      sendDeviceError(res, err, "restart");
    }
  });

  router.post("/ota", async (_req: Request, res: Response) => {
    try {
      await client.otaUpdate({ signal: AbortSignal.timeout(timeoutMs) });
      console.log(`[NAM] OTA update requested for ${client.host}`);
      res.json({ ok: true });
    } catch (err) {
      sendDeviceError(res, err, "update");
    }
  });

  return router;
}
