import { Router } from "express";

import type { NettigoAirMonitor } from "../lib/nam/index.js";
import { createDeviceRouter } from "./device.js";
import { createTelemetryRouter } from "./telemetry.js";

export type ApiRouterOptions = {
  client: NettigoAirMonitor;
  requestTimeoutMs: number;
};

export function createApiRouter(options: ApiRouterOptions): Router {
  const router = Router();

  // Telemetry routes: /api/latest
  router.use(createTelemetryRouter());

  // Device routes: /api/device
  router.use("/device", createDeviceRouter(options.client, options.requestTimeoutMs));

  return router;
}
