import { Router, type Request, type Response } from "express";

import { getLatest, getLatestError } from "../state/latestReading.js";

export function createTelemetryRouter(): Router {
  const router = Router();

  router.get("/latest", (_req: Request, res: Response) => {
    const latest = getLatest();
    res.json({
      ok: true,
      latest: latest?.reading ?? null,
      updatedAt: latest?.updatedAt ?? null,
      error: getLatestError(),
    });
  });

  return router;
}
