import express, { type Request, type Response, type NextFunction } from "express";

import { createApiRouter, type ApiRouterOptions } from "./routes/index.js";

export function createApp(options: ApiRouterOptions) {
  const app = express();

  app.use("/api", createApiRouter(options));

  app.use((req: Request, res: Response) => {
    console.error(`404 Not Found: ${req.method} ${req.url}`);
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error:", err);
    console.error("Request:", req.method, req.url);
    res.status(500).json({ ok: false, error: "Internal server error" });
  });

  return app;
}
