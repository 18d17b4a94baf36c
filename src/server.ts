import { createServer } from "node:http";

import { config } from "./config/index.js";
import { createApp } from "./app.js";
import { NettigoAirMonitor } from "./lib/nam/index.js";
import { startNamPoller } from "./services/namPoller.js";

if (!config.nam.host) {
  console.error("NAM_HOST is not set");
  process.exit(1);
}

const client = new NettigoAirMonitor(fetch, {
  host: config.nam.host,
  username: config.nam.username,
  password: config.nam.password,
  requiredKeys: config.nam.requiredKeys,
  logger: console,
});

const stopPoller = startNamPoller(client, {
  intervalMs: config.nam.pollIntervalMs,
  timeoutMs: config.nam.requestTimeoutMs,
});

const app = createApp({ client, requestTimeoutMs: config.nam.requestTimeoutMs });
const server = createServer(app);

server.listen(config.PORT, () => {
  console.log(`Server listening on http://localhost:${config.PORT}`);
  console.log(`Polling Nettigo Air Monitor at http://${config.nam.host}`);
});

process.on("SIGTERM", () => {
  stopPoller();
  server.close();
});
