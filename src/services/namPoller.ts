import type { NettigoAirMonitor, Reading } from "../lib/nam/index.js";
import { setLatest, setLatestError, setMacAddress } from "../state/latestReading.js";

export type NamPollerOptions = {
  intervalMs: number;
  timeoutMs: number;
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Runs one update under a timeout and records the outcome in the latest-reading state. */
export async function pollOnce(client: NettigoAirMonitor, timeoutMs: number): Promise<Reading> {
  try {
    const reading = await client.update({ signal: AbortSignal.timeout(timeoutMs) });
    setLatest(reading);
    console.log(`[NAM] Reading from ${client.host}: ${Object.keys(reading).length} channels`);
    return reading;
  } catch (err) {
    setLatestError(describeError(err));
    throw err;
  }
}

export async function refreshMacAddress(client: NettigoAirMonitor, timeoutMs: number): Promise<string> {
  const mac = await client.getMacAddress({ signal: AbortSignal.timeout(timeoutMs) });
  setMacAddress(mac);
  console.log(`[NAM] Device ${client.host} has MAC ${mac}`);
  return mac;
}

export function startNamPoller(client: NettigoAirMonitor, options: NamPollerOptions): () => void {
  console.log(`Starting NAM poller for ${client.host} (interval: ${options.intervalMs / 1000}s)`);

  refreshMacAddress(client, options.timeoutMs).catch((err) => {
    console.error(`[NAM] Failed to get MAC address from ${client.host}`, err);
  });

  const poll = () => {
    pollOnce(client, options.timeoutMs).catch((err) => {
      console.error(`[NAM] Poll of ${client.host} failed`, err);
    });
  };

  poll();
  const timer = setInterval(poll, options.intervalMs);

  return () => clearInterval(timer);
}
