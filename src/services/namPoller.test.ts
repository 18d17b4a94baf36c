import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { NettigoAirMonitor, type HttpSession } from "../lib/nam/index.js";
import { getLatest, getLatestError, getMacAddress, resetState } from "../state/latestReading.js";
import { pollOnce, startNamPoller } from "./namPoller.js";

const HOST = "nam.local";

function deviceSession() {
  return vi.fn<HttpSession>(async (url) => {
    if (url.endsWith("/values")) {
      return new Response("<td>aa:bb:cc:dd:ee:ff</td>", { status: 200 });
    }
    return new Response(JSON.stringify({ sds_p1: 12.3, sds_p2: 7.8 }), { status: 200 });
  });
}

function callsTo(session: ReturnType<typeof deviceSession>, path: string): number {
  return session.mock.calls.filter(([url]) => url.endsWith(path)).length;
}

beforeEach(() => {
  resetState();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("pollOnce", () => {
  it("stores the reading as the latest", async () => {
    const nam = new NettigoAirMonitor(deviceSession(), { host: HOST });

    const reading = await pollOnce(nam, 1000);

    expect(reading).toEqual({ sds_p1: 12.3, sds_p2: 7.8 });
    expect(getLatest()?.reading).toEqual({ sds_p1: 12.3, sds_p2: 7.8 });
    expect(getLatestError()).toBeNull();
  });

  it("records the error and keeps the previous reading", async () => {
    const session = deviceSession();
    const nam = new NettigoAirMonitor(session, { host: HOST });
    await pollOnce(nam, 1000);
    session.mockResolvedValueOnce(new Response("", { status: 503 }));

    await expect(pollOnce(nam, 1000)).rejects.toThrow("Invalid response from device nam.local: 503");

    expect(getLatestError()).toBe("Invalid response from device nam.local: 503");
    expect(getLatest()?.reading).toEqual({ sds_p1: 12.3, sds_p2: 7.8 });
  });

  it("passes a timeout signal to the session", async () => {
    const session = deviceSession();
    const nam = new NettigoAirMonitor(session, { host: HOST });

    await pollOnce(nam, 1000);

    expect(session.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe("startNamPoller", () => {
  it("fetches the MAC once and polls on every interval until stopped", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const session = deviceSession();
    const nam = new NettigoAirMonitor(session, { host: HOST });

    const stop = startNamPoller(nam, { intervalMs: 1000, timeoutMs: 500 });
    expect(callsTo(session, "/values")).toBe(1);
    expect(callsTo(session, "/data.json")).toBe(1);

    vi.advanceTimersByTime(2000);
    expect(callsTo(session, "/data.json")).toBe(3);

    stop();
    vi.advanceTimersByTime(5000);
    expect(callsTo(session, "/data.json")).toBe(3);
    expect(callsTo(session, "/values")).toBe(1);

    await vi.waitFor(() => {
      expect(getMacAddress()).toBe("aa:bb:cc:dd:ee:ff");
      expect(getLatest()?.reading).toEqual({ sds_p1: 12.3, sds_p2: 7.8 });
    });
  });

  it("logs poll failures instead of throwing", async () => {
    const session = vi.fn<HttpSession>().mockRejectedValue(new TypeError("offline"));
    const nam = new NettigoAirMonitor(session, { host: HOST });

    const stop = startNamPoller(nam, { intervalMs: 60_000, timeoutMs: 500 });

    await vi.waitFor(() => {
      expect(getLatestError()).toBe("Cannot connect to device nam.local: offline");
      expect(console.error).toHaveBeenCalledTimes(2);
    });
    expect(getMacAddress()).toBeNull();
    stop();
  });
});
