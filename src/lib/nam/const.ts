export const ENDPOINTS = {
  config: "/config.json",
  data: "/data.json",
  values: "/values",
  restart: "/reset",
  ota: "/ota",
} as const;

export type Endpoint = keyof typeof ENDPOINTS;

export const MAC_PATTERN = /(?:[0-9a-fA-F]{2}:){5}[0-9a-fA-F]{2}/;

export const ATTR_UPTIME = "uptime";

// Particulate counts, CO2 ppm and wifi signal are whole numbers on the device display
export const INTEGER_CHANNELS: ReadonlySet<string> = new Set([
  "conc_co2_ppm",
  "sds_p1",
  "sds_p2",
  "sps30_p0",
  "sps30_p1",
  "sps30_p2",
  "sps30_p4",
  "signal",
]);

export const RENAME_KEY_MAP: ReadonlyArray<readonly [string, string]> = [
  ["conc_co2_ppm", "mhz14a_carbon_dioxide"],
  ["temperature", "dht22_temperature"],
  ["humidity", "dht22_humidity"],
];
