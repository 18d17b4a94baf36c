import { ENDPOINTS, type Endpoint } from "./const.js";
import { ApiError, AuthFailed, InvalidSensorData } from "./errors.js";
import { parseMacAddress, parseReading, type Reading } from "./parse.js";

/** Any fetch-compatible function. Owned by the caller and safe to share between clients. */
export type HttpSession = (url: string, init?: RequestInit) => Promise<Response>;

export type NamLogger = {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
};

export type ConnectionOptions = {
  host: string;
  username?: string;
  password?: string;
  /** Channels that must be present for a reading to be accepted. */
  requiredKeys?: readonly string[];
  logger?: NamLogger;
};

/** Per-call options. The signal is the caller's timeout or cancellation boundary. */
export type RequestOptions = {
  signal?: AbortSignal;
};

const silentLogger: NamLogger = {
  debug: () => {},
  info: () => {},
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Unread bodies keep the connection busy until they are garbage collected
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

export class NettigoAirMonitor {
  readonly host: string;

  private readonly session: HttpSession;
  private readonly headers: Record<string, string>;
  private readonly requiredKeys: readonly string[];
  private readonly logger: NamLogger;

  private latest: Reading | null = null;
  private version: string | null = null;

  constructor(session: HttpSession, options: ConnectionOptions) {
    this.session = session;
    this.host = options.host;
    this.requiredKeys = options.requiredKeys ?? [];
    this.logger = options.logger ?? silentLogger;
    this.headers = {};
    if (options.username !== undefined && options.password !== undefined) {
      const credentials = Buffer.from(`${options.username}:${options.password}`).toString("base64");
      this.headers.Authorization = `Basic ${credentials}`;
    }
  }

  static async create(session: HttpSession, options: ConnectionOptions, request?: RequestOptions): Promise<NettigoAirMonitor> {
    const instance = new NettigoAirMonitor(session, options);
    await instance.initialize(request);
    return instance;
  }

  /** Last reading returned by {@link update}, or null before the first success. */
  get data(): Reading | null {
    return this.latest;
  }

  get softwareVersion(): string | null {
    return this.version;
  }

  async initialize(request: RequestOptions = {}): Promise<void> {
    this.logger.debug(`[NAM] Initializing device ${this.host}`);
    const response = await this.request("GET", "config", request);
    await discardBody(response);
  }

  async update(request: RequestOptions = {}): Promise<Reading> {
    const response = await this.request("GET", "data", request);
    const text = await this.readBody(response, request);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new InvalidSensorData("Invalid sensor data", { cause: err });
    }

    const { reading, softwareVersion } = parseReading(body, this.requiredKeys);

    this.latest = reading;
    if (softwareVersion !== null) {
      this.version = softwareVersion;
    }

    return reading;
  }

  async getMacAddress(request: RequestOptions = {}): Promise<string> {
    const response = await this.request("GET", "values", request);
    return parseMacAddress(await this.readBody(response, request));
  }

  async restart(request: RequestOptions = {}): Promise<boolean> {
    const response = await this.request("POST", "restart", request);
    await discardBody(response);
    return true;
  }

  async otaUpdate(request: RequestOptions = {}): Promise<boolean> {
    const response = await this.request("POST", "ota", request);
    await discardBody(response);
    return true;
  }

  private constructUrl(endpoint: Endpoint): string {
    return `http://${this.host}${ENDPOINTS[endpoint]}`;
  }

  private async request(method: "GET" | "POST", endpoint: Endpoint, request: RequestOptions): Promise<Response> {
    const url = this.constructUrl(endpoint);
    this.logger.debug(`[NAM] Requesting ${url}, method: ${method}`);

    let response: Response;
    try {
      response = await this.session(url, { method, headers: this.headers, signal: request.signal });
    } catch (err) {
      // The caller's own timeout or cancellation propagates as-is
      if (request.signal?.aborted) throw err;
      const message = `Cannot connect to device ${this.host}: ${describeError(err)}`;
      this.logger.info(`[NAM] ${message}`);
      throw new ApiError(message, { cause: err });
    }

    this.logger.debug(`[NAM] Data retrieved from ${this.host}, status: ${response.status}`);

    if (response.status === 401) {
      await discardBody(response);
      throw new AuthFailed("Authorization has failed");
    }
    if (response.status !== 200) {
      await discardBody(response);
      throw new ApiError(`Invalid response from device ${this.host}: ${response.status}`);
    }

    return response;
  }

  private async readBody(response: Response, request: RequestOptions): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      if (request.signal?.aborted) throw err;
      throw new ApiError(`Cannot read response from device ${this.host}: ${describeError(err)}`, { cause: err });
    }
  }
}
