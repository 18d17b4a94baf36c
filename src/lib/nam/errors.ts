export class NamError extends Error {
  readonly status: string;

  constructor(status: string, options?: { cause?: unknown }) {
    super(status, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Request failed at the transport or HTTP level. */
export class ApiError extends NamError {}

export class AuthFailed extends ApiError {}

/** Response body did not have the shape of a sensor-data document. */
export class InvalidSensorData extends NamError {}

export class CannotGetMac extends InvalidSensorData {}
