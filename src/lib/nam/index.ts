export { NettigoAirMonitor, type ConnectionOptions, type HttpSession, type NamLogger, type RequestOptions } from "./client.js";
export { ApiError, AuthFailed, CannotGetMac, InvalidSensorData, NamError } from "./errors.js";
export { parseMacAddress, parseReading, type ParsedReading, type Reading } from "./parse.js";
