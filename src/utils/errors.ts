/**
 * Error taxonomy.
 *
 * `ApiError` carries the HTTP status the global error handler responds with;
 * the subclasses name the failures the rotation and delivery code can raise.
 * An empty render is a normal result and has no error type.
 */

export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(statusCode: number, message: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidDeviceIdError extends ApiError {
  constructor(deviceId: string) {
    super(400, `Invalid device id: ${deviceId}`);
  }
}

export class DeviceNotFoundError extends ApiError {
  constructor(deviceId: string) {
    super(404, `Device not found: ${deviceId}`);
  }
}

export class AppNotFoundError extends ApiError {
  constructor(deviceId: string, iname: string) {
    super(404, `App ${iname} not found on device ${deviceId}`);
  }
}

export class InvalidPushPayloadError extends ApiError {
  constructor(message: string) {
    super(422, message);
  }
}

export class RenderFailureError extends ApiError {
  readonly appPath: string;

  constructor(appPath: string, cause: unknown) {
    super(500, `Render failed for ${appPath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.appPath = appPath;
  }
}

export class StorageWriteError extends ApiError {
  constructor(message: string) {
    super(500, message);
  }
}

/** Raised while accepting a device WebSocket; maps to close code 1008. */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
