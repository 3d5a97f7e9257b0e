export type SmartAppErrorCode =
  | 'NOT_CONFIGURED'
  | 'AUTHENTICATION_FAILED'
  | 'SESSION_UNSTABLE'
  | 'DISCOVERY_FAILED'
  | 'DEVICE_UNREACHABLE'
  | 'UNKNOWN_DEVICE'
  | 'UNSUPPORTED_OPERATION'
  | 'COMMAND_IN_FLIGHT'
  | 'COMMAND_SUBMISSION_FAILED'
  | 'CLOUD_REQUEST_FAILED';

export class SmartAppError extends Error {
  readonly code: SmartAppErrorCode;

  constructor(code: SmartAppErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SmartAppError';
    this.code = code;
  }
}

export class NotConfiguredError extends SmartAppError {
  constructor(message = 'Daikin account credentials are not configured') {
    super('NOT_CONFIGURED', message);
    this.name = 'NotConfiguredError';
  }
}

/** Credentials rejected. Not retried; the user has to re-enter them. */
export class AuthenticationFailedError extends SmartAppError {
  constructor(message: string, cause?: unknown) {
    super('AUTHENTICATION_FAILED', message, cause);
    this.name = 'AuthenticationFailedError';
  }
}

export class SessionUnstableError extends SmartAppError {
  constructor(message: string) {
    super('SESSION_UNSTABLE', message);
    this.name = 'SessionUnstableError';
  }
}

export class DiscoveryFailedError extends SmartAppError {
  constructor(message: string, cause?: unknown) {
    super('DISCOVERY_FAILED', message, cause);
    this.name = 'DiscoveryFailedError';
  }
}

export class DeviceUnreachableError extends SmartAppError {
  constructor(readonly deviceId: string, message: string, cause?: unknown) {
    super('DEVICE_UNREACHABLE', message, cause);
    this.name = 'DeviceUnreachableError';
  }
}

export class UnknownDeviceError extends SmartAppError {
  constructor(readonly deviceId: string) {
    super('UNKNOWN_DEVICE', `Unknown device: ${deviceId}`);
    this.name = 'UnknownDeviceError';
  }
}

export class UnsupportedOperationError extends SmartAppError {
  constructor(message: string) {
    super('UNSUPPORTED_OPERATION', message);
    this.name = 'UnsupportedOperationError';
  }
}

export class CommandInFlightError extends SmartAppError {
  constructor(readonly deviceId: string) {
    super('COMMAND_IN_FLIGHT', `A command for ${deviceId} is still awaiting confirmation`);
    this.name = 'CommandInFlightError';
  }
}

export class CommandSubmissionFailedError extends SmartAppError {
  constructor(readonly deviceId: string, message: string, cause?: unknown) {
    super('COMMAND_SUBMISSION_FAILED', message, cause);
    this.name = 'CommandSubmissionFailedError';
  }
}

export class CloudRequestError extends SmartAppError {
  constructor(message: string, readonly status?: number, cause?: unknown) {
    super('CLOUD_REQUEST_FAILED', message, cause);
    this.name = 'CloudRequestError';
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof AuthenticationFailedError || error instanceof SessionUnstableError;
}

export function toError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  return new Error(typeof reason === 'string' ? reason : JSON.stringify(reason));
}

export function errorMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
