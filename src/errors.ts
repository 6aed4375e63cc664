/**
 * Error taxonomy shared by the vault, the connector and the bridge.
 *
 * Every error that may reach a client is a BridgeError; anything else is
 * treated as internal and reported as a generic failure.
 */

import type { HostKeyStatus } from './types.js';

export type ErrorCode =
  | 'CONFIGURATION'
  | 'NO_AUTH_METHOD'
  | 'KEY_PARSE'
  | 'AUTHENTICATION_FAILED'
  | 'AUTH_FAILED'
  | 'HOST_KEY_REJECTED'
  | 'DIAL_TIMEOUT'
  | 'NETWORK'
  | 'PROTOCOL_VIOLATION'
  | 'TARGET_NOT_FOUND'
  | 'NOT_FOUND'
  | 'IS_DIRECTORY';

export class BridgeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

export class NoAuthMethodError extends BridgeError {
  constructor() {
    super('NO_AUTH_METHOD', 'No authentication method provided');
    this.name = 'NoAuthMethodError';
  }
}

export class KeyParseError extends BridgeError {
  constructor(cause?: unknown) {
    super('KEY_PARSE', 'Failed to parse private key', { cause });
    this.name = 'KeyParseError';
  }
}

/**
 * Credential envelope could not be opened. The message is fixed: wrong key
 * material, wrong server secret and corrupted data all look the same.
 */
export class AuthenticationFailedError extends BridgeError {
  constructor() {
    super('AUTHENTICATION_FAILED', 'Failed to decrypt credentials');
    this.name = 'AuthenticationFailedError';
  }
}

export class AuthFailedError extends BridgeError {
  constructor(cause?: unknown) {
    super('AUTH_FAILED', 'SSH authentication failed', { cause });
    this.name = 'AuthFailedError';
  }
}

export class HostKeyRejectedError extends BridgeError {
  readonly fingerprint: string;
  readonly storedFingerprint: string;
  readonly status: HostKeyStatus;

  constructor(status: HostKeyStatus, fingerprint: string, storedFingerprint: string) {
    super(
      'HOST_KEY_REJECTED',
      status === 'mismatch'
        ? `Host key mismatch: expected ${storedFingerprint}, got ${fingerprint}`
        : `Host key not yet trusted: ${fingerprint}`,
    );
    this.name = 'HostKeyRejectedError';
    this.status = status;
    this.fingerprint = fingerprint;
    this.storedFingerprint = storedFingerprint;
  }
}

export class DialTimeoutError extends BridgeError {
  constructor(timeoutMs: number) {
    super('DIAL_TIMEOUT', `Connection timed out after ${timeoutMs}ms`);
    this.name = 'DialTimeoutError';
  }
}

export class NetworkError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super('NETWORK', message, { cause });
    this.name = 'NetworkError';
  }
}

export class ProtocolViolationError extends BridgeError {
  constructor(message: string) {
    super('PROTOCOL_VIOLATION', message);
    this.name = 'ProtocolViolationError';
  }
}

export class TargetNotFoundError extends BridgeError {
  constructor() {
    super('TARGET_NOT_FOUND', 'Machine not found');
    this.name = 'TargetNotFoundError';
  }
}

export class NotFoundError extends BridgeError {
  constructor(path: string) {
    super('NOT_FOUND', `Path does not exist: ${path}`);
    this.name = 'NotFoundError';
  }
}

export class IsDirectoryError extends BridgeError {
  constructor(path: string) {
    super('IS_DIRECTORY', `Cannot download a directory: ${path}`);
    this.name = 'IsDirectoryError';
  }
}

/**
 * Text that is safe to hand to a client for any thrown value.
 */
export function clientMessage(error: unknown): string {
  if (error instanceof BridgeError) {
    return error.message;
  }
  return 'Internal error';
}

export function httpStatus(error: unknown): number {
  if (!(error instanceof BridgeError)) return 500;
  switch (error.code) {
    case 'CONFIGURATION':
    case 'NO_AUTH_METHOD':
    case 'KEY_PARSE':
    case 'PROTOCOL_VIOLATION':
    case 'IS_DIRECTORY':
      return 400;
    case 'AUTHENTICATION_FAILED':
      return 401;
    case 'TARGET_NOT_FOUND':
    case 'NOT_FOUND':
      return 404;
    case 'HOST_KEY_REJECTED':
      return 409;
    case 'AUTH_FAILED':
    case 'NETWORK':
      return 502;
    case 'DIAL_TIMEOUT':
      return 504;
  }
}
