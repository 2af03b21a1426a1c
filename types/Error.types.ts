/**
 * Error types raised while loading endpoint group configuration.
 * Every failure is terminal for the load call; callers decide whether to abort startup.
 */

export type ErrorLike = Error | { message: string; code?: string | number } | string | unknown;

export type EndpointConfigErrorCode =
  | 'DECODE_ERROR'
  | 'INVALID_MODE'
  | 'MODE_CONFLICT'
  | 'DUPLICATE_ENDPOINT';

/**
 * Base class of all endpoint configuration errors
 */
export abstract class EndpointConfigError extends Error {
  abstract readonly code: EndpointConfigErrorCode;
}

/**
 * The document is not valid YAML, or does not match the endpoint group schema
 * (unknown keys, duplicate keys, wrong value types).
 */
export class DecodeError extends EndpointConfigError {
  readonly code = 'DECODE_ERROR';
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(`invalid endpoint config document: ${issues.join('; ')}`, options);
    this.name = 'DecodeError';
    this.issues = issues;
  }
}

export class InvalidModeError extends EndpointConfigError {
  readonly code = 'INVALID_MODE';
  readonly mode: string;

  constructor(mode: string) {
    super(`"${mode}" is wrong mode, expected "" (default) or "strict"`);
    this.name = 'InvalidModeError';
    this.mode = mode;
  }
}

/**
 * A strict group lists service discovery files.
 */
export class ModeConflictError extends EndpointConfigError {
  readonly code = 'MODE_CONFLICT';
  readonly groupName: string;

  constructor(groupName: string) {
    super(
      groupName !== ''
        ? `no sd-files allowed in strict mode (group "${groupName}")`
        : 'no sd-files allowed in strict mode',
    );
    this.name = 'ModeConflictError';
    this.groupName = groupName;
  }
}

export class DuplicateEndpointError extends EndpointConfigError {
  readonly code = 'DUPLICATE_ENDPOINT';
  readonly address: string;

  constructor(address: string) {
    super(`${address} endpoint provided more than once`);
    this.name = 'DuplicateEndpointError';
    this.address = address;
  }
}

export function isEndpointConfigError(error: unknown): error is EndpointConfigError {
  return error instanceof EndpointConfigError;
}

/**
 * Utility type for serializing errors safely
 */
export interface SerializableError {
  name: string;
  message: string;
  stack?: string;
  code?: string | number;
  [key: string]: unknown;
}

function endpointErrorDetails(error: EndpointConfigError): Record<string, unknown> {
  if (error instanceof DecodeError) return { issues: error.issues };
  if (error instanceof InvalidModeError) return { mode: error.mode };
  if (error instanceof ModeConflictError) return { groupName: error.groupName };
  if (error instanceof DuplicateEndpointError) return { address: error.address };
  return {};
}

/**
 * Convert any error-like object to a serializable error
 */
export function toSerializableError(error: ErrorLike): SerializableError {
  if (isEndpointConfigError(error)) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      ...endpointErrorDetails(error),
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'string') {
    return {
      name: 'Error',
      message: error,
    };
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return {
      name: 'Error',
      ...error,
      message: String(error.message ?? 'Unknown error'),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error ?? 'Unknown error'),
  };
}
