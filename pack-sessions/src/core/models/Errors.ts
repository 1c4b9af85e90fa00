import { ErrorCode } from 'pack-shared';

export type TransportErrorKind = 'network' | 'timeout' | 'http';

export interface TransportErrorDetails {
  status?: number;
  type?: string;
  apiCode?: string;
  cause?: unknown;
}

const TRANSPORT_CODES: Record<TransportErrorKind, ErrorCode> = {
  network: ErrorCode.TRANSPORT_NETWORK,
  timeout: ErrorCode.TRANSPORT_TIMEOUT,
  http: ErrorCode.TRANSPORT_HTTP_STATUS,
};

/**
 * Failure reported by the HTTP transport: the request never produced a usable
 * response (network, timeout) or the API answered with a non-2xx status.
 */
export class TransportError extends Error {
  readonly code: ErrorCode;
  readonly kind: TransportErrorKind;
  readonly status?: number;
  readonly type?: string;
  readonly apiCode?: string;

  constructor(kind: TransportErrorKind, message: string, details: TransportErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.code = TRANSPORT_CODES[kind];
    this.status = details.status;
    this.type = details.type;
    this.apiCode = details.apiCode;
  }
}

/**
 * The response body did not match the expected shape. `path` points at the
 * offending value, e.g. `$.client_secret.expires_at`.
 */
export class DecodeError extends Error {
  readonly code: ErrorCode;
  readonly path: string;
  readonly expected: string;
  readonly actual: string;

  constructor(path: string, expected: string, actual: string, code?: ErrorCode) {
    super(`Failed to decode ${path}: expected ${expected}, got ${actual}`);
    this.name = 'DecodeError';
    this.path = path;
    this.expected = expected;
    this.actual = actual;
    this.code = code ?? (actual === 'missing' ? ErrorCode.DECODE_MISSING_FIELD : ErrorCode.DECODE_TYPE_MISMATCH);
  }
}

export type SessionClientError = TransportError | DecodeError;
