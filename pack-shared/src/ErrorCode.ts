export enum ErrorCode {
  TRANSPORT_NETWORK = 'TRANSPORT_NETWORK',
  TRANSPORT_TIMEOUT = 'TRANSPORT_TIMEOUT',
  TRANSPORT_HTTP_STATUS = 'TRANSPORT_HTTP_STATUS',
  DECODE_INVALID_JSON = 'DECODE_INVALID_JSON',
  DECODE_MISSING_FIELD = 'DECODE_MISSING_FIELD',
  DECODE_TYPE_MISMATCH = 'DECODE_TYPE_MISMATCH',
  SECRET_EXPIRED = 'SECRET_EXPIRED',
}
