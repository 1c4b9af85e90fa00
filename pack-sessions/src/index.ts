export { SessionClient, SESSIONS_PATH } from './SessionClient';
export { RealtimeConnection, DEFAULT_REALTIME_URL } from './RealtimeConnection';
export { ServiceFactory } from './core/impls/ServiceFactory';
export { FetchTransport, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './core/impls/FetchTransport';
export { SessionCodec } from './core/impls/SessionCodec';
export { IntOrUnboundedUtils } from './core/impls/IntOrUnboundedUtils';
export { JsonReader } from './core/impls/JsonReader';
export { ResponseMapper } from './core/impls/ResponseMapper';
export { TransportError, DecodeError } from './core/models/Errors';
export { UNBOUNDED_WIRE_VALUE } from './core/models/IntOrUnbounded';
export type { TransportErrorKind, TransportErrorDetails, SessionClientError } from './core/models/Errors';
export type { IntOrUnbounded, Finite, Unbounded } from './core/models/IntOrUnbounded';
export type { JsonValue, JsonObject, JsonPrimitive } from './core/models/Json';
export type { Result } from './core/models/Result';
export type { HttpMethod, HttpRequest, RawResponse, TransportResult, HttpRequestDescriptor } from './core/models/HttpRequest';
export type {
  SessionConfig,
  SessionResult,
  ClientSecret,
  TurnDetection,
  ToolDescriptor,
  InputAudioTranscription,
  InputAudioNoiseReduction,
} from './core/models/Session';
export type { IHttpTransport } from './core/interfaces/IHttpTransport';
export type { ISessionClient } from './core/interfaces/ISessionClient';
export type { IConnectionHandler } from './core/interfaces/IConnectionHandler';
export type { IVoiceConnection } from './core/interfaces/IVoiceConnection';
export type { IServiceFactory } from './core/interfaces/IServiceFactory';
