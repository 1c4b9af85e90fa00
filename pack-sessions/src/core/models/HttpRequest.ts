import { JsonObject } from './Json';
import { Result } from './Result';
import { SessionClientError, TransportError } from './Errors';

export type HttpMethod = 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: JsonObject;
  // Falls back to the transport's own default when absent.
  timeoutMs?: number;
}

export interface RawResponse {
  status: number;
  statusText: string;
  body: string;
}

export type TransportResult = Result<RawResponse, TransportError>;

export interface HttpRequestDescriptor<T> extends HttpRequest {
  handleResponse(raw: RawResponse): Result<T, SessionClientError>;
}
