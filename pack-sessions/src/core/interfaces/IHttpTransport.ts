import { HttpRequest, TransportResult } from '../models/HttpRequest';

export interface IHttpTransport {
  /**
   * Execute one request. Failures are returned, not thrown: a non-2xx status
   * still resolves with the raw response.
   */
  execute(request: HttpRequest): Promise<TransportResult>;
}
