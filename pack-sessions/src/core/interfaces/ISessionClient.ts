import { HttpRequestDescriptor } from '../models/HttpRequest';
import { Result } from '../models/Result';
import { SessionClientError } from '../models/Errors';
import { SessionConfig, SessionResult } from '../models/Session';

export interface ISessionClient {
  /**
   * Describe the session-creation call without performing it.
   */
  buildRequest(config: SessionConfig): HttpRequestDescriptor<SessionResult>;

  /**
   * Create a session and decode the response.
   * @returns success with the session, or a TransportError / DecodeError
   */
  create(config: SessionConfig): Promise<Result<SessionResult, SessionClientError>>;
}
