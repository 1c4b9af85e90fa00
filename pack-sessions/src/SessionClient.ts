import { Logger } from 'pack-shared';
import { IHttpTransport } from './core/interfaces/IHttpTransport';
import { ISessionClient } from './core/interfaces/ISessionClient';
import { SessionClientError } from './core/models/Errors';
import { HttpRequestDescriptor } from './core/models/HttpRequest';
import { Result } from './core/models/Result';
import { SessionConfig, SessionResult } from './core/models/Session';
import { ResponseMapper } from './core/impls/ResponseMapper';
import { SessionCodec } from './core/impls/SessionCodec';

const CLASS_NAME = 'SessionClient';

export const SESSIONS_PATH = '/realtime/sessions';

export class SessionClient implements ISessionClient {
  private transport: IHttpTransport;

  constructor(transport: IHttpTransport) {
    this.transport = transport;
  }

  // Headers and timeout are left to the transport.
  buildRequest(config: SessionConfig): HttpRequestDescriptor<SessionResult> {
    return {
      method: 'POST',
      url: SESSIONS_PATH,
      headers: {},
      body: SessionCodec.encode(config),
      handleResponse: (raw) => ResponseMapper.map(raw, SessionCodec.decode),
    };
  }

  async create(config: SessionConfig): Promise<Result<SessionResult, SessionClientError>> {
    const request = this.buildRequest(config);
    Logger.debug(CLASS_NAME, null, `Creating session: ${request.method} ${request.url}`, config.model);

    const executed = await this.transport.execute(request);
    if (!executed.success) {
      Logger.warn(CLASS_NAME, null, 'Session request failed', executed.error.code, executed.error.message);
      return executed;
    }

    const result = request.handleResponse(executed.value);
    if (result.success) {
      Logger.debug(CLASS_NAME, result.value.id, 'Session created', result.value.clientSecret.expiresAt.toISOString());
    } else {
      Logger.warn(CLASS_NAME, null, 'Session response rejected', result.error.code, result.error.message);
    }
    return result;
  }
}
