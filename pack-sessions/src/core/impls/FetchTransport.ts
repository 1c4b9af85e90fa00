import { Config, ConfigKeys, Logger } from 'pack-shared';
import { IHttpTransport } from '../interfaces/IHttpTransport';
import { TransportError } from '../models/Errors';
import { HttpRequest, TransportResult } from '../models/HttpRequest';

const CLASS_NAME = 'FetchTransport';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 30000;

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class FetchTransport implements IHttpTransport {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(apiKey?: string, baseUrl?: string, timeoutMs?: number) {
    this.apiKey = apiKey ?? Config.get(ConfigKeys.OPENAI_API_KEY);
    this.baseUrl = (baseUrl ?? Config.getOrDefault(ConfigKeys.OPENAI_BASE_URL, DEFAULT_BASE_URL)).replace(/\/+$/, '');
    this.timeoutMs = timeoutMs ?? Config.getNumber(ConfigKeys.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS);
  }

  resolveUrl(url: string): string {
    if (/^https?:\/\//.test(url)) {
      return url;
    }
    return `${this.baseUrl}${url.startsWith('/') ? url : `/${url}`}`;
  }

  async execute(request: HttpRequest): Promise<TransportResult> {
    const url = this.resolveUrl(request.url);
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'OpenAI-Beta': 'realtime=v1',
          ...request.headers,
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = await response.text();
      Logger.debug(CLASS_NAME, null, `${request.method} ${url}`, response.status);
      return {
        success: true,
        value: { status: response.status, statusText: response.statusText, body },
      };
    } catch (error) {
      if (isTimeout(error)) {
        return {
          success: false,
          error: new TransportError('timeout', `${request.method} ${url} timed out after ${timeoutMs}ms`, { cause: error }),
        };
      }
      const reason = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        error: new TransportError('network', `${request.method} ${url} failed: ${reason}`, { cause: error }),
      };
    }
  }
}
