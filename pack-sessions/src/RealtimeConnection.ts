import WebSocket from 'ws';
import { Config, ConfigKeys, ErrorCode, Logger } from 'pack-shared';
import { IConnectionHandler } from './core/interfaces/IConnectionHandler';
import { IVoiceConnection } from './core/interfaces/IVoiceConnection';
import { ClientSecret } from './core/models/Session';

const CLASS_NAME = 'RealtimeConnection';

export const DEFAULT_REALTIME_URL = 'wss://api.openai.com/v1/realtime';

/**
 * Realtime socket authenticated with the ephemeral client secret returned by
 * session creation.
 */
export class RealtimeConnection implements IVoiceConnection {
  private ws: WebSocket | null = null;
  private handler: IConnectionHandler;
  private clientSecret: ClientSecret;
  private readonly url: string;

  constructor(handler: IConnectionHandler, clientSecret: ClientSecret, model: string, baseUrl?: string) {
    this.handler = handler;
    this.clientSecret = clientSecret;
    const base = baseUrl ?? Config.getOrDefault(ConfigKeys.OPENAI_REALTIME_URL, DEFAULT_REALTIME_URL);
    this.url = `${base}?model=${encodeURIComponent(model)}`;
  }

  public connect(): void {
    if (!(this.clientSecret.expiresAt.getTime() > Date.now())) {
      Logger.warn(CLASS_NAME, null, 'Client secret expired', this.clientSecret.expiresAt.toISOString());
      this.handler.onError(new Error(ErrorCode.SECRET_EXPIRED));
      return;
    }

    this.ws = new WebSocket(this.url, {
      headers: {
        Authorization: `Bearer ${this.clientSecret.value}`,
        'OpenAI-Beta': 'realtime=v1',
      },
    });

    this.ws.on('open', () => {
      Logger.debug(CLASS_NAME, null, `Connected to ${this.url}`);
      this.handler.onConnect();
    });

    this.ws.on('error', (error) => {
      Logger.error(CLASS_NAME, null, 'Socket error', error);
      this.handler.onError(error);
    });

    this.ws.on('close', (code, reason) => {
      this.handler.onClose(code, reason.toString());
      this.ws = null;
    });

    this.ws.on('message', (data) => {
      this.handler.onMsgReceived(data.toString());
    });
  }

  public disconnect(): void {
    if (!this.ws) {
      return;
    }
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close();
    } else if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    }
  }

  public isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  public send(message: unknown): void {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      const data = typeof message === 'string' ? message : JSON.stringify(message);
      this.ws.send(data);
    } else {
      Logger.debug(CLASS_NAME, null, 'Dropping message, socket not open');
    }
  }
}
