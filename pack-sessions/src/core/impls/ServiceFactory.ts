import { Config, ConfigKeys, Logger } from 'pack-shared';
import { IServiceFactory } from '../interfaces/IServiceFactory';
import { IHttpTransport } from '../interfaces/IHttpTransport';
import { ISessionClient } from '../interfaces/ISessionClient';
import { IConnectionHandler } from '../interfaces/IConnectionHandler';
import { IVoiceConnection } from '../interfaces/IVoiceConnection';
import { ClientSecret } from '../models/Session';
import { FetchTransport } from './FetchTransport';
import { SessionClient } from '../../SessionClient';
import { RealtimeConnection } from '../../RealtimeConnection';

const CLASS_NAME = 'ServiceFactory';

export class ServiceFactory implements IServiceFactory {
  private static instance: ServiceFactory | null = null;

  private transport: FetchTransport | null = null;
  private sessionClient: SessionClient | null = null;

  private constructor() {
    ServiceFactory.applyLogLevel();
  }

  static getInstance(): ServiceFactory {
    if (!ServiceFactory.instance) {
      ServiceFactory.instance = new ServiceFactory();
    }
    return ServiceFactory.instance;
  }

  static reset(): void {
    ServiceFactory.instance = null;
    Logger.setSessionFilter(null);
    Config.reset();
  }

  private static applyLogLevel(): void {
    if (Config.has(ConfigKeys.LOG_SESSION_ID)) {
      Logger.setSessionFilter(Config.get(ConfigKeys.LOG_SESSION_ID));
    }
    if (!Config.has(ConfigKeys.LOG_LEVEL)) {
      return;
    }
    const level = Config.get(ConfigKeys.LOG_LEVEL);
    if (Logger.isLogLevel(level)) {
      Logger.setLevel(level);
    } else {
      Logger.warn(CLASS_NAME, null, `Ignoring unknown ${ConfigKeys.LOG_LEVEL}`, level);
    }
  }

  getTransport(): IHttpTransport {
    if (!this.transport) {
      this.transport = new FetchTransport();
    }
    return this.transport;
  }

  getSessionClient(): ISessionClient {
    if (!this.sessionClient) {
      this.sessionClient = new SessionClient(this.getTransport());
    }
    return this.sessionClient;
  }

  getNewRealtimeConnection(handler: IConnectionHandler, clientSecret: ClientSecret, model: string): IVoiceConnection {
    return new RealtimeConnection(handler, clientSecret, model);
  }
}
