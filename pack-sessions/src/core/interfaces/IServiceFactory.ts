import { IConnectionHandler } from './IConnectionHandler';
import { IHttpTransport } from './IHttpTransport';
import { ISessionClient } from './ISessionClient';
import { IVoiceConnection } from './IVoiceConnection';
import { ClientSecret } from '../models/Session';

export interface IServiceFactory {
  getTransport(): IHttpTransport;
  getSessionClient(): ISessionClient;
  getNewRealtimeConnection(handler: IConnectionHandler, clientSecret: ClientSecret, model: string): IVoiceConnection;
}
