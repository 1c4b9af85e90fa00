export { Config, ConfigKeys } from './Config';
export { Logger } from './Logger';
export type { LogLevel } from './Logger';
export { ErrorCode } from './ErrorCode';
