export * from './types';
export { InterceptorChain } from './interceptorChain';
export { ConsoleLogger, createConsoleLoggerFromEnv, isLogLevel } from './consoleLogger';
export type { LogLevel } from './consoleLogger';
export { createFetchTransport, fetchTransport, FETCH_TRANSPORT_USER_AGENT } from './transport/fetchTransport';
export type { FetchFn } from './transport/fetchTransport';
