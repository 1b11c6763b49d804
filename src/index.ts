export * from './proposition';
export * from './parse';
export * from './sequent';
export * from './names';
export * from './decompose';
export * from './prover';
export { debugLogger, DebugLogger, LogComponent, LogLevel } from './debug-logger';
export type { LoggerOptions } from './debug-logger';
