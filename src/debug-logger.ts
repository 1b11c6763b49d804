/**
 * Debug logging system for the sequent prover.
 * Controlled by environment variables:
 * - DEBUG_PROVER=true to enable debug logging
 * - DEBUG_PROVER_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_PROVER_FILTER=parser,decompose,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  PARSER = 'PARSER',
  DECOMPOSE = 'DECOMPOSE',
  NAMES = 'NAMES',
  PROVER = 'PROVER',
}

export interface LoggerOptions {
  enabled: boolean;
  level: LogLevel;
  /** Components to log, or null for all of them. */
  components: Set<string> | null;
}

function parseLevel(levelStr: string | undefined): LogLevel {
  switch ((levelStr ?? 'DEBUG').toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

/**
 * Reads logger options from the environment.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv): LoggerOptions {
  const filterStr = env.DEBUG_PROVER_FILTER;
  return {
    enabled: env.DEBUG_PROVER === 'true',
    level: parseLevel(env.DEBUG_PROVER_LEVEL),
    components: filterStr
      ? new Set(filterStr.split(',').map((s) => s.trim().toUpperCase()))
      : null,
  };
}

export class DebugLogger {
  constructor(
    private options: LoggerOptions,
    private readonly sink: (line: string) => void = console.log
  ) {}

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  private shouldLog(level: LogLevel, component: LogComponent): boolean {
    if (!this.options.enabled) return false;
    if (level < this.options.level) return false;
    if (this.options.components && !this.options.components.has(component))
      return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.shouldLog(level, component)) {
      this.sink(this.formatMessage(level, component, message));
    }
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  /**
   * Logs a sequent with its depth in the search. Rendering is deferred until
   * we know the line will be written.
   */
  logSequent(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    depth: number,
    renderFn: () => string
  ): void {
    if (!this.shouldLog(level, component)) return;
    this.log(level, component, `${'  '.repeat(depth)}${prefix}: ${renderFn()}`);
  }
}

// Singleton instance
export const debugLogger = new DebugLogger(optionsFromEnv(process.env));
