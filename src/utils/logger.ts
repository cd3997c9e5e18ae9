/**
 * Structured Logger using Pino
 *
 * JSON logs on stderr (stdout is left to the tool protocol), one child
 * logger per component. Cookie values and credential headers are redacted
 * before anything is written.
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  url?: string;
  method?: string;
  attempt?: number;
  maxAttempts?: number;
  errorKind?: string;
  status?: number;
  sessionName?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  /** A stream object receives one JSON line per write; pretty printing is ignored for it */
  destination: 'stderr' | 'stdout' | DestinationStream;
}

function levelFromEnv(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(process.env.LOG_LEVEL),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Pino redaction paths.
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'headers.Cookie',
  'headers["set-cookie"]',
  'headers["Set-Cookie"]',
  'headers["proxy-authorization"]',
  'request.headers.authorization',
  'request.headers.cookie',
  'response.headers["set-cookie"]',
  'proxy',
  'cookies',
  'record.cookies',
  '*.password',
  '*.token',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'lenient-web-bridge',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (typeof config.destination === 'object') {
    return pino(options, config.destination);
  }

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;
  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (tests silence it, the runtime applies config)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper.
 *
 * Reads the current base logger on every call so configureLogger() takes
 * effect for loggers created at module load.
 */
export class Logger {
  private cached: PinoLogger | null = null;

  constructor(private readonly component: string, parent?: PinoLogger) {
    if (parent) {
      this.cached = parent.child({ component });
    }
  }

  private get logger(): PinoLogger {
    return this.cached ?? baseLogger.child({ component: this.component });
  }

  child(context: LogContext): Logger {
    const child = new Logger(this.component);
    child.cached = this.logger.child(context);
    return child;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context ?? {}, message);
  }

  /**
   * Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error !== undefined) {
      const err =
        context.error instanceof Error
          ? { message: context.error.message, name: context.error.name, stack: context.error.stack }
          : { message: String(context.error) };
      this.logger.error({ ...context, error: undefined, err }, message);
    } else {
      this.logger.error(context ?? {}, message);
    }
  }

  timed(message: string, startTime: number, context?: LogContext): void {
    this.info(message, { ...context, durationMs: Date.now() - startTime });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  fetchEngine: new Logger('FetchEngine'),
  batch: new Logger('BatchCoordinator'),
  transport: new Logger('HttpTransport'),
  session: new Logger('SessionStore'),
  network: new Logger('NetworkRecorder'),
  browser: new Logger('BrowserSession'),
  tools: new Logger('ToolDispatch'),
  runtime: new Logger('BridgeRuntime'),

  create: (component: string) => new Logger(component),
};

export default logger;
