import pino from 'pino';
import { PinoPretty } from 'pino-pretty';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export type FlushableDestination = pino.DestinationStream & { flushSync?: () => void };

export interface LoggerConfig {
  /** `false` keeps the root logger silent regardless of level */
  enabled?: boolean | undefined;
  level?: LogLevel | undefined;
  format?: LogFormat | undefined;
  serviceName?: string | undefined;
  /** Overrides stderr; mainly for tests */
  destination?: FlushableDestination | undefined;
  /** Colorize pretty output (default false) */
  color?: boolean | undefined;
}

interface RootState {
  destination: FlushableDestination | undefined;
  logger: pino.Logger;
}

function createDestination(config: LoggerConfig): FlushableDestination {
  if (config.destination) {
    return config.destination;
  }
  if (config.format === 'json') {
    return pino.destination({ dest: 2, sync: true });
  }
  return PinoPretty({
    colorize: config.color ?? false,
    destination: 2,
    ignore: 'pid,hostname,service,category',
    messageFormat: '[{category}] {msg}',
    sync: true,
    translateTime: 'SYS:HH:MM:ss',
  });
}

function createRoot(config: LoggerConfig): RootState {
  if (config.enabled === false) {
    return { destination: undefined, logger: pino({ level: 'silent' }) };
  }

  const destination = createDestination(config);
  const logger = pino(
    {
      base: { service: config.serviceName ?? 'ftgate' },
      level: config.level ?? 'info',
      serializers: { error: pino.stdSerializers.err },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
  return { destination, logger };
}

// Silent until initLogger is called.
let root: RootState = createRoot({ enabled: false });
const children = new Map<string, pino.Logger>();

function childFor(category: string): pino.Logger {
  const cached = children.get(category);
  if (cached) {
    return cached;
  }
  const child = root.logger.child({ category });
  children.set(category, child);
  return child;
}

/**
 * Category handle that resolves its pino child on every call, so module-level
 * loggers created before `initLogger` follow the current configuration.
 */
class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    const target = childFor(this.category);
    if (typeof msgOrObj === 'string') {
      target[level](msgOrObj);
    } else {
      target[level](msgOrObj, maybeMsg ?? '');
    }
  }
}

const handles = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  root = createRoot(config);
  children.clear();
}

export function getLogger(category: string): Logger {
  const cached = handles.get(category);
  if (cached) {
    return cached;
  }
  const logger = new CategoryLogger(category);
  handles.set(category, logger);
  return logger;
}

/**
 * Drain the root destination. Call before the process exits.
 */
export function flushLoggers(): void {
  root.destination?.flushSync?.();
}
