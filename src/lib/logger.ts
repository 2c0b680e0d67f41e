import pino from 'pino';
import { getEnv } from '../config/env.js';

let _logger: pino.Logger | null = null;

export interface LoggerOptions {
  level?: pino.LevelWithSilent;
  /** Plain-text execution log appended alongside console output; null disables it. */
  logFile?: string | null;
  prettyConsole?: boolean;
}

/**
 * Transport targets: console (JSON, or pretty in development) plus the
 * human-readable execution log, one line per event.
 */
export function buildTransportTargets(
  level: pino.Level,
  logFile: string | null,
  prettyConsole: boolean,
): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [
    prettyConsole
      ? {
          target: 'pino-pretty',
          level,
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : { target: 'pino/file', level, options: { destination: 1 } },
  ];

  if (logFile) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: logFile,
        append: true,
        mkdir: true,
        colorize: false,
        singleLine: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss o',
        // Stacks stay on the console; each message already names its error.
        errorLikeObjectKeys: [],
        ignore: 'pid,hostname,service,env,err',
      },
    });
  }

  return targets;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  if (_logger) return _logger;

  const env = getEnv();
  const level = options.level ?? env.MONITOR_LOG_LEVEL;
  const logFile = options.logFile === undefined ? env.LOG_FILE : options.logFile;
  const prettyConsole = options.prettyConsole ?? env.NODE_ENV === 'development';

  const loggerOptions: pino.LoggerOptions = {
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'review-count-monitor',
      env: env.NODE_ENV,
    },
  };

  if (level === 'silent') {
    _logger = pino(loggerOptions);
    return _logger;
  }

  _logger = pino({
    ...loggerOptions,
    transport: { targets: buildTransportTargets(level, logFile, prettyConsole) },
  });

  return _logger;
}

export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call createLogger() first.');
  }
  return _logger;
}
