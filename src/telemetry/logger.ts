export type LogContext = Record<string, unknown>;

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

type LoggerFn = (message: string, context?: LogContext) => void;

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  // stdout belongs to the host application (rendered graphs, reports); all
  // diagnostics go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

/**
 * Logger handed to each search stage. `info` and `debug` are diagnostics and
 * only reach stderr when the search runs verbose; warnings and errors always do.
 */
export interface StageLogger {
  readonly verbose: boolean;
  info: LoggerFn;
  debug: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
}

export function createStageLogger(stage: string, verbose: boolean): StageLogger {
  const prefix = `[skewcycle:${stage}]`;
  const quiet: LoggerFn = () => undefined;
  return {
    verbose,
    info: verbose ? (message, context) => logInfo(`${prefix} ${message}`, context) : quiet,
    debug: verbose ? (message, context) => logDebug(`${prefix} ${message}`, context) : quiet,
    warn: (message, context) => logWarning(`${prefix} ${message}`, context),
    error: (message, context) => logError(`${prefix} ${message}`, context),
  };
}
