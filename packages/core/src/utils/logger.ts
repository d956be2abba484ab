import { type BaseLogger, pino } from 'pino';

/**
 * Returns the caller's logger, or a disabled pino logger when none was configured,
 * so components can log unconditionally.
 */
export function resolveLogger(logger?: BaseLogger): BaseLogger {
  return logger ?? pino({ enabled: false });
}
