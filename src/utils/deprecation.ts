import { logger } from '../logger';

const log = logger.child({ category: 'DeprecationWarning' });

/** Log a deprecation notice for a legacy entry point. */
export function warnDeprecated(message: string): void {
  log.warn(message);
}
