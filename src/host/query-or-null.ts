/**
 * Host query wrapper
 *
 * Host queries fail routinely (element detached, page navigating, window
 * closed). The coordinator treats every failure as "no answer this tick".
 */

import { ErrorCode, HostQueryError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('HostQuery');

/**
 * Run a host query, converting a thrown error into null.
 *
 * @param operation - Short name used in the log entry
 */
export async function queryOrNull<T>(
  operation: string,
  query: () => Promise<T | null>,
  code: ErrorCode = ErrorCode.HOST_ELEMENT_QUERY_FAILED
): Promise<T | null> {
  try {
    return await query();
  } catch (error) {
    const failure =
      error instanceof HostQueryError
        ? error
        : new HostQueryError(
            `${operation} failed`,
            code,
            undefined,
            error instanceof Error ? error : undefined
          );
    logger.debug(`${operation} failed - treating as no answer`, {
      ...failure.toStructured(),
      cause: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
