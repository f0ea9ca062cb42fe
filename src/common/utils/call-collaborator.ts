import {
  ComputeError,
  QueryCacheError,
  describeError,
} from '../errors/query-cache.errors';
import { withTimeout } from './with-timeout';

/**
 * Invoke an external collaborator under the collaborator timeout.
 *
 * Errors that already carry a kind pass through; anything else, including
 * the timeout, becomes a ComputeError naming the collaborator.
 */
export async function callCollaborator<T>(
  collaborator: string,
  timeoutMs: number,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await withTimeout(
      call(),
      timeoutMs,
      () => new ComputeError(collaborator, `timed out after ${timeoutMs}ms`),
    );
  } catch (error) {
    if (error instanceof QueryCacheError) {
      throw error;
    }
    throw new ComputeError(
      collaborator,
      describeError(error),
      error instanceof Error ? error : undefined,
    );
  }
}
