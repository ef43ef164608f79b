import { SinkWriteFailure, toError } from '../utils/errors';
import { logError, logger } from '../utils/logger';

/**
 * Runs a sink write, retrying once immediately. A second failure is logged at
 * error level and reported as false; the batch is dropped.
 */
export const writeWithRetry = async (
  write: () => Promise<void>,
  context: Record<string, unknown>
): Promise<boolean> => {
  try {
    await write();
    return true;
  } catch (firstError) {
    logger.warn(`Sink write failed, retrying once: ${toError(firstError).message}`, context);
  }

  try {
    await write();
    return true;
  } catch (error) {
    const failure =
      error instanceof SinkWriteFailure
        ? error
        : new SinkWriteFailure(toError(error).message, context);
    logError(failure, { ...context, dropped: true });
    return false;
  }
};
