import { toError } from './errors';
import { logger } from './logger';

export interface Closeable {
  name: string;
  close: () => Promise<unknown> | unknown;
}

/**
 * Closes resources in order, continuing past failures. Resolves to false when
 * any of them failed to close.
 */
export async function closeAll(resources: Closeable[]): Promise<boolean> {
  let clean = true;

  for (const resource of resources) {
    try {
      await resource.close();
      logger.debug(`Closed ${resource.name}`);
    } catch (error) {
      clean = false;
      logger.error(`Failed to close ${resource.name}`, { error: toError(error).message });
    }
  }

  return clean;
}
