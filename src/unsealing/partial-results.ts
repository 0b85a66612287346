import type { Logger } from '@nestjs/common';
import type { ListResult, PartialResult } from '../entities/list-result.interface';
import { getErrorMessage } from '../shared/error.utils';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Unseal each record independently. A record that fails is degraded to its partial form
 * and reported alongside the records that succeeded.
 */
export function unsealList<S, U, P>(
  sealedItems: S[],
  unseal: (sealed: S) => U,
  toPartial: (sealed: S) => P,
  logger: Logger,
): ListResult<U, P> {
  const items: U[] = [];
  const failed: PartialResult<P>[] = [];

  for (const sealed of sealedItems) {
    try {
      items.push(unseal(sealed));
    } catch (error) {
      logger.warn(`Returning partial record: ${getErrorMessage(error)}`);
      failed.push({ partial: toPartial(sealed), cause: toError(error) });
    }
  }

  if (failed.length === 0) {
    return { status: 'success', items };
  }
  return { status: 'partial', items, failed };
}
