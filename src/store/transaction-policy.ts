import type { TransactionPolicy } from '../types/proposal.types';
import type { ProposalStore } from './proposal-store';

export interface PolicyRunOptions<T> {
  /** Called for every item a BEST_EFFORT run skips. */
  onSkip?: (item: T, error: unknown) => void;
}

/**
 * Apply `work` to every item inside one transaction.
 *
 * ALL_OR_NOTHING: the first failure rolls back every item and is rethrown.
 * BEST_EFFORT: each item runs in its own savepoint; a failing item is rolled
 * back and skipped, the rest still commit. Results keep input order and only
 * contain the items that succeeded.
 */
export async function runWithPolicy<T, R>(
  store: ProposalStore,
  policy: TransactionPolicy,
  items: readonly T[],
  work: (store: ProposalStore, item: T) => Promise<R>,
  options: PolicyRunOptions<T> = {},
): Promise<R[]> {
  return store.transaction(async tx => {
    const results: R[] = [];
    for (const item of items) {
      if (policy === 'ALL_OR_NOTHING') {
        results.push(await work(tx, item));
        continue;
      }
      try {
        results.push(await tx.transaction(savepoint => work(savepoint, item)));
      } catch (error) {
        options.onSkip?.(item, error);
      }
    }
    return results;
  });
}
