import type { Transaction } from './records/transaction';
import type { NullTime } from './scalars/nullable';

/**
 * Comparator ordering records by a timestamp, oldest first.
 *
 * Both timestamps must be set. Unset ones are not checked and compare as the
 * epoch, so filter or default them before sorting.
 */
export function byTimestamp<T>(pick: (record: T) => NullTime): (a: T, b: T) => number {
  return (a, b) => pick(a).value.getTime() - pick(b).value.getTime();
}

export const compareTransactions = byTimestamp<Transaction>((t) => t.createdAt);

/** Sorted copy; transactions created at the same instant keep their order. */
export function sortTransactions(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort(compareTransactions);
}
