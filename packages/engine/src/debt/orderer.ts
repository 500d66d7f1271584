import type { DebtRecord, PayoffStrategy } from './types.js';

type DebtComparator = (a: DebtRecord, b: DebtRecord) => number;

const byBalanceAsc: DebtComparator = (a, b) => a.balance - b.balance;
const byBalanceDesc: DebtComparator = (a, b) => b.balance - a.balance;
const byRateDesc: DebtComparator = (a, b) => b.annualInterestRatePercent - a.annualInterestRatePercent;

// null keeps the caller's order
const COMPARATORS: Record<PayoffStrategy, DebtComparator | null> = {
  snowball: byBalanceAsc,
  lowest_balance: byBalanceAsc,
  avalanche: byRateDesc,
  highest_interest: byRateDesc,
  highest_balance: byBalanceDesc,
  custom: null,
};

/**
 * Returns a new array with the same debt records in payoff priority order.
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export function orderDebts(debts: readonly DebtRecord[], strategy: PayoffStrategy): DebtRecord[] {
  const ordered = [...debts];
  const comparator = COMPARATORS[strategy];
  if (comparator) {
    ordered.sort(comparator);
  }
  return ordered;
}
