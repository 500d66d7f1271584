import Decimal from 'decimal.js';
import type { DebtRecord, PayoffStrategy } from './types.js';

const HIGH_RATE_PERCENT = 15;
const LARGE_PORTFOLIO_BALANCE = 10000;
const SMALL_DEBT_BALANCE = 1000;
const SMALL_DEBT_MIN_COUNT = 3;
const DOMINANT_SHARE = 0.5;
const HIGH_AVERAGE_RATE_PERCENT = 10;

/**
 * Picks a strategy from the shape of the portfolio. Rules are checked in order,
 * first match wins. Every predicate is an aggregate, so input order never matters.
 */
export function recommendStrategy(debts: readonly DebtRecord[]): PayoffStrategy {
  if (debts.length === 0) return 'snowball';

  const totalBalance = debts.reduce((sum, d) => sum.plus(d.balance), new Decimal(0));
  const averageRate = debts
    .reduce((sum, d) => sum.plus(d.annualInterestRatePercent), new Decimal(0))
    .div(debts.length);

  const hasHighRateDebt = debts.some((d) => d.annualInterestRatePercent > HIGH_RATE_PERCENT);
  const hasSmallDebt = debts.some((d) => d.balance < SMALL_DEBT_BALANCE);
  const dominantThreshold = totalBalance.times(DOMINANT_SHARE);
  const hasDominantDebt = debts.some((d) => dominantThreshold.lessThan(d.balance));

  if (hasHighRateDebt && totalBalance.greaterThan(LARGE_PORTFOLIO_BALANCE)) {
    return 'avalanche';
  }
  if (hasSmallDebt && debts.length >= SMALL_DEBT_MIN_COUNT) {
    return 'snowball';
  }
  if (hasDominantDebt) {
    return 'highest_balance';
  }
  if (averageRate.greaterThan(HIGH_AVERAGE_RATE_PERCENT)) {
    return 'highest_interest';
  }
  return 'snowball';
}
