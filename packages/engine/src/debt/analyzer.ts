import Decimal from 'decimal.js';
import type {
  DebtRecord,
  PortfolioSummary,
  SimulationOptions,
  StrategyComparison,
  StrategyOutcome,
} from './types.js';
import { simulatePayoff, validateDebtFields } from './simulator.js';
import { orderDebts } from './orderer.js';
import { recommendStrategy } from './advisor.js';
import { RANKED_STRATEGIES, describeStrategy } from './strategies.js';
import { amortizedPayment, monthlyInterest } from '../math/money.js';

const SUGGESTED_MINIMUM_MARKUP = 1.2;
const DEFAULT_TARGET_MONTHS = 36;

export function compareStrategies(
  debts: readonly DebtRecord[],
  monthlyBudget: number,
  options: Omit<SimulationOptions, 'strategy'> = {},
): StrategyComparison {
  const strategies: StrategyOutcome[] = RANKED_STRATEGIES.map((strategy) => {
    const { label, description } = describeStrategy(strategy);
    const result = simulatePayoff(orderDebts(debts, strategy), monthlyBudget, options);
    return { strategy, label, description, result };
  });

  // stable: equal months keep the enumeration order
  strategies.sort((a, b) => a.result.monthsToPayoff - b.result.monthsToPayoff);

  const fastest = strategies[0];
  const slowest = strategies[strategies.length - 1];

  return {
    strategies,
    recommended: recommendStrategy(debts),
    fastest: debts.length > 0 ? fastest.strategy : null,
    interestSavedVsSlowest: new Decimal(slowest.result.totalInterestPaid)
      .minus(fastest.result.totalInterestPaid)
      .toNumber(),
  };
}

export function summarizePortfolio(debts: readonly DebtRecord[]): PortfolioSummary {
  validateDebtFields(debts);

  if (debts.length === 0) {
    return {
      debtCount: 0,
      totalBalance: 0,
      totalMinimumPayment: 0,
      averageInterestRatePercent: 0,
      monthlyInterest: 0,
    };
  }

  let totalBalance = new Decimal(0);
  let totalMinimum = new Decimal(0);
  let totalRate = new Decimal(0);
  let interest = new Decimal(0);
  for (const debt of debts) {
    totalBalance = totalBalance.plus(debt.balance);
    totalMinimum = totalMinimum.plus(debt.minimumPayment);
    totalRate = totalRate.plus(debt.annualInterestRatePercent);
    interest = interest.plus(monthlyInterest(debt.balance, debt.annualInterestRatePercent));
  }

  return {
    debtCount: debts.length,
    totalBalance: totalBalance.toNumber(),
    totalMinimumPayment: totalMinimum.toNumber(),
    averageInterestRatePercent: totalRate.div(debts.length).toNumber(),
    monthlyInterest: interest.toNumber(),
  };
}

/**
 * A starting monthly budget: 20% over the combined minimums, or enough to clear
 * the total balance in `targetMonths` at the average rate, whichever is larger.
 */
export function suggestMonthlyPayment(debts: readonly DebtRecord[], targetMonths = DEFAULT_TARGET_MONTHS): number {
  const summary = summarizePortfolio(debts);
  if (summary.debtCount === 0) return 0;

  const markedUpMinimum = new Decimal(summary.totalMinimumPayment).times(SUGGESTED_MINIMUM_MARKUP).toNumber();
  const levelPayment = amortizedPayment(summary.totalBalance, summary.averageInterestRatePercent, targetMonths);

  return Math.max(markedUpMinimum, levelPayment);
}
