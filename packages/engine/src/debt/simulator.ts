import Decimal from 'decimal.js';
import type {
  DebtRecord,
  DebtMonthState,
  MonthlySnapshot,
  PayoffSimulationResult,
  SimulationOptions,
  TimeToDebtFreeResult,
} from './types.js';
import { InvalidBudgetError, InvalidDebtError, InvalidMinimumPaymentError, InvalidOptionError } from '../errors.js';
import { monthlyRate } from '../math/money.js';
import { orderDebts } from './orderer.js';
import { recommendStrategy } from './advisor.js';

export const DEFAULT_PAID_OFF_THRESHOLD = 0.1;
export const DEFAULT_MAX_MONTHS = 600;

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

interface WorkingDebt {
  id: string;
  name: string;
  balance: Decimal;
  monthlyRate: Decimal;
  minimumPayment: Decimal;
}

function advanceMonth(dateStr: string): string {
  const [y, m] = dateStr.split('-').map(Number);
  const nextMonth = m + 1;
  if (nextMonth > 12) {
    return `${y + 1}-01`;
  }
  return `${y}-${String(nextMonth).padStart(2, '0')}`;
}

function getCurrentMonth(): string {
  const now = new Date();
  return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}`;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/** Numeric checks only; a zero minimum on an open debt passes. */
export function validateDebtFields(debts: readonly DebtRecord[]): void {
  for (const debt of debts) {
    if (!isNonNegative(debt.balance)) throw new InvalidDebtError(debt.id, 'balance');
    if (!isNonNegative(debt.annualInterestRatePercent)) {
      throw new InvalidDebtError(debt.id, 'annualInterestRatePercent');
    }
    if (!isNonNegative(debt.minimumPayment)) throw new InvalidDebtError(debt.id, 'minimumPayment');
  }
}

export function validatePortfolio(debts: readonly DebtRecord[], monthlyBudget?: number): void {
  if (monthlyBudget !== undefined && !isNonNegative(monthlyBudget)) {
    throw new InvalidBudgetError(monthlyBudget);
  }
  validateDebtFields(debts);
  for (const debt of debts) {
    if (debt.balance > 0 && debt.minimumPayment <= 0) {
      throw new InvalidMinimumPaymentError(debt.id);
    }
  }
}

export function validateOptions(options: SimulationOptions): void {
  const { maxMonths, paidOffThreshold, startDate } = options;
  if (maxMonths !== undefined && !(Number.isSafeInteger(maxMonths) && maxMonths > 0)) {
    throw new InvalidOptionError('maxMonths', maxMonths, 'a positive integer');
  }
  if (paidOffThreshold !== undefined && !isNonNegative(paidOffThreshold)) {
    throw new InvalidOptionError('paidOffThreshold', paidOffThreshold, 'a finite, non-negative amount');
  }
  if (startDate !== undefined && !MONTH_PATTERN.test(startDate)) {
    throw new InvalidOptionError('startDate', startDate, 'a YYYY-MM month');
  }
}

/**
 * Interest if every debt were paid on its own at its minimum, with no reordering
 * or extra money: balance × monthly rate × ceil(balance / minimum), summed.
 */
function baselineInterest(debts: readonly DebtRecord[]): Decimal {
  let total = new Decimal(0);
  for (const debt of debts) {
    const months = new Decimal(debt.balance).div(debt.minimumPayment).ceil();
    total = total.plus(new Decimal(debt.balance).times(monthlyRate(debt.annualInterestRatePercent)).times(months));
  }
  return total;
}

/**
 * Month-by-month payoff of `debts` in the order given (or in `options.strategy`
 * order). Each month interest accrues, every debt gets its minimum, and whatever
 * the budget has left over the remaining minimums goes to the first debt still open.
 */
export function simulatePayoff(
  debts: readonly DebtRecord[],
  monthlyBudget: number,
  options: SimulationOptions = {},
): PayoffSimulationResult {
  validatePortfolio(debts, monthlyBudget);
  validateOptions(options);

  const threshold = options.paidOffThreshold ?? DEFAULT_PAID_OFF_THRESHOLD;
  const maxMonths = options.maxMonths ?? DEFAULT_MAX_MONTHS;
  const ordered = options.strategy ? orderDebts(debts, options.strategy) : debts;
  const open = ordered.filter((d) => d.balance > 0);

  const baseline = baselineInterest(open);
  const budget = new Decimal(monthlyBudget);

  // Working copy; the caller's records are never touched
  let working: WorkingDebt[] = open.map((d) => ({
    id: d.id,
    name: d.name ?? d.id,
    balance: new Decimal(d.balance),
    monthlyRate: monthlyRate(d.annualInterestRatePercent),
    minimumPayment: new Decimal(d.minimumPayment),
  }));

  let monthCounter = 0;
  let currentDate = options.startDate ?? getCurrentMonth();
  let totalInterest = new Decimal(0);
  let totalPaid = new Decimal(0);
  const schedule: MonthlySnapshot[] = [];
  const payoffOrder: string[] = [];

  while (working.length > 0 && monthCounter < maxMonths) {
    monthCounter++;
    currentDate = advanceMonth(currentDate);

    const startBalances = working.map((d) => d.balance);
    const interests: Decimal[] = [];
    const payments: Decimal[] = [];

    // a. Accrue interest
    for (const debt of working) {
      const interest = debt.balance.times(debt.monthlyRate);
      debt.balance = debt.balance.plus(interest);
      totalInterest = totalInterest.plus(interest);
      interests.push(interest);
    }

    // b. Minimums, capped at what is owed
    for (const debt of working) {
      const payment = Decimal.min(debt.balance, debt.minimumPayment);
      debt.balance = debt.balance.minus(payment);
      payments.push(payment);
    }

    // c. Leftover budget goes to the top-priority debt
    const minimumsDue = working.reduce((sum, d) => sum.plus(d.minimumPayment), new Decimal(0));
    const extra = Decimal.max(0, budget.minus(minimumsDue));
    if (extra.greaterThan(0)) {
      const target = working[0];
      const applied = Decimal.min(target.balance, extra);
      target.balance = target.balance.minus(applied);
      payments[0] = payments[0].plus(applied);
    }

    // d. Drop debts within the paid-off threshold
    const debtStates: DebtMonthState[] = working.map((debt, i) => ({
      debtId: debt.id,
      name: debt.name,
      startBalance: startBalances[i].toNumber(),
      interest: interests[i].toNumber(),
      payment: payments[i].toNumber(),
      endBalance: debt.balance.toNumber(),
      isPaidOff: debt.balance.lessThanOrEqualTo(threshold),
    }));

    for (const state of debtStates) {
      if (state.isPaidOff) payoffOrder.push(state.debtId);
    }
    working = working.filter((d) => d.balance.greaterThan(threshold));

    const monthPaid = payments.reduce((sum, p) => sum.plus(p), new Decimal(0));
    totalPaid = totalPaid.plus(monthPaid);

    schedule.push({
      month: monthCounter,
      date: currentDate,
      debtStates,
      totalPaid: monthPaid.toNumber(),
      totalRemaining: working.reduce((sum, d) => sum.plus(d.balance), new Decimal(0)).toNumber(),
    });
  }

  return {
    monthsToPayoff: monthCounter,
    interestSaved: baseline.minus(totalInterest).toNumber(),
    totalInterestPaid: totalInterest.toNumber(),
    baselineInterest: baseline.toNumber(),
    totalPaid: totalPaid.toNumber(),
    capped: working.length > 0,
    debtFreeDate: currentDate,
    payoffOrder,
    schedule,
  };
}

/**
 * Time to debt-free under the portfolio's own recommended strategy. Any order the
 * caller gave is ignored: the advisor picks the strategy and the debts are re-sorted.
 */
export function calculateTimeToDebtFree(
  debts: readonly DebtRecord[],
  monthlyBudget: number,
  options: Omit<SimulationOptions, 'strategy'> = {},
): TimeToDebtFreeResult {
  const strategy = recommendStrategy(debts);
  const result = simulatePayoff(orderDebts(debts, strategy), monthlyBudget, options);
  return { ...result, strategy };
}
