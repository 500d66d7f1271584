export interface DebtRecord {
  id: string;
  name?: string;
  balance: number;
  /** 18.99 means 18.99% per year */
  annualInterestRatePercent: number;
  minimumPayment: number;
}

export type PayoffStrategy =
  | 'snowball'
  | 'avalanche'
  | 'highest_balance'
  | 'lowest_balance'
  | 'highest_interest'
  | 'custom';

export type RankedStrategy = Exclude<PayoffStrategy, 'custom'>;

export interface StrategyInfo {
  strategy: PayoffStrategy;
  label: string;
  description: string;
}

export interface SimulationOptions {
  /** Order the debts by this strategy first. Omitted: simulate the order as given. */
  strategy?: PayoffStrategy;
  /** Balance at or below which a debt counts as paid. Defaults to 0.1. */
  paidOffThreshold?: number;
  /** Hard stop for non-converging runs. Defaults to 600 (50 years). */
  maxMonths?: number;
  /** YYYY-MM of the month before the first simulated payment. Defaults to the current month. */
  startDate?: string;
}

export interface DebtMonthState {
  debtId: string;
  name: string;
  startBalance: number;
  interest: number;
  payment: number;
  endBalance: number;
  isPaidOff: boolean;
}

export interface MonthlySnapshot {
  month: number;
  date: string;
  debtStates: DebtMonthState[];
  totalPaid: number;
  totalRemaining: number;
}

export interface SimulationResult {
  monthsToPayoff: number;
  interestSaved: number;
}

export interface PayoffSimulationResult extends SimulationResult {
  totalInterestPaid: number;
  baselineInterest: number;
  totalPaid: number;
  capped: boolean;
  debtFreeDate: string;
  payoffOrder: string[];
  schedule: MonthlySnapshot[];
}

export interface TimeToDebtFreeResult extends PayoffSimulationResult {
  strategy: PayoffStrategy;
}

export interface StrategyOutcome {
  strategy: RankedStrategy;
  label: string;
  description: string;
  result: PayoffSimulationResult;
}

export interface StrategyComparison {
  strategies: StrategyOutcome[];
  recommended: PayoffStrategy;
  fastest: RankedStrategy | null;
  interestSavedVsSlowest: number;
}

export interface PortfolioSummary {
  debtCount: number;
  totalBalance: number;
  totalMinimumPayment: number;
  averageInterestRatePercent: number;
  monthlyInterest: number;
}
