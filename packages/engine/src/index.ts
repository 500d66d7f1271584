export { monthlyRate, monthlyInterest, amortizedPayment } from './math/money.js';

export {
  EngineError,
  InvalidMinimumPaymentError,
  InvalidDebtError,
  InvalidBudgetError,
  InvalidOptionError,
} from './errors.js';

export type {
  DebtRecord,
  PayoffStrategy,
  RankedStrategy,
  StrategyInfo,
  SimulationOptions,
  SimulationResult,
  PayoffSimulationResult,
  TimeToDebtFreeResult,
  MonthlySnapshot,
  DebtMonthState,
  StrategyOutcome,
  StrategyComparison,
  PortfolioSummary,
} from './debt/types.js';
export { ALL_STRATEGIES, RANKED_STRATEGIES, describeStrategy } from './debt/strategies.js';
export { recommendStrategy } from './debt/advisor.js';
export { orderDebts } from './debt/orderer.js';
export {
  simulatePayoff,
  calculateTimeToDebtFree,
  validatePortfolio,
  validateDebtFields,
  validateOptions,
  DEFAULT_MAX_MONTHS,
  DEFAULT_PAID_OFF_THRESHOLD,
} from './debt/simulator.js';
export { compareStrategies, summarizePortfolio, suggestMonthlyPayment } from './debt/analyzer.js';
