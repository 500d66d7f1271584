import type { PayoffStrategy, RankedStrategy, StrategyInfo } from './types.js';

const STRATEGY_LABELS: Record<PayoffStrategy, string> = {
  snowball: 'Snowball',
  avalanche: 'Avalanche',
  highest_balance: 'Highest balance first',
  lowest_balance: 'Lowest balance first',
  highest_interest: 'Highest interest first',
  custom: 'Custom order',
};

const STRATEGY_DESCRIPTIONS: Record<PayoffStrategy, string> = {
  snowball: 'Minimums everywhere, extra to the smallest balance. Quick wins keep you going.',
  avalanche: 'Minimums everywhere, extra to the highest rate. Lowest interest over time.',
  highest_balance: 'Largest balance first. Clears the biggest debt early.',
  lowest_balance: 'Smallest balance first, rates ignored.',
  highest_interest: 'Highest rate first, balances ignored.',
  custom: 'Your own order. Debts are paid in the order given.',
};

export const ALL_STRATEGIES: readonly PayoffStrategy[] = [
  'snowball',
  'avalanche',
  'highest_balance',
  'lowest_balance',
  'highest_interest',
  'custom',
];

export const RANKED_STRATEGIES: readonly RankedStrategy[] = [
  'snowball',
  'avalanche',
  'highest_balance',
  'lowest_balance',
  'highest_interest',
];

export function describeStrategy(strategy: PayoffStrategy): StrategyInfo {
  return {
    strategy,
    label: STRATEGY_LABELS[strategy],
    description: STRATEGY_DESCRIPTIONS[strategy],
  };
}
