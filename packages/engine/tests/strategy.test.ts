import { describe, it, expect } from 'vitest';
import { recommendStrategy } from '../src/debt/advisor.js';
import { orderDebts } from '../src/debt/orderer.js';
import { ALL_STRATEGIES, describeStrategy } from '../src/debt/strategies.js';
import type { DebtRecord } from '../src/debt/types.js';

function debt(id: string, balance: number, annualInterestRatePercent: number, minimumPayment = 50): DebtRecord {
  return { id, balance, annualInterestRatePercent, minimumPayment };
}

describe('recommendStrategy', () => {
  it('defaults to snowball for an empty portfolio', () => {
    expect(recommendStrategy([])).toBe('snowball');
  });

  it('recommends avalanche for a high-rate debt in a portfolio over 10000', () => {
    expect(recommendStrategy([debt('a', 5000, 18), debt('b', 6000, 5)])).toBe('avalanche');
  });

  it('checks the avalanche rule before the small-debt rule', () => {
    expect(recommendStrategy([debt('a', 500, 20), debt('b', 6000, 5), debt('c', 5000, 5)])).toBe('avalanche');
  });

  it('does not treat exactly 15% as a high rate', () => {
    expect(recommendStrategy([debt('a', 6000, 15), debt('b', 6000, 15)])).toBe('highest_interest');
  });

  it('recommends snowball for three or more debts with a small one', () => {
    expect(recommendStrategy([debt('a', 500, 25), debt('b', 2000, 5), debt('c', 3000, 5)])).toBe('snowball');
  });

  it('needs at least three debts for the small-debt rule', () => {
    // falls through to the next rule: 2000 is over half of 2500
    expect(recommendStrategy([debt('a', 500, 20), debt('b', 2000, 20)])).toBe('highest_balance');
  });

  it('recommends highest balance when one debt is over half the total', () => {
    expect(recommendStrategy([debt('a', 8000, 5), debt('b', 2000, 5)])).toBe('highest_balance');
  });

  it('does not treat exactly half the total as dominant', () => {
    expect(recommendStrategy([debt('a', 5000, 12), debt('b', 5000, 12)])).toBe('highest_interest');
  });

  it('recommends highest interest when the mean rate is above 10%', () => {
    expect(recommendStrategy([debt('a', 3000, 12), debt('b', 3000, 9)])).toBe('highest_interest');
  });

  it('falls back to snowball', () => {
    expect(recommendStrategy([debt('a', 3000, 5), debt('b', 3000, 6)])).toBe('snowball');
  });

  it('ignores the order of the portfolio', () => {
    const debts = [debt('a', 500, 25), debt('b', 2000, 5), debt('c', 3000, 5), debt('d', 9000, 3)];
    const reversed = [...debts].reverse();

    expect(recommendStrategy(reversed)).toBe(recommendStrategy(debts));
  });
});

describe('orderDebts', () => {
  const portfolio: DebtRecord[] = [
    debt('car', 9000, 6.5),
    debt('card', 1200, 22.9),
    debt('medical', 400, 0),
    debt('store', 1200, 26.5),
    debt('personal', 4000, 11),
  ];

  it('orders snowball and lowest balance smallest first, keeping ties in input order', () => {
    const expected = ['medical', 'card', 'store', 'personal', 'car'];

    expect(orderDebts(portfolio, 'snowball').map((d) => d.id)).toEqual(expected);
    expect(orderDebts(portfolio, 'lowest_balance').map((d) => d.id)).toEqual(expected);
  });

  it('orders avalanche and highest interest by rate, highest first', () => {
    const expected = ['store', 'card', 'personal', 'car', 'medical'];

    expect(orderDebts(portfolio, 'avalanche').map((d) => d.id)).toEqual(expected);
    expect(orderDebts(portfolio, 'highest_interest').map((d) => d.id)).toEqual(expected);
  });

  it('orders highest balance largest first', () => {
    expect(orderDebts(portfolio, 'highest_balance').map((d) => d.id)).toEqual([
      'car',
      'personal',
      'card',
      'store',
      'medical',
    ]);
  });

  it('keeps the caller order for custom', () => {
    const ordered = orderDebts(portfolio, 'custom');

    expect(ordered.map((d) => d.id)).toEqual(portfolio.map((d) => d.id));
    expect(ordered).not.toBe(portfolio);
  });

  it('returns a permutation of the same records without touching the input', () => {
    const before = portfolio.map((d) => d.id);

    for (const strategy of ALL_STRATEGIES) {
      const ordered = orderDebts(portfolio, strategy);
      expect([...ordered.map((d) => d.id)].sort()).toEqual([...before].sort());
      for (const record of ordered) {
        expect(portfolio).toContain(record);
      }
    }
    expect(portfolio.map((d) => d.id)).toEqual(before);
  });

  it('yields non-decreasing balances for snowball and non-increasing rates for avalanche', () => {
    const snowball = orderDebts(portfolio, 'snowball');
    const avalanche = orderDebts(portfolio, 'avalanche');

    for (let i = 1; i < portfolio.length; i++) {
      expect(snowball[i].balance).toBeGreaterThanOrEqual(snowball[i - 1].balance);
      expect(avalanche[i].annualInterestRatePercent).toBeLessThanOrEqual(avalanche[i - 1].annualInterestRatePercent);
    }
  });

  it('returns an empty list for an empty portfolio', () => {
    expect(orderDebts([], 'avalanche')).toEqual([]);
  });
});

describe('describeStrategy', () => {
  it('labels every strategy', () => {
    for (const strategy of ALL_STRATEGIES) {
      const info = describeStrategy(strategy);
      expect(info.strategy).toBe(strategy);
      expect(info.label.length).toBeGreaterThan(0);
      expect(info.description.length).toBeGreaterThan(0);
    }
    expect(describeStrategy('avalanche').label).toBe('Avalanche');
  });
});
