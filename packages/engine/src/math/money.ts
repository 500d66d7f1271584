import Decimal from 'decimal.js';

export function monthlyRate(annualInterestRatePercent: number): Decimal {
  return new Decimal(annualInterestRatePercent).div(100).div(12);
}

export function monthlyInterest(balance: number, annualInterestRatePercent: number): number {
  return new Decimal(balance).times(monthlyRate(annualInterestRatePercent)).toNumber();
}

/**
 * Level payment that clears `principal` in `months` at `annualInterestRatePercent`:
 * r·PV / (1 − (1 + r)^−n), or PV / n when the rate is zero.
 */
export function amortizedPayment(principal: number, annualInterestRatePercent: number, months: number): number {
  if (months <= 0) return principal;
  const rate = monthlyRate(annualInterestRatePercent);
  if (rate.isZero()) {
    return new Decimal(principal).div(months).toNumber();
  }
  const discount = new Decimal(1).minus(rate.plus(1).pow(-months));
  return rate.times(principal).div(discount).toNumber();
}
