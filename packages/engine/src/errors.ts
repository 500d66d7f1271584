export class EngineError extends Error {
  constructor(
    public code: string,
    message: string,
    public debtId?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidMinimumPaymentError extends EngineError {
  constructor(debtId: string) {
    super(
      'INVALID_MINIMUM_PAYMENT',
      `Debt '${debtId}' has an outstanding balance but no positive minimum payment`,
      debtId,
    );
  }
}

export class InvalidDebtError extends EngineError {
  constructor(debtId: string, field: string) {
    super('INVALID_DEBT', `Debt '${debtId}' has an invalid ${field}: expected a finite, non-negative number`, debtId);
  }
}

export class InvalidBudgetError extends EngineError {
  constructor(monthlyBudget: number) {
    super('INVALID_BUDGET', `Monthly budget ${monthlyBudget} must be a finite, non-negative number`);
  }
}

export class InvalidOptionError extends EngineError {
  constructor(option: string, value: unknown, expected: string) {
    super('INVALID_OPTION', `Option ${option} = ${String(value)} is invalid: expected ${expected}`);
  }
}
