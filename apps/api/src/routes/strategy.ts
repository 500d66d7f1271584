import { Hono } from 'hono';
import { z } from 'zod';
import { createId } from '@paralleldrive/cuid2';
import {
  type DebtRecord,
  describeStrategy,
  recommendStrategy,
  orderDebts,
  simulatePayoff,
  compareStrategies,
  summarizePortfolio,
  suggestMonthlyPayment,
} from '@debt-planner/engine';
import { validationError } from '../errors.js';

const MAX_DEBTS = 50;
const MAX_SIMULATED_MONTHS = 1200;

const strategySchema = z.enum([
  'snowball',
  'avalanche',
  'highest_balance',
  'lowest_balance',
  'highest_interest',
  'custom',
]);

const debtSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().optional(),
  balance: z.number().min(0),
  annualInterestRatePercent: z.number().min(0),
  minimumPayment: z.number().min(0),
});

const debtsSchema = z.array(debtSchema).max(MAX_DEBTS);
const startDateSchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/);

const recommendRequestSchema = z.object({
  debts: debtsSchema,
});

const orderRequestSchema = z.object({
  debts: debtsSchema,
  strategy: strategySchema,
});

const simulateRequestSchema = z.object({
  debts: debtsSchema,
  monthlyBudget: z.number().min(0),
  strategy: strategySchema.optional(),
  startDate: startDateSchema.optional(),
  maxMonths: z.number().int().positive().max(MAX_SIMULATED_MONTHS).optional(),
  paidOffThreshold: z.number().min(0).optional(),
});

const compareRequestSchema = z.object({
  debts: debtsSchema,
  monthlyBudget: z.number().min(0),
  startDate: startDateSchema.optional(),
});

const summaryRequestSchema = z.object({
  debts: debtsSchema,
  targetMonths: z.number().int().positive().max(MAX_SIMULATED_MONTHS).optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw validationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

function normalizeDebts(debts: z.infer<typeof debtsSchema>): DebtRecord[] {
  return debts.map((d) => ({
    ...d,
    id: d.id ?? createId(),
  }));
}

export function strategyRoutes() {
  const router = new Hono();

  // POST /recommend
  router.post('/recommend', async (c) => {
    const data = parseBody(recommendRequestSchema, await c.req.json());
    return c.json(describeStrategy(recommendStrategy(normalizeDebts(data.debts))));
  });

  // POST /order
  router.post('/order', async (c) => {
    const data = parseBody(orderRequestSchema, await c.req.json());
    return c.json({
      strategy: data.strategy,
      debts: orderDebts(normalizeDebts(data.debts), data.strategy),
    });
  });

  // POST /simulate
  // no strategy given: the advisor picks one
  router.post('/simulate', async (c) => {
    const data = parseBody(simulateRequestSchema, await c.req.json());
    const debts = normalizeDebts(data.debts);
    const strategy = data.strategy ?? recommendStrategy(debts);

    const result = simulatePayoff(debts, data.monthlyBudget, {
      strategy,
      startDate: data.startDate,
      maxMonths: data.maxMonths,
      paidOffThreshold: data.paidOffThreshold,
    });

    return c.json({ ...describeStrategy(strategy), ...result });
  });

  // POST /compare
  router.post('/compare', async (c) => {
    const data = parseBody(compareRequestSchema, await c.req.json());
    return c.json(compareStrategies(normalizeDebts(data.debts), data.monthlyBudget, { startDate: data.startDate }));
  });

  // POST /summary
  router.post('/summary', async (c) => {
    const data = parseBody(summaryRequestSchema, await c.req.json());
    const debts = normalizeDebts(data.debts);

    return c.json({
      ...summarizePortfolio(debts),
      suggestedMonthlyPayment: suggestMonthlyPayment(debts, data.targetMonths),
      recommended: recommendStrategy(debts),
    });
  });

  return router;
}
