import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { budgetingGuide, recommendedSavingsGoal } from './budget';
import { renderNoData, renderSummary } from './report';
import { PeriodRequest, Tracker } from './tracker';
import { ApiError, BudgetInput, CreateExpenseInput, ExpenseRecord, SavingsUseInput } from './types';
import {
  parseSelection,
  passwordMatches,
  sanitizeExpenseInput,
  sanitizeSavingsUseInput,
  validateBudgetInput,
  validateExpenseInput,
  validatePeriod,
  validateSavingsUseInput
} from './validation';

export interface AppOptions {
  currency: string;
  password?: string;
}

const NO_BUDGET: ApiError = {
  error: 'Budget has not been set for this session',
  details: ['POST /budget with totalIncome and savingsGoal first']
};

function queryNumber(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'string' ? Number(value) : NaN;
}

function withPositions(records: ExpenseRecord[]) {
  return records.map((record, index) => ({ position: index + 1, ...record }));
}

function sendLines(res: Response, lines: string[]) {
  return res.type('text/plain').send(`${lines.join('\n')}\n`);
}

export function createApp(tracker: Tracker, options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Everything else sits behind the optional access password
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (passwordMatches(options.password, req.get('x-tracker-password'))) {
      return next();
    }
    const error: ApiError = { error: 'Access denied' };
    return res.status(401).json(error);
  });

  // GET /categories - Category labels in use
  app.get('/categories', (_req: Request, res: Response) => {
    return res.json(tracker.categories);
  });

  // GET /budget - Budget set for this session
  app.get('/budget', (_req: Request, res: Response) => {
    const budget = tracker.getBudget();
    if (!budget) {
      return res.status(404).json(NO_BUDGET);
    }
    return res.json(budget.toJSON());
  });

  // POST /budget - Allocate income between savings and the core categories
  app.post('/budget', (req: Request, res: Response) => {
    try {
      const validation = validateBudgetInput(req.body);
      if (!validation.valid) {
        const error: ApiError = { error: 'Validation failed', details: validation.errors };
        return res.status(400).json(error);
      }

      const input: BudgetInput = { totalIncome: req.body.totalIncome, savingsGoal: req.body.savingsGoal };
      const { allocation, budget } = tracker.setBudget(input);
      console.log(`Budget set: savings ${allocation.savingsGoal.toFixed(2)}, per category ${allocation.perCategory.toFixed(2)}`);

      return res.json({ allocation, budget: budget.toJSON() });
    } catch (error) {
      console.error('Error setting budget:', error);
      const apiError: ApiError = { error: 'Failed to set budget' };
      return res.status(500).json(apiError);
    }
  });

  // GET /budget/guide - How the budget is calculated
  app.get('/budget/guide', (req: Request, res: Response) => {
    const income = queryNumber(req.query.income);
    if (income !== undefined && !(Number.isFinite(income) && income > 0)) {
      const error: ApiError = { error: 'Validation failed', details: ['Income must be a number greater than 0'] };
      return res.status(400).json(error);
    }

    return res.json({
      guide: budgetingGuide(tracker.categories),
      recommendedSavingsGoal: income === undefined ? undefined : recommendedSavingsGoal(income)
    });
  });

  // GET /expenses - All stored expenses in file order
  app.get('/expenses', (_req: Request, res: Response) => {
    try {
      return res.json(withPositions(tracker.listExpenses()));
    } catch (error) {
      console.error('Error fetching expenses:', error);
      const apiError: ApiError = { error: 'Failed to fetch expenses' };
      return res.status(500).json(apiError);
    }
  });

  // POST /expenses - Record a new expense
  app.post('/expenses', (req: Request, res: Response) => {
    try {
      const validation = validateExpenseInput(req.body, tracker.categories);
      if (!validation.valid) {
        const error: ApiError = { error: 'Validation failed', details: validation.errors };
        return res.status(400).json(error);
      }

      const body: CreateExpenseInput = req.body;
      const record = tracker.addExpense(sanitizeExpenseInput(body));
      console.log(`Saved expense: ${record.name}`);

      return res.status(201).json(record);
    } catch (error) {
      console.error('Error saving expense:', error);
      const apiError: ApiError = { error: 'Failed to save expense' };
      return res.status(500).json(apiError);
    }
  });

  // DELETE /expenses/:selection - Delete by 1-based position, 'c' cancels
  app.delete('/expenses/:selection', (req: Request, res: Response) => {
    try {
      const selection = parseSelection(req.params.selection);
      if (!selection) {
        const error: ApiError = { error: 'Invalid selection', details: ["Enter a number or 'c' to cancel"] };
        return res.status(400).json(error);
      }

      const result = tracker.deleteExpense(selection);
      switch (result.status) {
        case 'empty':
          return res.status(404).json({ error: 'No expenses found to delete' });
        case 'cancelled':
          return res.json({ cancelled: true, message: 'Deletion cancelled' });
        case 'invalid':
          return res.status(400).json({ error: 'Invalid selection', details: [result.message] });
        case 'deleted':
          console.log(`Deleted expense: ${result.record.name}`);
          return res.json({ deleted: result.record, remaining: result.remaining });
      }
    } catch (error) {
      console.error('Error deleting expense:', error);
      const apiError: ApiError = { error: 'Failed to delete expense' };
      return res.status(500).json(apiError);
    }
  });

  // POST /savings-use - Record money taken out of savings
  app.post('/savings-use', (req: Request, res: Response) => {
    try {
      const validation = validateSavingsUseInput(req.body);
      if (!validation.valid) {
        const error: ApiError = { error: 'Validation failed', details: validation.errors };
        return res.status(400).json(error);
      }

      const body: SavingsUseInput = req.body;
      const record = tracker.recordSavingsUse(sanitizeSavingsUseInput(body));
      console.log(`Recorded savings use: ${record.amount.toFixed(2)}`);

      return res.status(201).json(record);
    } catch (error) {
      console.error('Error recording savings use:', error);
      const apiError: ApiError = { error: 'Failed to record savings use' };
      return res.status(500).json(apiError);
    }
  });

  // GET /summary - Budget vs actual (query: year, month, period=all, format=text)
  app.get('/summary', (req: Request, res: Response) => {
    try {
      let request: PeriodRequest;
      if (req.query.period === 'all') {
        request = 'all';
      } else {
        const period = { month: queryNumber(req.query.month), year: queryNumber(req.query.year) };
        const validation = validatePeriod(period);
        if (!validation.valid) {
          const error: ApiError = { error: 'Invalid year or month', details: validation.errors };
          return res.status(400).json(error);
        }
        request = period.month === undefined && period.year === undefined ? 'current' : period;
      }

      const asText = req.query.format === 'text';
      const outcome = tracker.summarize(request);

      switch (outcome.status) {
        case 'no-budget':
          return res.status(409).json(NO_BUDGET);
        case 'no-data':
          if (asText) return sendLines(res, renderNoData(outcome.period));
          return res.json({ period: outcome.period, report: null, message: 'No expenses found for this period.' });
        case 'ok':
          if (asText) return sendLines(res, renderSummary(outcome.report, { currency: options.currency }));
          return res.json({ period: outcome.report.period, report: outcome.report });
      }
    } catch (error) {
      console.error('Error building summary:', error);
      const apiError: ApiError = { error: 'Failed to build summary' };
      return res.status(500).json(apiError);
    }
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Stop accepting connections and drop idle keep-alive sockets, which would
 * otherwise hold `close` open until clients hang up.
 */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close(error => (error ? reject(error) : resolve()));
  });
}
