import { allocate, BudgetMapping, describeAllocation } from './budget';
import { ExpenseStore } from './expenseStore';
import { summarize as buildSummary } from './summary';
import { formatTimestamp } from './timestamp';
import {
  Allocation,
  BudgetInput,
  CategorySet,
  CreateExpenseInput,
  DeleteResult,
  ExpenseRecord,
  SavingsUseInput,
  Selection,
  SummaryPeriod,
  SummaryReport
} from './types';

export type PeriodRequest = 'current' | 'all' | SummaryPeriod;

export type SummaryOutcome =
  | { status: 'no-budget' }
  | { status: 'no-data'; period: SummaryPeriod }
  | { status: 'ok'; report: SummaryReport };

export interface TrackerOptions {
  store: ExpenseStore;
  categories: CategorySet;
  clock?: () => Date;
}

export interface Tracker {
  readonly categories: CategorySet;
  getBudget(): BudgetMapping | null;
  setBudget(input: BudgetInput): { allocation: Allocation; budget: BudgetMapping };
  addExpense(input: CreateExpenseInput): ExpenseRecord;
  recordSavingsUse(input: SavingsUseInput): ExpenseRecord;
  listExpenses(): ExpenseRecord[];
  deleteExpense(selection: Selection): DeleteResult;
  summarize(request: PeriodRequest): SummaryOutcome;
}

/**
 * One tracking session. The budget lives only in memory and has to be set
 * again after a restart; expenses live in the store.
 */
export function createTracker(options: TrackerOptions): Tracker {
  const { store, categories } = options;
  const clock = options.clock ?? (() => new Date());
  let budget: BudgetMapping | null = null;

  function resolvePeriod(request: PeriodRequest, now: Date): SummaryPeriod {
    if (request === 'all') return {};
    if (request === 'current') return { month: now.getMonth() + 1, year: now.getFullYear() };
    return request;
  }

  return {
    categories,

    getBudget() {
      return budget;
    },

    setBudget(input) {
      const allocation = describeAllocation(input.totalIncome, input.savingsGoal, categories);
      budget = allocate(input.totalIncome, input.savingsGoal, categories);
      return { allocation, budget };
    },

    addExpense(input) {
      const record: ExpenseRecord = {
        name: input.name,
        amount: input.amount,
        category: input.category,
        timestamp: input.timestamp || formatTimestamp(clock())
      };
      store.append(record);
      return record;
    },

    recordSavingsUse(input) {
      const record: ExpenseRecord = {
        name: `Used for: ${input.reason ?? ''}`,
        amount: input.amount,
        category: categories.savingsUse,
        timestamp: formatTimestamp(clock())
      };
      store.append(record);
      return record;
    },

    listExpenses() {
      return store.load();
    },

    deleteExpense(selection) {
      return store.deleteAt(selection);
    },

    summarize(request) {
      if (!budget) {
        return { status: 'no-budget' };
      }

      const now = clock();
      const period = resolvePeriod(request, now);
      const report = buildSummary(store.load(), budget, { ...period, categories, now });

      return report ? { status: 'ok', report } : { status: 'no-data', period };
    }
  };
}
