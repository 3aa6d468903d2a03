import { BudgetMapping } from './budget';
import { daysInMonth, parseTimestamp } from './timestamp';
import { CategorySet, CategorySummary, DailyLimit, ExpenseRecord, SummaryPeriod, SummaryReport } from './types';

export interface SummarizeOptions extends SummaryPeriod {
  categories: CategorySet;
  now: Date;
}

// Amounts carry 2 decimals; sums run in hundredths so they stay exact
function toMinor(amount: number): number {
  return Math.round(amount * 100);
}

function fromMinor(minor: number): number {
  return minor / 100;
}

export function filterByPeriod(records: readonly ExpenseRecord[], period: SummaryPeriod): ExpenseRecord[] {
  return records.filter(record => {
    const parts = parseTimestamp(record.timestamp);
    if (!parts) return false;

    const monthMatch = period.month === undefined || parts.month === period.month;
    const yearMatch = period.year === undefined || parts.year === period.year;
    return monthMatch && yearMatch;
  });
}

export function isCurrentPeriod(period: SummaryPeriod, now: Date): boolean {
  return period.month === now.getMonth() + 1 && period.year === now.getFullYear();
}

/**
 * Spending limit per remaining day, today included. On a day count of 0 the
 * whole remaining budget is returned instead of dividing.
 */
export function dailyLimit(remainingSpendingBudget: number, now: Date): DailyLimit {
  const remainingDays = daysInMonth(now.getFullYear(), now.getMonth() + 1) - now.getDate() + 1;
  const dailyBudget = remainingDays > 0 ? remainingSpendingBudget / remainingDays : remainingSpendingBudget;
  return { remainingDays, dailyBudget };
}

function categoryRow(category: string, budget: number, spent: number): CategorySummary {
  const remaining = budget - spent;
  const utilization = budget > 0 ? spent / budget : 0;
  const overBudget = remaining < 0;

  return {
    category,
    spent,
    budget,
    remaining,
    utilization,
    indicator: overBudget ? 1 : Math.min(Math.max(utilization, 0), 1),
    overBudget
  };
}

/**
 * Budget-vs-actual report for the records in a period. Returns null when no
 * record falls in the period.
 *
 * Records are bucketed by budget category; the savings-use label feeds the
 * withdrawn total instead, and any other label is left out of both.
 */
export function summarize(
  records: readonly ExpenseRecord[],
  budget: BudgetMapping,
  options: SummarizeOptions
): SummaryReport | null {
  const { categories, now } = options;
  const period: SummaryPeriod = { month: options.month, year: options.year };

  const filtered = filterByPeriod(records, period);
  if (filtered.length === 0) {
    return null;
  }

  const spentMinor = new Map<string, number>();
  for (const [category] of budget.entries()) {
    spentMinor.set(category, 0);
  }
  let withdrawnMinor = 0;

  for (const record of filtered) {
    const current = spentMinor.get(record.category);
    if (current !== undefined) {
      spentMinor.set(record.category, current + toMinor(record.amount));
    } else if (record.category === categories.savingsUse) {
      withdrawnMinor += toMinor(record.amount);
    }
  }

  const rows = budget.entries().map(([category, amount]) =>
    categoryRow(category, amount, fromMinor(spentMinor.get(category) ?? 0))
  );

  const totalBudget = budget.total();
  let totalSpentMinor = 0;
  for (const minor of spentMinor.values()) totalSpentMinor += minor;
  const totalSpent = fromMinor(totalSpentMinor);
  const savingsWithdrawn = fromMinor(withdrawnMinor);

  const initialSavingsGoal = budget.get(categories.savings) ?? 0;
  const adjustedSavingsGoal = initialSavingsGoal - savingsWithdrawn;

  const totalSpendingBudget = totalBudget - initialSavingsGoal;
  const remainingSpendingBudget = totalSpendingBudget - totalSpent;

  return {
    period,
    recordCount: filtered.length,
    categories: rows,
    totalBudget,
    totalSpent,
    savingsWithdrawn,
    initialSavingsGoal,
    adjustedSavingsGoal,
    totalSpendingBudget,
    remainingSpendingBudget,
    dailyLimit: isCurrentPeriod(period, now) ? dailyLimit(remainingSpendingBudget, now) : null
  };
}
