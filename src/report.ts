import { monthLabel } from './timestamp';
import { CategorySummary, SummaryPeriod, SummaryReport } from './types';

export interface RenderOptions {
  currency: string;
  barLength?: number;
}

const DEFAULT_BAR_LENGTH = 30;
const CATEGORY_WIDTH = 12;

function money(amount: number, currency: string): string {
  return `${currency}${amount.toFixed(2)}`;
}

function periodHeader(period: SummaryPeriod): string[] {
  if (period.month === undefined || period.year === undefined) return [];
  return [`Summary for: ${monthLabel(period.month)} ${period.year}`];
}

export function utilizationBar(row: CategorySummary, length: number = DEFAULT_BAR_LENGTH): string {
  if (row.overBudget) return '█'.repeat(length);
  const filled = Math.floor(length * row.indicator);
  return '█'.repeat(filled) + '-'.repeat(length - filled);
}

function categoryLine(row: CategorySummary, currency: string, barLength: number): string {
  const spent = `${currency}${row.spent.toFixed(2).padStart(8)}`;
  const percent = `${(row.utilization * 100).toFixed(1)}%`;
  const flag = row.overBudget ? ' OVER BUDGET' : '';
  return `  ${row.category.padEnd(CATEGORY_WIDTH)} | ${spent}/${money(row.budget, currency)} | ${utilizationBar(row, barLength)} ${percent}${flag}`;
}

export function renderSummary(report: SummaryReport, options: RenderOptions): string[] {
  const { currency } = options;
  const barLength = options.barLength ?? DEFAULT_BAR_LENGTH;

  const lines = [
    ...periodHeader(report.period),
    '--- Category Breakdown vs. Budget ---',
    ...report.categories.map(row => categoryLine(row, currency, barLength)),
    '-----------------------------',
    `Total Budget: ${money(report.totalBudget, currency)}`,
    `Total Spent:  ${money(report.totalSpent, currency)}`,
    `Initial Savings Goal: ${money(report.initialSavingsGoal, currency)}`
  ];

  if (report.savingsWithdrawn > 0) {
    lines.push(`Money Used from Savings: ${money(report.savingsWithdrawn, currency)}`);
  }
  lines.push(`Adjusted Savings Goal: ${money(report.adjustedSavingsGoal, currency)}`);
  lines.push(`Spending Left (Excl. Savings): ${money(report.remainingSpendingBudget, currency)}`);

  if (report.dailyLimit) {
    const { remainingDays, dailyBudget } = report.dailyLimit;
    lines.push(`Daily Spending Limit (Days Left: ${remainingDays}): ${money(dailyBudget, currency)}`);
  }

  return lines;
}

export function renderNoData(period: SummaryPeriod): string[] {
  return [...periodHeader(period), 'No expenses found for this period.'];
}
