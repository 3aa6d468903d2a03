// Expense types
export interface ExpenseRecord {
  name: string;
  amount: number; // Decimal with 2-digit precision (e.g. 150.50)
  category: string; // Opaque label, not checked on load
  timestamp: string; // YYYY-MM-DD HH:MM:SS, local time
}

export interface CreateExpenseInput {
  name: string;
  amount: number;
  category: string;
  timestamp?: string; // Defaults to the time the record is created
}

export interface SavingsUseInput {
  amount: number;
  reason?: string;
}

export interface BudgetInput {
  totalIncome: number;
  savingsGoal: number;
}

// Ordered core spending labels plus the two reserved labels
export interface CategorySet {
  readonly core: readonly string[];
  readonly savings: string;
  readonly savingsUse: string;
}

export interface Allocation {
  totalIncome: number;
  savingsGoal: number;
  spendingRemainder: number;
  perCategory: number;
}

export interface SummaryPeriod {
  month?: number; // 1-12
  year?: number;
}

export interface CategorySummary {
  category: string;
  spent: number;
  budget: number;
  remaining: number; // Negative when overspent
  utilization: number; // spent / budget, 0 when budget is 0
  indicator: number; // Bar fill in [0, 1]
  overBudget: boolean;
}

export interface DailyLimit {
  remainingDays: number; // Includes today
  dailyBudget: number;
}

export interface SummaryReport {
  period: SummaryPeriod;
  recordCount: number;
  categories: CategorySummary[];
  totalBudget: number;
  totalSpent: number; // Excludes savings withdrawals
  savingsWithdrawn: number;
  initialSavingsGoal: number;
  adjustedSavingsGoal: number; // May go negative
  totalSpendingBudget: number;
  remainingSpendingBudget: number;
  dailyLimit: DailyLimit | null; // Only for the live month
}

export type Selection =
  | { kind: 'cancel' }
  | { kind: 'position'; position: number };

export type DeleteResult =
  | { status: 'deleted'; record: ExpenseRecord; remaining: number }
  | { status: 'cancelled' }
  | { status: 'invalid'; message: string }
  | { status: 'empty' };

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface ApiError {
  error: string;
  details?: string[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
