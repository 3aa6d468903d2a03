import { budgetCategories } from './categories';
import { ValidationError } from './errors';
import { Allocation, CategorySet } from './types';

const RECOMMENDED_SAVINGS_RATE = 0.2;

/**
 * Read-only, ordered budget per category. Only core labels and the savings
 * label may carry an entry, and every amount is a finite non-negative number.
 */
export class BudgetMapping {
  private readonly amounts: ReadonlyMap<string, number>;

  private constructor(amounts: Map<string, number>) {
    this.amounts = amounts;
  }

  static from(entries: Iterable<readonly [string, number]>, categories: CategorySet): BudgetMapping {
    const allowed = new Set(budgetCategories(categories));
    const amounts = new Map<string, number>();
    const errors: string[] = [];

    for (const [category, amount] of entries) {
      if (!allowed.has(category)) {
        errors.push(`Unknown budget category: ${category}`);
      } else if (amounts.has(category)) {
        errors.push(`Duplicate budget category: ${category}`);
      } else if (!Number.isFinite(amount) || amount < 0) {
        errors.push(`Budget for ${category} must be a non-negative number`);
      } else {
        amounts.set(category, amount);
      }
    }

    if (errors.length > 0) {
      throw new ValidationError('Invalid budget mapping', errors);
    }
    return new BudgetMapping(amounts);
  }

  get size(): number {
    return this.amounts.size;
  }

  has(category: string): boolean {
    return this.amounts.has(category);
  }

  get(category: string): number | undefined {
    return this.amounts.get(category);
  }

  entries(): [string, number][] {
    return Array.from(this.amounts.entries());
  }

  total(): number {
    let sum = 0;
    for (const amount of this.amounts.values()) sum += amount;
    return sum;
  }

  toJSON(): { category: string; amount: number }[] {
    return this.entries().map(([category, amount]) => ({ category, amount }));
  }
}

export function describeAllocation(totalIncome: number, savingsGoal: number, categories: CategorySet): Allocation {
  const spendingRemainder = totalIncome - savingsGoal;
  const perCategory = spendingRemainder < 0 ? 0 : spendingRemainder / categories.core.length;
  return { totalIncome, savingsGoal, spendingRemainder, perCategory };
}

/**
 * Savings first, then the remainder split evenly across the core categories.
 * A negative remainder leaves every core category at 0.
 */
export function allocate(totalIncome: number, savingsGoal: number, categories: CategorySet): BudgetMapping {
  const { perCategory } = describeAllocation(totalIncome, savingsGoal, categories);
  const entries: [string, number][] = [[categories.savings, savingsGoal]];
  for (const category of categories.core) {
    entries.push([category, perCategory]);
  }
  return BudgetMapping.from(entries, categories);
}

export function recommendedSavingsGoal(totalIncome: number): number {
  return totalIncome * RECOMMENDED_SAVINGS_RATE;
}

export function budgetingGuide(categories: CategorySet): string[] {
  const names = categories.core.join(', ');
  return [
    'Goal: prioritize your financial future. Setting the savings goal first means you pay yourself first.',
    '1. Enter your total money or income for the month.',
    `2. Set your desired ${categories.savings} amount. ${Math.round(RECOMMENDED_SAVINGS_RATE * 100)}% of income is a good starting point.`,
    '3. What remains is the total spending budget.',
    `4. The spending budget is divided equally across the ${categories.core.length} core categories (${names}).`,
    'The equal split is a guideline. Adjust the savings goal at the start of the month to account for fixed high costs such as rent.'
  ];
}
