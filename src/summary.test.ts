import { BudgetMapping } from './budget';
import { defineCategories } from './categories';
import { dailyLimit, filterByPeriod, isCurrentPeriod, summarize } from './summary';
import { ExpenseRecord } from './types';

const categories = defineCategories({
  core: ['🍔 Food', '🏠 Home'],
  savings: '💰 Savings',
  savingsUse: '❌ Savings_Use'
});

function record(name: string, amount: number, category: string, timestamp: string): ExpenseRecord {
  return { name, amount, category, timestamp };
}

const lunch = record('Lunch', 150, '🍔 Food', '2024-03-05 12:00:00');
const rent = record('Rent', 500, '🏠 Home', '2024-03-01 09:00:00');

const budget = BudgetMapping.from(
  [['🍔 Food', 200], ['🏠 Home', 500], ['💰 Savings', 1000]],
  categories
);

// Well after March 2024, so no daily limit unless a test says otherwise
const later = new Date(2024, 5, 15, 12, 0, 0);

describe('summarize', () => {
  it('should compare spending with the budget per category', () => {
    const report = summarize([lunch, rent], budget, { categories, month: 3, year: 2024, now: later });

    expect(report).toEqual({
      period: { month: 3, year: 2024 },
      recordCount: 2,
      categories: [
        { category: '🍔 Food', spent: 150, budget: 200, remaining: 50, utilization: 0.75, indicator: 0.75, overBudget: false },
        { category: '🏠 Home', spent: 500, budget: 500, remaining: 0, utilization: 1, indicator: 1, overBudget: false },
        { category: '💰 Savings', spent: 0, budget: 1000, remaining: 1000, utilization: 0, indicator: 0, overBudget: false }
      ],
      totalBudget: 1700,
      totalSpent: 650,
      savingsWithdrawn: 0,
      initialSavingsGoal: 1000,
      adjustedSavingsGoal: 1000,
      totalSpendingBudget: 700,
      remainingSpendingBudget: 50,
      dailyLimit: null
    });
  });

  it('should subtract savings withdrawals from the goal but not count them as spending', () => {
    const withdrawal = record('Used for: Car repair', 300, '❌ Savings_Use', '2024-03-12 10:00:00');
    const report = summarize([lunch, rent, withdrawal], budget, { categories, month: 3, year: 2024, now: later });

    expect(report?.savingsWithdrawn).toBe(300);
    expect(report?.adjustedSavingsGoal).toBe(700);
    expect(report?.totalSpent).toBe(650);
    expect(report?.remainingSpendingBudget).toBe(50);
  });

  it('should let the adjusted savings goal go negative', () => {
    const withdrawal = record('Used for: Holiday', 1200, '❌ Savings_Use', '2024-03-12 10:00:00');
    const report = summarize([withdrawal], budget, { categories, month: 3, year: 2024, now: later });

    expect(report?.adjustedSavingsGoal).toBe(-200);
  });

  it('should ignore categories that have no budget entry', () => {
    const gadget = record('Headphones', 999, 'Gadgets', '2024-03-07 18:00:00');
    const report = summarize([lunch, gadget], budget, { categories, month: 3, year: 2024, now: later });

    expect(report?.recordCount).toBe(2);
    expect(report?.totalSpent).toBe(150);
    expect(report?.savingsWithdrawn).toBe(0);
  });

  it('should return null when nothing falls in the period', () => {
    expect(summarize([lunch, rent], budget, { categories, month: 4, year: 2024, now: later })).toBeNull();
    expect(summarize([], budget, { categories, now: later })).toBeNull();
  });

  it('should give utilization 0 for a zero budget and flag it as over budget', () => {
    const zeroFood = BudgetMapping.from([['🍔 Food', 0]], categories);
    const snack = record('Snack', 40, '🍔 Food', '2024-03-02 16:00:00');

    const report = summarize([snack], zeroFood, { categories, month: 3, year: 2024, now: later });

    expect(report?.categories).toEqual([
      { category: '🍔 Food', spent: 40, budget: 0, remaining: -40, utilization: 0, indicator: 1, overBudget: true }
    ]);
    expect(report?.initialSavingsGoal).toBe(0);
    expect(report?.remainingSpendingBudget).toBe(-40);
  });

  it('should cap the indicator for overspent categories', () => {
    const feast = record('Feast', 250, '🍔 Food', '2024-03-09 20:00:00');
    const report = summarize([feast], budget, { categories, month: 3, year: 2024, now: later });

    expect(report?.categories[0]).toEqual({
      category: '🍔 Food',
      spent: 250,
      budget: 200,
      remaining: -50,
      utilization: 1.25,
      indicator: 1,
      overBudget: true
    });
  });

  it('should add up cents exactly', () => {
    const records = [
      record('Gum', 0.1, '🍔 Food', '2024-03-01 08:00:00'),
      record('Mint', 0.2, '🍔 Food', '2024-03-01 08:05:00')
    ];
    const report = summarize(records, budget, { categories, month: 3, year: 2024, now: later });

    expect(report?.categories[0].spent).toBe(0.3);
  });

  it('should compute a daily limit for the current month', () => {
    const now = new Date(2024, 2, 10, 12, 0, 0);
    const report = summarize([lunch, rent], budget, { categories, month: 3, year: 2024, now });

    expect(report?.dailyLimit?.remainingDays).toBe(22);
    expect(report?.dailyLimit?.dailyBudget).toBeCloseTo(50 / 22, 10);
  });

  it('should not compute a daily limit without both month and year', () => {
    const now = new Date(2024, 2, 10, 12, 0, 0);
    expect(summarize([lunch, rent], budget, { categories, month: 3, now })?.dailyLimit).toBeNull();
    expect(summarize([lunch, rent], budget, { categories, now })?.dailyLimit).toBeNull();
  });

  it('should produce the same report for the same inputs', () => {
    const now = new Date(2024, 2, 10, 12, 0, 0);
    const first = summarize([lunch, rent], budget, { categories, month: 3, year: 2024, now });
    const second = summarize([lunch, rent], budget, { categories, month: 3, year: 2024, now });

    expect(second).toEqual(first);
  });
});

describe('filterByPeriod', () => {
  const february = record('Groceries', 80, '🍔 Food', '2024-02-20 17:00:00');
  const lastYear = record('Groceries', 75, '🍔 Food', '2023-03-20 17:00:00');

  it('should match month and year independently', () => {
    const records = [lunch, february, lastYear];

    expect(filterByPeriod(records, { month: 3 })).toEqual([lunch, lastYear]);
    expect(filterByPeriod(records, { year: 2024 })).toEqual([lunch, february]);
    expect(filterByPeriod(records, { month: 3, year: 2024 })).toEqual([lunch]);
    expect(filterByPeriod(records, {})).toEqual(records);
  });

  it('should match unpadded timestamps', () => {
    const handEdited = record('Groceries', 80, '🍔 Food', '2024-3-5 9:00:00');
    expect(filterByPeriod([handEdited], { month: 3, year: 2024 })).toEqual([handEdited]);
  });

  it('should drop records whose timestamp cannot be read', () => {
    const records = [
      lunch,
      record('Old', 10, '🍔 Food', 'yesterday'),
      record('Impossible', 10, '🍔 Food', '2024-02-30 10:00:00')
    ];

    expect(filterByPeriod(records, {})).toEqual([lunch]);
  });
});

describe('dailyLimit', () => {
  it('should count today as a remaining day', () => {
    expect(dailyLimit(290, new Date(2024, 1, 1, 9, 0, 0))).toEqual({ remainingDays: 29, dailyBudget: 10 });
  });

  it('should hand back the whole remainder on the last day of the month', () => {
    expect(dailyLimit(50, new Date(2024, 2, 31, 23, 59, 59))).toEqual({ remainingDays: 1, dailyBudget: 50 });
  });
});

describe('isCurrentPeriod', () => {
  it('should require both month and year to match today', () => {
    const now = new Date(2024, 2, 10);
    expect(isCurrentPeriod({ month: 3, year: 2024 }, now)).toBe(true);
    expect(isCurrentPeriod({ month: 3, year: 2023 }, now)).toBe(false);
    expect(isCurrentPeriod({ month: 3 }, now)).toBe(false);
  });
});
