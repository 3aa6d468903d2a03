import { budgetCategories, DEFAULT_CATEGORIES, defineCategories } from './categories';
import { ValidationError } from './errors';

describe('DEFAULT_CATEGORIES', () => {
  it('should hold five core categories and two reserved labels', () => {
    expect(DEFAULT_CATEGORIES.core).toEqual(['🍔 Food', '🏠 Home', '💼 Work', '🎉 Fun', '✨ Misc']);
    expect(DEFAULT_CATEGORIES.savings).toBe('💰 Savings');
    expect(DEFAULT_CATEGORIES.savingsUse).toBe('❌ Savings_Use');
  });
});

describe('defineCategories', () => {
  it('should trim labels', () => {
    const categories = defineCategories({ core: [' Food ', 'Rent'], savings: ' Savings', savingsUse: 'Withdrawn ' });
    expect(categories).toEqual({ core: ['Food', 'Rent'], savings: 'Savings', savingsUse: 'Withdrawn' });
  });

  it('should reject an empty core list', () => {
    expect(() => defineCategories({ core: [], savings: 'Savings', savingsUse: 'Withdrawn' })).toThrow(
      'Invalid category set: At least one core category is required'
    );
  });

  it('should reject duplicates and reserved labels in the core list', () => {
    expect(() => defineCategories({ core: ['Food', 'Food'], savings: 'Savings', savingsUse: 'Withdrawn' })).toThrow(
      ValidationError
    );
    expect(() => defineCategories({ core: ['Food', 'Savings'], savings: 'Savings', savingsUse: 'Withdrawn' })).toThrow(
      '"Savings" is reserved and cannot be a core category'
    );
  });

  it('should reject identical reserved labels', () => {
    expect(() => defineCategories({ core: ['Food'], savings: 'Savings', savingsUse: 'Savings' })).toThrow(
      'Savings and savings-use categories must differ'
    );
  });
});

describe('budgetCategories', () => {
  it('should list savings before the core categories', () => {
    expect(budgetCategories(DEFAULT_CATEGORIES)).toEqual([
      '💰 Savings',
      '🍔 Food',
      '🏠 Home',
      '💼 Work',
      '🎉 Fun',
      '✨ Misc'
    ]);
  });
});
