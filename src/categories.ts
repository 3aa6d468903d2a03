import { ValidationError } from './errors';
import { CategorySet } from './types';

export function defineCategories(input: CategorySet): CategorySet {
  const errors: string[] = [];
  const core = input.core.map(label => label.trim());
  const savings = input.savings.trim();
  const savingsUse = input.savingsUse.trim();

  if (core.length === 0) {
    errors.push('At least one core category is required');
  }
  if (core.some(label => label.length === 0)) {
    errors.push('Category labels cannot be empty');
  }
  if (new Set(core).size !== core.length) {
    errors.push('Core categories must be unique');
  }
  if (!savings) {
    errors.push('Savings category cannot be empty');
  }
  if (!savingsUse) {
    errors.push('Savings-use category cannot be empty');
  }
  if (savings && savings === savingsUse) {
    errors.push('Savings and savings-use categories must differ');
  }
  for (const reserved of [savings, savingsUse]) {
    if (reserved && core.includes(reserved)) {
      errors.push(`"${reserved}" is reserved and cannot be a core category`);
    }
  }
  if ([...core, savings, savingsUse].some(label => /[\r\n]/.test(label))) {
    errors.push('Category labels cannot contain line breaks');
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid category set', errors);
  }

  return Object.freeze({ core: Object.freeze(core), savings, savingsUse });
}

export const DEFAULT_CATEGORIES: CategorySet = defineCategories({
  core: ['🍔 Food', '🏠 Home', '💼 Work', '🎉 Fun', '✨ Misc'],
  savings: '💰 Savings',
  savingsUse: '❌ Savings_Use'
});

// Labels that may carry a budget entry
export function budgetCategories(categories: CategorySet): string[] {
  return [categories.savings, ...categories.core];
}
