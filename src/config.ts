import { DEFAULT_CATEGORIES, defineCategories } from './categories';
import { ValidationError } from './errors';
import { CategorySet } from './types';

export interface AppConfig {
  port: number;
  expenseFile: string;
  password?: string;
  currency: string;
  categories: CategorySet;
}

const DEFAULT_PORT = 3001;

function parsePort(value: string | undefined): number {
  if (!value) return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError('Invalid configuration', [`PORT must be an integer between 0 and 65535, got "${value}"`]);
  }
  return port;
}

function parseCategories(env: NodeJS.ProcessEnv): CategorySet {
  if (!env.CORE_CATEGORIES && !env.SAVINGS_CATEGORY && !env.SAVINGS_USE_CATEGORY) {
    return DEFAULT_CATEGORIES;
  }
  return defineCategories({
    core: env.CORE_CATEGORIES
      ? env.CORE_CATEGORIES.split(',').filter(label => label.trim().length > 0)
      : DEFAULT_CATEGORIES.core,
    savings: env.SAVINGS_CATEGORY || DEFAULT_CATEGORIES.savings,
    savingsUse: env.SAVINGS_USE_CATEGORY || DEFAULT_CATEGORIES.savingsUse
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    expenseFile: env.EXPENSE_FILE || 'expenses.csv',
    password: env.TRACKER_PASSWORD || undefined,
    currency: env.CURRENCY_SYMBOL ?? '₹',
    categories: parseCategories(env)
  };
}
