import { parseTimestamp } from './timestamp';
import { CategorySet, CreateExpenseInput, SavingsUseInput, Selection, ValidationResult } from './types';

const MAX_AMOUNT = 100000000; // 10 crore
const MAX_NAME_LENGTH = 200;
const CANCEL_SENTINEL = 'c';

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

function validateAmount(amount: unknown, errors: string[]): void {
  if (amount === undefined || amount === null) {
    errors.push('Amount is required');
  } else if (typeof amount !== 'number' || isNaN(amount)) {
    errors.push('Amount must be a valid number');
  } else if (amount <= 0) {
    errors.push('Amount must be greater than 0');
  } else if (amount > MAX_AMOUNT) {
    errors.push('Amount exceeds maximum allowed value');
  } else if (Math.round(amount * 100) <= 0) {
    errors.push('Amount must be at least 0.01');
  } else if (Number(amount.toFixed(2)) !== amount) {
    // Max 2 decimal places for currency
    errors.push('Amount can have at most 2 decimal places');
  }
}

export function validateExpenseInput(input: unknown, categories: CategorySet): ValidationResult {
  const errors: string[] = [];

  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  // Validate name
  if (!input.name) {
    errors.push('Name is required');
  } else if (typeof input.name !== 'string') {
    errors.push('Name must be a string');
  } else if (input.name.trim().length === 0) {
    errors.push('Name cannot be empty');
  } else if (input.name.length > MAX_NAME_LENGTH) {
    errors.push(`Name must be ${MAX_NAME_LENGTH} characters or less`);
  } else if (/[\r\n]/.test(input.name)) {
    errors.push('Name cannot contain line breaks');
  }

  validateAmount(input.amount, errors);

  // Validate category
  if (!input.category) {
    errors.push('Category is required');
  } else if (typeof input.category !== 'string') {
    errors.push('Category must be a string');
  } else if (!categories.core.includes(input.category.trim())) {
    errors.push(`Category must be one of: ${categories.core.join(', ')}`);
  }

  // Validate timestamp if provided
  if (input.timestamp !== undefined) {
    if (typeof input.timestamp !== 'string') {
      errors.push('Timestamp must be a string');
    } else if (!parseTimestamp(input.timestamp.trim())) {
      errors.push('Timestamp must be a valid date in YYYY-MM-DD HH:MM:SS format');
    }
  }

  return { valid: errors.length === 0, errors };
}

export function validateSavingsUseInput(input: unknown): ValidationResult {
  const errors: string[] = [];

  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  validateAmount(input.amount, errors);

  if (input.reason !== undefined) {
    if (typeof input.reason !== 'string') {
      errors.push('Reason must be a string');
    } else if (input.reason.length > MAX_NAME_LENGTH) {
      errors.push(`Reason must be ${MAX_NAME_LENGTH} characters or less`);
    } else if (/[\r\n]/.test(input.reason)) {
      errors.push('Reason cannot contain line breaks');
    }
  }

  return { valid: errors.length === 0, errors };
}

export function validateBudgetInput(input: unknown): ValidationResult {
  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const { totalIncome, savingsGoal } = input;
  const errors: string[] = [];
  let incomeValid = false;

  if (totalIncome === undefined || totalIncome === null) {
    errors.push('Total income is required');
  } else if (typeof totalIncome !== 'number' || !Number.isFinite(totalIncome)) {
    errors.push('Total income must be a valid number');
  } else if (totalIncome <= 0) {
    errors.push('Total income must be greater than 0');
  } else {
    incomeValid = true;
  }

  if (savingsGoal === undefined || savingsGoal === null) {
    errors.push('Savings goal is required');
  } else if (typeof savingsGoal !== 'number' || !Number.isFinite(savingsGoal)) {
    errors.push('Savings goal must be a valid number');
  } else if (savingsGoal < 0) {
    errors.push('Savings goal must be non-negative');
  } else if (incomeValid && typeof totalIncome === 'number' && savingsGoal > totalIncome) {
    errors.push('Savings goal cannot exceed your total income');
  }

  return { valid: errors.length === 0, errors };
}

export function validatePeriod(input: { month?: number; year?: number }): ValidationResult {
  const errors: string[] = [];

  if (input.month !== undefined && (!Number.isInteger(input.month) || input.month < 1 || input.month > 12)) {
    errors.push('Month must be an integer between 1 and 12');
  }
  if (input.year !== undefined && (!Number.isInteger(input.year) || input.year < 1 || input.year > 9999)) {
    errors.push('Year must be an integer between 1 and 9999');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Reads a delete selection: the cancel sentinel or a 1-based position.
 * Range checks happen against the store; null means the text is not a number.
 */
export function parseSelection(value: string): Selection | null {
  const text = value.trim();
  if (text.toLowerCase() === CANCEL_SENTINEL) {
    return { kind: 'cancel' };
  }
  if (!/^-?\d+$/.test(text)) {
    return null;
  }
  return { kind: 'position', position: Number(text) };
}

export function passwordMatches(expected: string | undefined, supplied: unknown): boolean {
  if (!expected) return true;
  return typeof supplied === 'string' && supplied === expected;
}

export function sanitizeExpenseInput(input: CreateExpenseInput): CreateExpenseInput {
  return {
    name: input.name.trim(),
    amount: Math.round(input.amount * 100) / 100, // Round to 2 decimal places
    category: input.category.trim(),
    timestamp: input.timestamp?.trim()
  };
}

export function sanitizeSavingsUseInput(input: SavingsUseInput): SavingsUseInput {
  return {
    amount: Math.round(input.amount * 100) / 100,
    reason: input.reason?.trim()
  };
}
