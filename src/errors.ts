// Raised when a value constructed in code (not user input) breaks its invariants
export class ValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

// fs errors may come from another realm (Jest's sandbox)
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
