import { RagError, ValidationError } from '../../utils/errors.js';

export function parsePositiveInt(name: string, max: number): (value: string) => number {
  return value => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0 || parsed > max) {
      throw new ValidationError(`${name} must be an integer between 1 and ${max}`);
    }
    return parsed;
  };
}

export function parseScore(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < -1 || parsed > 1) {
    throw new ValidationError('Score threshold must be a number between -1 and 1');
  }
  return parsed;
}

export function validateQueryString(query: string): string {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Search query cannot be empty');
  }
  if (trimmed.length > 1000) {
    throw new ValidationError('Search query is too long (max: 1000 characters)');
  }
  return trimmed;
}

export function formatCliError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }
  if (error instanceof RagError) {
    return `❌ ${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }
  return `❌ Unknown error: ${String(error)}`;
}
