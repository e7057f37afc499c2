/**
 * @fileOverview Errors raised outside the model boundary, plus the helper that
 * cleans error text before it reaches a user.
 */

export class MissingCredentialError extends Error {
  constructor(public readonly checked: string[]) {
    super(`Missing GOOGLE_API_KEY (checked: ${checked.join(', ')})`);
    this.name = 'MissingCredentialError';
  }
}

export function describeError(error: unknown, size = 220): string {
  const raw = error instanceof Error ? error.message : String(error ?? '');
  const clean = raw
    .replace(/\s+/g, ' ')
    .replace(/[^\x20-\x7E]/g, '')
    .trim();
  if (!clean) return 'unknown_error';
  return clean.length > size ? clean.slice(0, size) : clean;
}
