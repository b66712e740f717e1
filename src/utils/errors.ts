import type { ErrorKind } from '@/types';

/**
 * Fatal failure of a changelog run. The `kind` tells callers which precondition was violated;
 * the message is meant for the workflow log.
 */
export class ChangelogError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChangelogError';
    this.kind = kind;
  }
}

/**
 * Extracts a trimmed, printable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).trim();
}
