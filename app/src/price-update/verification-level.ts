/**
 * Verification level of a price update
 *
 * The usual process is to check the signatures of two thirds of the guardian
 * set, which does not always fit in a single Solana transaction, so the receiver
 * program also accepts partially verified updates.
 *
 * WARNING: using partially verified updates lowers the number of guardians that
 * need to collude to produce a malicious price update.
 */

import { VerificationLevel as VerificationLevelType, VerificationLevelError } from '../types';

export type VerificationLevel = VerificationLevelType;

const FULL: VerificationLevel = { kind: 'Full' };

/**
 * A level for which only `numSignatures` guardian signatures were checked
 */
function partial(numSignatures: number): VerificationLevel {
  if (!Number.isInteger(numSignatures) || numSignatures < 0 || numSignatures > 0xff) {
    throw new VerificationLevelError(
      `numSignatures must be an integer between 0 and 255, got ${numSignatures}`
    );
  }
  return { kind: 'Partial', numSignatures };
}

/**
 * Whether `self` is at least as trusted as `other`.
 *
 * `Full` is greater than every `Partial`, and a `Partial` with more signatures
 * is greater than one with fewer.
 */
function gte(self: VerificationLevel, other: VerificationLevel): boolean {
  switch (self.kind) {
    case 'Full':
      return true;
    case 'Partial':
      switch (other.kind) {
        case 'Full':
          return false;
        case 'Partial':
          return self.numSignatures >= other.numSignatures;
        default:
          return assertNever(other);
      }
    default:
      return assertNever(self);
  }
}

/**
 * Human-readable form, e.g. `Full` or `Partial(5)`
 */
function format(level: VerificationLevel): string {
  switch (level.kind) {
    case 'Full':
      return 'Full';
    case 'Partial':
      return `Partial(${level.numSignatures})`;
    default:
      return assertNever(level);
  }
}

function assertNever(value: never): never {
  throw new VerificationLevelError(`Unknown verification level: ${JSON.stringify(value)}`);
}

export const VerificationLevel = {
  FULL,
  partial,
  gte,
  format,
};
