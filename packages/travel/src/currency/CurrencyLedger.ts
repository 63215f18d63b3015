/**
 * Currency Ledger
 *
 * Charges the travel price against the first candidate storage that can pay it.
 * A deduction only counts once a re-read shows the new quantity; anything else
 * is rolled back and the next candidate is tried.
 */

import { createConditionalLogger, logError, ErrorSeverity } from '@waystone/shared';
import type { EntityResolver } from '../resolver/EntityResolver';
import type { ResolvedEntity } from '../types/travel-types';
import { createDefaultCandidates, type CurrencyCandidate, type CurrencyContext } from './CurrencyCandidates';

const SYSTEM = 'travel-ledger';
const logger = createConditionalLogger(SYSTEM);

export interface ChargeReceipt {
  status: 'charged';
  candidate: string;
  amount: number;
  before: number;
  after: number;
}

export interface InsufficientFunds {
  status: 'insufficient-funds';
  amount: number;
  /** Highest balance any candidate reported */
  available: number;
}

export interface DetectionFailed {
  status: 'detection-failed';
  amount: number;
  reason: string;
}

export type ChargeResult = ChargeReceipt | InsufficientFunds | DetectionFailed;

export interface CurrencyLedgerOptions {
  currencyItem: string;
  candidates?: CurrencyCandidate[];
}

type ReadAttempt =
  | { kind: 'value'; value: number }
  | { kind: 'absent' }
  | { kind: 'threw'; error: unknown };

export class CurrencyLedger {
  private candidates: CurrencyCandidate[];
  private currencyItem: string;

  constructor(private resolver: EntityResolver, options: CurrencyLedgerOptions) {
    this.currencyItem = options.currencyItem;
    this.candidates = options.candidates ?? createDefaultCandidates();
  }

  private contextFor(entity: ResolvedEntity): CurrencyContext {
    return {
      character: this.resolver.resolveActualCharacter(entity.object),
      currencyItem: this.currencyItem
    };
  }

  private read(candidate: CurrencyCandidate, ctx: CurrencyContext): ReadAttempt {
    try {
      const value = candidate.tryRead(ctx);
      return value === null ? { kind: 'absent' } : { kind: 'value', value };
    } catch (error) {
      return { kind: 'threw', error };
    }
  }

  private write(candidate: CurrencyCandidate, ctx: CurrencyContext, value: number): boolean {
    try {
      return candidate.tryWrite(ctx, value);
    } catch (error) {
      logError(`Write of ${value} refused`, error, { system: SYSTEM, method: candidate.name }, ErrorSeverity.WARNING);
      return false;
    }
  }

  /**
   * Write a value and confirm it by reading it back
   */
  private writeConfirmed(candidate: CurrencyCandidate, ctx: CurrencyContext, value: number): boolean {
    if (!this.write(candidate, ctx, value)) return false;
    const check = this.read(candidate, ctx);
    return check.kind === 'value' && check.value === value;
  }

  private restore(candidate: CurrencyCandidate, ctx: CurrencyContext, before: number): void {
    const current = this.read(candidate, ctx);
    if (current.kind === 'value' && current.value === before) return;
    if (!this.writeConfirmed(candidate, ctx, before)) {
      logger.error(`Discrepancy: could not restore ${candidate.name} to ${before} after a failed charge`);
    }
  }

  /**
   * First readable balance, or null when no candidate can see the currency
   */
  readBalance(entity: ResolvedEntity): number | null {
    const ctx = this.contextFor(entity);
    for (const candidate of this.candidates) {
      const attempt = this.read(candidate, ctx);
      if (attempt.kind === 'value') return attempt.value;
    }
    return null;
  }

  tryCharge(entity: ResolvedEntity, amount: number): ChargeResult {
    if (!Number.isFinite(amount) || amount < 0) {
      return { status: 'detection-failed', amount, reason: `invalid amount ${amount}` };
    }

    const ctx = this.contextFor(entity);

    if (amount === 0) {
      const balance = this.readBalance(entity) ?? 0;
      return { status: 'charged', candidate: 'none', amount, before: balance, after: balance };
    }

    let available: number | null = null;
    let confirmationFailures = 0;

    for (const candidate of this.candidates) {
      const attempt = this.read(candidate, ctx);
      if (attempt.kind === 'threw') {
        logError('Read failed', attempt.error, { system: SYSTEM, method: candidate.name }, ErrorSeverity.DEBUG);
        continue;
      }
      if (attempt.kind === 'absent') continue;

      const before = attempt.value;
      available = Math.max(available ?? before, before);
      if (before < amount) {
        logger.debug(`${candidate.name} holds ${before}, short of ${amount}`);
        continue;
      }

      const expected = before - amount;
      if (this.writeConfirmed(candidate, ctx, expected)) {
        logger.info(`Charged ${amount} ${this.currencyItem} via ${candidate.name} (${before} -> ${expected})`);
        return { status: 'charged', candidate: candidate.name, amount, before, after: expected };
      }

      confirmationFailures++;
      logger.error(`Discrepancy: ${candidate.name} did not confirm deduction of ${amount} from ${before}; rolling back`);
      this.restore(candidate, ctx, before);
    }

    if (available === null) {
      return { status: 'detection-failed', amount, reason: 'no currency storage found on the player' };
    }
    if (confirmationFailures > 0 && available >= amount) {
      return { status: 'detection-failed', amount, reason: 'no candidate confirmed the deduction' };
    }
    return { status: 'insufficient-funds', amount, available };
  }

  /**
   * Give a charged amount back to the storage it was taken from
   */
  refund(entity: ResolvedEntity, receipt: ChargeReceipt): boolean {
    if (receipt.amount === 0) return true;
    const candidate = this.candidates.find((c) => c.name === receipt.candidate);
    if (!candidate) return false;

    const ctx = this.contextFor(entity);
    const current = this.read(candidate, ctx);
    if (current.kind !== 'value') {
      logger.error(`Refund of ${receipt.amount} failed: ${candidate.name} is no longer readable`);
      return false;
    }

    const restored = current.value + receipt.amount;
    if (!this.writeConfirmed(candidate, ctx, restored)) {
      logger.error(`Refund of ${receipt.amount} via ${candidate.name} was not confirmed`);
      this.restore(candidate, ctx, current.value);
      return false;
    }
    logger.info(`Refunded ${receipt.amount} ${this.currencyItem} via ${candidate.name}`);
    return true;
  }
}
