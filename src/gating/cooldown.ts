import type { CooldownState, GatingOutcome } from '../types.js';
import type { ParameterStore } from './parameters.js';

/**
 * Downgrades a confirmation that lands within ALERT_COOLDOWN_SECONDS of the
 * previous one. Only admitted confirmations move the cooldown anchor.
 */
export class CooldownController {
  private lastConfirmedAt: number | null = null;

  constructor(private readonly parameters: ParameterStore) {}

  admit(outcome: GatingOutcome, now: number): GatingOutcome {
    if (outcome.kind !== 'confirmed') {
      return outcome;
    }

    const cooldownMs = this.parameters.get('ALERT_COOLDOWN_SECONDS') * 1000;
    if (this.lastConfirmedAt !== null && now - this.lastConfirmedAt < cooldownMs) {
      return { ...outcome, kind: 'suppressed', reason: 'cooldown' };
    }

    this.lastConfirmedAt = now;
    return outcome;
  }

  remainingMs(now: number): number {
    if (this.lastConfirmedAt === null) {
      return 0;
    }
    const cooldownMs = this.parameters.get('ALERT_COOLDOWN_SECONDS') * 1000;
    return Math.max(0, this.lastConfirmedAt + cooldownMs - now);
  }

  state(): CooldownState {
    return { lastConfirmedAt: this.lastConfirmedAt };
  }

  reset() {
    this.lastConfirmedAt = null;
  }
}
