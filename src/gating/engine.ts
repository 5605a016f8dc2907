import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { ValidationError } from '../errors.js';
import type { GatingDiagnostics, GatingOutcome, OutcomeKind, OutcomeReason, ScoreSet } from '../types.js';
import { isRecord, validateAgainstSchema, type JsonSchema } from '../utils/schema.js';
import type { DominanceConfig } from '../config/index.js';
import type { ParameterStore } from './parameters.js';
import { RingBuffer } from './ringBuffer.js';

const scoreSchema: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };

const scoreSetSchema: JsonSchema = {
  type: 'object',
  required: ['primaryDecision', 'primaryScore', 'babyScore', 'catScore', 'windowId', 'timestamp'],
  properties: {
    primaryDecision: { type: 'boolean' },
    primaryScore: scoreSchema,
    babyScore: scoreSchema,
    catScore: scoreSchema,
    otherSuppressScore: scoreSchema,
    windowId: { type: 'integer', minimum: 0 },
    timestamp: { type: 'number', minimum: 0 }
  }
};

export function parseScoreSet(input: unknown): ScoreSet {
  const errors = validateAgainstSchema(scoreSetSchema, input, 'scores');
  if (errors.length > 0 || !isRecord(input)) {
    throw new ValidationError(errors.join('; ') || 'scores must be an object');
  }
  const {
    primaryDecision,
    primaryScore,
    babyScore,
    catScore,
    otherSuppressScore = 0,
    windowId,
    timestamp
  } = input;
  if (
    typeof primaryDecision !== 'boolean' ||
    typeof primaryScore !== 'number' ||
    typeof babyScore !== 'number' ||
    typeof catScore !== 'number' ||
    typeof otherSuppressScore !== 'number' ||
    typeof windowId !== 'number' ||
    typeof timestamp !== 'number'
  ) {
    throw new ValidationError('scores failed type checks');
  }
  return Object.freeze({
    primaryDecision,
    primaryScore,
    babyScore,
    catScore,
    otherSuppressScore,
    windowId,
    timestamp
  });
}

export type GatingEngineOptions = {
  parameters: ParameterStore;
  dominance: DominanceConfig;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/**
 * Fuses primary and verifier scores per window and applies N-of-M persistence
 * with cat suppression. Calls must arrive in window order, one at a time.
 */
export class GatingEngine {
  private readonly parameters: ParameterStore;
  private readonly decisions: RingBuffer<boolean>;
  private readonly margins: RingBuffer<number>;
  private headroom: number;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: GatingEngineOptions) {
    this.parameters = options.parameters;
    this.decisions = new RingBuffer<boolean>(this.parameters.get('CONFIRM_M'));
    this.margins = new RingBuffer<number>(options.dominance.windowSize);
    this.headroom = options.dominance.headroom;
    this.log = options.logger ?? defaultLogger.child({ component: 'gating' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  evaluate(input: unknown): GatingOutcome {
    let scores: ScoreSet;
    try {
      scores = parseScoreSet(input);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      this.metrics.recordWindow(null);
      this.metrics.recordInvalidWindow();
      this.log.warn({ err: error }, 'Rejected malformed score set');
      return {
        kind: 'none',
        reason: 'invalid-scores',
        scores: null,
        diagnostics: {
          margin: null,
          persistedCount: this.decisions.count(Boolean),
          bufferLength: this.decisions.size,
          trailingMargin: this.trailingMargin(),
          sustainedDominance: false,
          detail: error.message
        }
      };
    }

    this.metrics.recordWindow(scores.windowId);
    const p = this.parameters.effective();
    if (this.decisions.capacity !== p.CONFIRM_M) {
      this.decisions.resize(p.CONFIRM_M);
    }

    const isPrimaryCandidate = scores.primaryDecision || scores.primaryScore >= p.PRIMARY_CRY_THRESHOLD;
    const margin =
      scores.babyScore - p.CAT_WEIGHT * scores.catScore - p.NON_CRY_WEIGHT * scores.otherSuppressScore;
    const isVerifierCandidate = scores.babyScore >= p.CRY_THRESHOLD && margin >= p.MARGIN_THRESHOLD;
    const rawCandidate = isPrimaryCandidate && isVerifierCandidate;

    this.decisions.push(rawCandidate);
    this.margins.push(margin);

    const persistedCount = this.decisions.count(Boolean);
    const persisted = persistedCount >= p.CONFIRM_N;
    const trailingMargin = this.trailingMargin();
    const sustainedDominance =
      this.margins.isFull() && trailingMargin !== null && trailingMargin >= p.MARGIN_THRESHOLD + this.headroom;
    const catDominant = scores.catScore >= p.CAT_THRESHOLD;

    const diagnostics: GatingDiagnostics = {
      margin,
      persistedCount,
      bufferLength: this.decisions.size,
      trailingMargin,
      sustainedDominance
    };

    if (catDominant && !(persisted && sustainedDominance)) {
      return outcome('suppressed', 'cat-dominant', scores, diagnostics);
    }
    if (persisted) {
      return outcome('confirmed', 'persisted', scores, diagnostics);
    }
    if (rawCandidate) {
      return outcome('candidate', 'candidate', scores, diagnostics);
    }
    return outcome('none', 'below-threshold', scores, diagnostics);
  }

  setDominance(dominance: DominanceConfig) {
    this.margins.resize(dominance.windowSize);
    this.headroom = dominance.headroom;
  }

  bufferLength() {
    return this.decisions.size;
  }

  bufferCapacity() {
    return this.decisions.capacity;
  }

  reset() {
    this.decisions.clear();
    this.margins.clear();
  }

  private trailingMargin(): number | null {
    const values = this.margins.values();
    if (values.length === 0) {
      return null;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
  }
}

function outcome(
  kind: OutcomeKind,
  reason: OutcomeReason,
  scores: ScoreSet,
  diagnostics: GatingDiagnostics
): GatingOutcome {
  return { kind, reason, scores, diagnostics };
}
