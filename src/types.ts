export const PARAMETER_NAMES = [
  'PRIMARY_CRY_THRESHOLD',
  'CRY_THRESHOLD',
  'CAT_THRESHOLD',
  'CAT_WEIGHT',
  'MARGIN_THRESHOLD',
  'NON_CRY_WEIGHT',
  'CONFIRM_N',
  'CONFIRM_M',
  'ALERT_COOLDOWN_SECONDS'
] as const;

export type ParameterName = (typeof PARAMETER_NAMES)[number];

export type Parameters = { [K in ParameterName]: number };

export type ParameterOverrides = Partial<Parameters>;

export interface ScoreSet {
  primaryDecision: boolean;
  primaryScore: number;
  babyScore: number;
  catScore: number;
  otherSuppressScore: number;
  windowId: number;
  timestamp: number;
}

export type OutcomeKind = 'none' | 'candidate' | 'confirmed' | 'suppressed';

export type OutcomeReason =
  | 'below-threshold'
  | 'candidate'
  | 'persisted'
  | 'cat-dominant'
  | 'cooldown'
  | 'invalid-scores';

export interface GatingDiagnostics {
  margin: number | null;
  persistedCount: number;
  bufferLength: number;
  trailingMargin: number | null;
  sustainedDominance: boolean;
  detail?: string;
}

export interface GatingOutcome {
  kind: OutcomeKind;
  reason: OutcomeReason;
  scores: ScoreSet | null;
  diagnostics: GatingDiagnostics;
}

export type CalibrationPhase = 'phase1' | 'phase2';

export interface CalibrationSession {
  phase: CalibrationPhase;
  startedAt: string;
  intervalSeconds: number;
  watchActive: boolean;
}

export interface CooldownState {
  lastConfirmedAt: number | null;
}

export interface EventRecord {
  eventId: string;
  timestamp: number;
  scores: ScoreSet;
  clipReference: string | null;
}

export type AlertBlock = 'none' | 'calibration' | 'cooldown' | 'cat';

export interface OutcomeSummary {
  kind: OutcomeKind;
  reason: OutcomeReason;
  windowId: number | null;
  timestamp: number | null;
  primaryScore: number | null;
  babyScore: number | null;
  catScore: number | null;
  margin: number | null;
  persistedCount: number;
}
