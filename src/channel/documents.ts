import path from 'node:path';
import { ValidationError } from '../errors.js';
import { isCalibrationPhase, restrictToPhase } from '../calibration/phases.js';
import { isParameterName } from '../gating/parameters.js';
import {
  PARAMETER_NAMES,
  type AlertBlock,
  type CalibrationSession,
  type OutcomeKind,
  type OutcomeReason,
  type OutcomeSummary,
  type ParameterOverrides,
  type Parameters
} from '../types.js';
import { isRecord, validateAgainstSchema, type JsonSchema } from '../utils/schema.js';

export const CHANNEL_DOCUMENT_VERSION = 1;

export const CONTROL_FILE_NAME = 'calibration_control.json';
export const STATUS_FILE_NAME = 'calibration_status.json';

/**
 * Written by the calibration owner. Readers adopt it when its revision or
 * `writeId` differs from the one they hold; two writers that race to the same
 * revision still carry distinct write ids.
 */
export type ControlDocument = {
  version: number;
  revision: number;
  writeId: string;
  session: CalibrationSession | null;
  overrides: ParameterOverrides;
  updatedAt: string;
};

/** Written by the monitor after every evaluated window. */
export type StatusDocument = {
  version: number;
  publishedAt: string;
  controlRevision: number;
  session: CalibrationSession | null;
  parameters: Parameters;
  lastOutcome: OutcomeSummary | null;
  alertsSuppressed: boolean;
  blockedBy: AlertBlock;
};

export function controlFilePath(artifactDir: string) {
  return path.join(artifactDir, CONTROL_FILE_NAME);
}

export function statusFilePath(artifactDir: string) {
  return path.join(artifactDir, STATUS_FILE_NAME);
}

const sessionSchema: JsonSchema = {
  type: ['object', 'null'],
  required: ['phase', 'startedAt', 'intervalSeconds', 'watchActive'],
  properties: {
    phase: { type: 'string', enum: ['phase1', 'phase2'] },
    startedAt: { type: 'string' },
    intervalSeconds: { type: 'number', minimum: 1 },
    watchActive: { type: 'boolean' }
  }
};

const controlSchema: JsonSchema = {
  type: 'object',
  required: ['version', 'revision', 'writeId', 'session', 'overrides', 'updatedAt'],
  properties: {
    version: { type: 'integer', minimum: 1 },
    revision: { type: 'integer', minimum: 0 },
    writeId: { type: 'string' },
    session: sessionSchema,
    overrides: { type: 'object', additionalProperties: { type: 'number' } },
    updatedAt: { type: 'string' }
  }
};

const nullableNumber: JsonSchema = { type: ['number', 'null'] };

const statusSchema: JsonSchema = {
  type: 'object',
  required: [
    'version',
    'publishedAt',
    'controlRevision',
    'session',
    'parameters',
    'lastOutcome',
    'alertsSuppressed',
    'blockedBy'
  ],
  properties: {
    version: { type: 'integer', minimum: 1 },
    publishedAt: { type: 'string' },
    controlRevision: { type: 'integer', minimum: 0 },
    session: sessionSchema,
    parameters: {
      type: 'object',
      required: [...PARAMETER_NAMES],
      additionalProperties: { type: 'number' }
    },
    lastOutcome: {
      type: ['object', 'null'],
      required: ['kind', 'reason', 'persistedCount'],
      properties: {
        kind: { type: 'string', enum: ['none', 'candidate', 'confirmed', 'suppressed'] },
        reason: {
          type: 'string',
          enum: ['below-threshold', 'candidate', 'persisted', 'cat-dominant', 'cooldown', 'invalid-scores']
        },
        windowId: nullableNumber,
        timestamp: nullableNumber,
        primaryScore: nullableNumber,
        babyScore: nullableNumber,
        catScore: nullableNumber,
        margin: nullableNumber,
        persistedCount: { type: 'integer', minimum: 0 }
      }
    },
    alertsSuppressed: { type: 'boolean' },
    blockedBy: { type: 'string', enum: ['none', 'calibration', 'cooldown', 'cat'] }
  }
};

function assertSchema(schema: JsonSchema, value: unknown, label: string): Record<string, unknown> {
  const errors = validateAgainstSchema(schema, value, label);
  if (errors.length > 0 || !isRecord(value)) {
    throw new ValidationError(errors.join('; ') || `${label} must be an object`);
  }
  return value;
}

function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  return typeof value === 'number' ? value : 0;
}

function readNullableNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  return typeof value === 'number' ? value : null;
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function parseSession(value: unknown): CalibrationSession | null {
  if (!isRecord(value)) {
    return null;
  }
  const phase = readString(value, 'phase');
  if (!isCalibrationPhase(phase)) {
    throw new ValidationError(`session.phase must be phase1 or phase2`);
  }
  return {
    phase,
    startedAt: readString(value, 'startedAt'),
    intervalSeconds: readNumber(value, 'intervalSeconds'),
    watchActive: value.watchActive === true
  };
}

function parseOverrides(value: unknown): ParameterOverrides {
  const overrides: ParameterOverrides = {};
  if (!isRecord(value)) {
    return overrides;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (isParameterName(key) && typeof raw === 'number' && Number.isFinite(raw)) {
      overrides[key] = raw;
    }
  }
  return overrides;
}

export function parseControlDocument(value: unknown): ControlDocument {
  const record = assertSchema(controlSchema, value, 'control');
  const session = parseSession(record.session);
  return {
    version: readNumber(record, 'version'),
    revision: readNumber(record, 'revision'),
    writeId: readString(record, 'writeId'),
    session,
    overrides: restrictToPhase(session?.phase ?? null, parseOverrides(record.overrides)),
    updatedAt: readString(record, 'updatedAt')
  };
}

const OUTCOME_KINDS: ReadonlySet<string> = new Set<OutcomeKind>(['none', 'candidate', 'confirmed', 'suppressed']);
const OUTCOME_REASONS: ReadonlySet<string> = new Set<OutcomeReason>([
  'below-threshold',
  'candidate',
  'persisted',
  'cat-dominant',
  'cooldown',
  'invalid-scores'
]);

function isOutcomeKind(value: string): value is OutcomeKind {
  return OUTCOME_KINDS.has(value);
}

function isOutcomeReason(value: string): value is OutcomeReason {
  return OUTCOME_REASONS.has(value);
}

function isAlertBlock(value: string): value is AlertBlock {
  return value === 'none' || value === 'calibration' || value === 'cooldown' || value === 'cat';
}

function parseOutcomeSummary(value: unknown): OutcomeSummary | null {
  if (!isRecord(value)) {
    return null;
  }
  const kind = readString(value, 'kind');
  const reason = readString(value, 'reason');
  if (!isOutcomeKind(kind) || !isOutcomeReason(reason)) {
    throw new ValidationError('lastOutcome carries an unknown kind or reason');
  }
  return {
    kind,
    reason,
    windowId: readNullableNumber(value, 'windowId'),
    timestamp: readNullableNumber(value, 'timestamp'),
    primaryScore: readNullableNumber(value, 'primaryScore'),
    babyScore: readNullableNumber(value, 'babyScore'),
    catScore: readNullableNumber(value, 'catScore'),
    margin: readNullableNumber(value, 'margin'),
    persistedCount: readNumber(value, 'persistedCount')
  };
}

function parseParameters(value: unknown): Parameters {
  if (!isRecord(value)) {
    throw new ValidationError('parameters must be an object');
  }
  return {
    PRIMARY_CRY_THRESHOLD: readNumber(value, 'PRIMARY_CRY_THRESHOLD'),
    CRY_THRESHOLD: readNumber(value, 'CRY_THRESHOLD'),
    CAT_THRESHOLD: readNumber(value, 'CAT_THRESHOLD'),
    CAT_WEIGHT: readNumber(value, 'CAT_WEIGHT'),
    MARGIN_THRESHOLD: readNumber(value, 'MARGIN_THRESHOLD'),
    NON_CRY_WEIGHT: readNumber(value, 'NON_CRY_WEIGHT'),
    CONFIRM_N: readNumber(value, 'CONFIRM_N'),
    CONFIRM_M: readNumber(value, 'CONFIRM_M'),
    ALERT_COOLDOWN_SECONDS: readNumber(value, 'ALERT_COOLDOWN_SECONDS')
  };
}

export function parseStatusDocument(value: unknown): StatusDocument {
  const record = assertSchema(statusSchema, value, 'status');
  const blockedBy = readString(record, 'blockedBy');
  return {
    version: readNumber(record, 'version'),
    publishedAt: readString(record, 'publishedAt'),
    controlRevision: readNumber(record, 'controlRevision'),
    session: parseSession(record.session),
    parameters: parseParameters(record.parameters),
    lastOutcome: parseOutcomeSummary(record.lastOutcome),
    alertsSuppressed: record.alertsSuppressed === true,
    blockedBy: isAlertBlock(blockedBy) ? blockedBy : 'none'
  };
}

/** Age of a status snapshot in milliseconds, or null when its timestamp is unreadable. */
export function statusAgeMs(document: StatusDocument, now: number): number | null {
  const publishedAt = Date.parse(document.publishedAt);
  return Number.isFinite(publishedAt) ? Math.max(0, now - publishedAt) : null;
}
