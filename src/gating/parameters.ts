import { ConfigurationError, ValidationError } from '../errors.js';
import { PARAMETER_NAMES, type ParameterName, type ParameterOverrides, type Parameters } from '../types.js';

type ParameterRule =
  | { kind: 'unit' }
  | { kind: 'real' }
  | { kind: 'integer'; minimum: number };

export const PARAMETER_RULES: { [K in ParameterName]: ParameterRule } = {
  PRIMARY_CRY_THRESHOLD: { kind: 'unit' },
  CRY_THRESHOLD: { kind: 'unit' },
  CAT_THRESHOLD: { kind: 'unit' },
  CAT_WEIGHT: { kind: 'real' },
  MARGIN_THRESHOLD: { kind: 'real' },
  NON_CRY_WEIGHT: { kind: 'real' },
  CONFIRM_N: { kind: 'integer', minimum: 1 },
  CONFIRM_M: { kind: 'integer', minimum: 1 },
  ALERT_COOLDOWN_SECONDS: { kind: 'integer', minimum: 0 }
};

const PARAMETER_NAME_SET: ReadonlySet<string> = new Set(PARAMETER_NAMES);

export function isParameterName(value: string): value is ParameterName {
  return PARAMETER_NAME_SET.has(value);
}

export function normalizeParameterName(raw: string): ParameterName {
  const key = raw.trim().toUpperCase();
  if (!isParameterName(key)) {
    throw new ConfigurationError(`unknown parameter ${raw.trim()}. known: ${PARAMETER_NAMES.join(', ')}`);
  }
  return key;
}

export function assertParameterValue(name: ParameterName, value: number): number {
  const rule = PARAMETER_RULES[name];
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a finite number`);
  }
  if (rule.kind === 'unit' && (value < 0 || value > 1)) {
    throw new ValidationError(`${name} must be within [0, 1], received ${value}`);
  }
  if (rule.kind === 'integer') {
    if (!Number.isInteger(value)) {
      throw new ValidationError(`${name} must be an integer, received ${value}`);
    }
    if (value < rule.minimum) {
      throw new ValidationError(`${name} must be >= ${rule.minimum}, received ${value}`);
    }
  }
  return value;
}

/** Parses operator text ("0.62", "4") into a value of the parameter's kind. */
export function parseParameterValue(name: ParameterName, raw: string): number {
  const text = raw.trim();
  const rule = PARAMETER_RULES[name];
  const pattern = rule.kind === 'integer' ? /^[+-]?\d+$/ : /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
  if (!pattern.test(text)) {
    const expected = rule.kind === 'integer' ? 'an integer' : 'a number';
    throw new ValidationError(`${name} expects ${expected}, received "${text}"`);
  }
  return assertParameterValue(name, Number(text));
}

function assertPersistence(parameters: Parameters) {
  if (parameters.CONFIRM_N > parameters.CONFIRM_M) {
    throw new ConfigurationError(
      `CONFIRM_N (${parameters.CONFIRM_N}) must not exceed CONFIRM_M (${parameters.CONFIRM_M})`
    );
  }
}

function resolve(base: Parameters, overrides: ParameterOverrides): Parameters {
  const effective: Parameters = { ...base };
  for (const name of PARAMETER_NAMES) {
    const value = overrides[name];
    if (value !== undefined) {
      effective[name] = value;
    }
  }
  return effective;
}

/**
 * Two-layer parameter table: a base layer loaded from configuration and an
 * override layer owned by calibration. Every mutation is validated against the
 * resulting effective view and rejected without side effects.
 */
export class ParameterStore {
  private baseLayer: Parameters;
  private overrideLayer: ParameterOverrides = {};

  constructor(base: Parameters) {
    this.baseLayer = ParameterStore.validate(base);
  }

  static validate(parameters: Parameters): Parameters {
    const copy: Parameters = { ...parameters };
    for (const name of PARAMETER_NAMES) {
      assertParameterValue(name, copy[name]);
    }
    assertPersistence(copy);
    return copy;
  }

  base(): Parameters {
    return { ...this.baseLayer };
  }

  overrides(): ParameterOverrides {
    return { ...this.overrideLayer };
  }

  effective(): Parameters {
    return resolve(this.baseLayer, this.overrideLayer);
  }

  get(name: ParameterName): number {
    return this.overrideLayer[name] ?? this.baseLayer[name];
  }

  hasOverrides() {
    return Object.keys(this.overrideLayer).length > 0;
  }

  setBase(next: Parameters) {
    const validated = ParameterStore.validate(next);
    assertPersistence(resolve(validated, this.overrideLayer));
    this.baseLayer = validated;
  }

  /** Validates a single override against the current layers without applying it. */
  checkOverride(name: ParameterName, value: number): ParameterOverrides {
    assertParameterValue(name, value);
    const next: ParameterOverrides = { ...this.overrideLayer };
    next[name] = value;
    assertPersistence(resolve(this.baseLayer, next));
    return next;
  }

  setOverride(name: ParameterName, value: number) {
    this.overrideLayer = this.checkOverride(name, value);
  }

  replaceOverrides(overrides: ParameterOverrides) {
    const next: ParameterOverrides = {};
    for (const name of PARAMETER_NAMES) {
      const value = overrides[name];
      if (value !== undefined) {
        next[name] = assertParameterValue(name, value);
      }
    }
    assertPersistence(resolve(this.baseLayer, next));
    this.overrideLayer = next;
  }

  clearOverrides() {
    this.overrideLayer = {};
  }
}
