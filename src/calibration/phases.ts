import type { CalibrationPhase, ParameterName, ParameterOverrides } from '../types.js';

export const CALIBRATION_PHASES: readonly CalibrationPhase[] = ['phase1', 'phase2'];

export const PHASE_PARAMETERS: { readonly [P in CalibrationPhase]: readonly ParameterName[] } = {
  phase1: ['PRIMARY_CRY_THRESHOLD', 'CONFIRM_N', 'CONFIRM_M', 'ALERT_COOLDOWN_SECONDS'],
  phase2: ['CRY_THRESHOLD', 'CAT_THRESHOLD', 'CAT_WEIGHT', 'MARGIN_THRESHOLD']
};

export function isCalibrationPhase(value: string): value is CalibrationPhase {
  return value === 'phase1' || value === 'phase2';
}

export function isAllowedInPhase(phase: CalibrationPhase, name: ParameterName) {
  return PHASE_PARAMETERS[phase].includes(name);
}

/** Drops every override the phase does not own. */
export function restrictToPhase(phase: CalibrationPhase | null, overrides: ParameterOverrides): ParameterOverrides {
  const restricted: ParameterOverrides = {};
  if (!phase) {
    return restricted;
  }
  for (const name of PHASE_PARAMETERS[phase]) {
    const value = overrides[name];
    if (value !== undefined) {
      restricted[name] = value;
    }
  }
  return restricted;
}
