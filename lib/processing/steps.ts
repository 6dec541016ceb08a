// lib/processing/steps.ts
// Processing steps as a closed set of variants, dispatched in one place.

import type { Data } from '../material/data';
import { interpolate, type InterpolationParameters } from './interpolation';
import { convertUnit, type UnitConversionParameters } from './unitConversion';

export type IdentityStep = { kind: 'identity' };
export type UnitConversionStep = { kind: 'unitConversion'; parameters: UnitConversionParameters };
export type InterpolationStep = { kind: 'interpolation'; parameters: InterpolationParameters };

export type ProcessingStep = IdentityStep | UnitConversionStep | InterpolationStep;

export type ProcessingStepKind = ProcessingStep['kind'];

export const identityStep = (): IdentityStep => ({ kind: 'identity' });

export const unitConversionStep = (unit: string): UnitConversionStep => ({
  kind: 'unitConversion',
  parameters: { unit },
});

export const interpolationStep = (parameters: InterpolationParameters): InterpolationStep => ({
  kind: 'interpolation',
  parameters: { values: [...parameters.values], kind: parameters.kind },
});

export function processStep(step: ProcessingStep, data: Data): Data {
  switch (step.kind) {
    case 'identity':
      return data;
    case 'unitConversion':
      return convertUnit(data, step.parameters);
    case 'interpolation':
      return interpolate(data, step.parameters);
  }
}

/**
 * Feed data through the steps in order, each output becoming the next input.
 * The first failing step aborts the run.
 */
export function runProcessingSteps(steps: readonly ProcessingStep[], data: Data): Data {
  return steps.reduce((current, step) => processStep(step, current), data);
}
