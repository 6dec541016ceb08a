// lib/processing/factory.ts

import type { ProcessingOptions } from '../../types';
import { identityStep, interpolationStep, unitConversionStep, type ProcessingStep } from './steps';

/** Policy deciding which ordered steps a read request needs. Holds no data. */
export interface ProcessingStepFactory {
  getProcessingSteps(options: ProcessingOptions): ProcessingStep[];
}

/**
 * Unit conversion goes first, so requested values are read in the unit the
 * axis is returned in; interpolation follows. With nothing to do, a single
 * identity step is returned.
 */
export class DefaultProcessingStepFactory implements ProcessingStepFactory {
  getProcessingSteps(options: ProcessingOptions): ProcessingStep[] {
    const steps: ProcessingStep[] = [];
    if (options.unit) {
      steps.push(unitConversionStep(options.unit));
    }
    if (options.values !== null) {
      steps.push(interpolationStep({ values: options.values, kind: options.interpolation }));
    }
    return steps.length ? steps : [identityStep()];
  }
}

export const defaultProcessingStepFactory: ProcessingStepFactory = new DefaultProcessingStepFactory();
