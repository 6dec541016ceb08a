// lib/material/material.ts
// Material aggregate: identity, n/k datasets, metadata, references and versions.

import type {
  BoundsReadOptions,
  Complex,
  IndexPointResult,
  IndexPointResultWithBounds,
  IndexResult,
  IndexResultWithBounds,
  PointResult,
  PointResultWithBounds,
  ReadOptions,
  ReadResult,
  ReadResultWithBounds,
  ScalarReadOptions,
} from '../../types';
import { defaultProcessingStepFactory, type ProcessingStepFactory } from '../processing/factory';
import { parseReadOptions } from '../processing/options';
import { runProcessingSteps, type ProcessingStep } from '../processing/steps';
import { Axis } from './axis';
import { Data } from './data';
import { Metadata } from './metadata';
import type { Reference } from './reference';

export type MaterialInit = {
  name?: string;
  symbol?: string;
  processingStepFactory?: ProcessingStepFactory;
};

function makeData(quantity: string, symbol: string): Data {
  return new Data({ axes: [new Axis(), new Axis({ quantity, symbol })] });
}

const first = (xs: readonly number[]) => xs[0];
const firstOrNull = (xs: readonly number[]) => (xs.length ? xs[0] : null);

/**
 * Optical constants and metadata of a single material.
 *
 * `nData` and `kData` are canonical: the read methods run the processing
 * steps on private copies and never touch them.
 */
export class Material {
  name: string;
  /** Unique key within a Collection. */
  symbol: string;
  references: Reference[] = [];
  metadata = new Metadata();
  versions: Version[] = [];
  nData: Data;
  kData: Data;
  processingStepFactory: ProcessingStepFactory;

  constructor(init: MaterialInit = {}) {
    this.name = init.name ?? '';
    this.symbol = init.symbol ?? '';
    this.processingStepFactory = init.processingStepFactory ?? defaultProcessingStepFactory;
    this.nData = makeData('dispersion coefficient', 'n');
    this.kData = makeData('extinction coefficient', 'k');
  }

  /** Dispersion coefficient n, optionally interpolated and unit-converted. */
  n(options: ScalarReadOptions & BoundsReadOptions): PointResultWithBounds;
  n(options: ScalarReadOptions): PointResult;
  n(options: BoundsReadOptions): ReadResultWithBounds;
  n(options?: ReadOptions): ReadResult;
  n(options: ReadOptions = {}): ReadResult | ReadResultWithBounds | PointResult | PointResultWithBounds {
    return this.read(this.nData, options);
  }

  /** Extinction coefficient k, optionally interpolated and unit-converted. */
  k(options: ScalarReadOptions & BoundsReadOptions): PointResultWithBounds;
  k(options: ScalarReadOptions): PointResult;
  k(options: BoundsReadOptions): ReadResultWithBounds;
  k(options?: ReadOptions): ReadResult;
  k(options: ReadOptions = {}): ReadResult | ReadResultWithBounds | PointResult | PointResultWithBounds {
    return this.read(this.kData, options);
  }

  /**
   * Complex refractive index ñ = n − i·k.
   *
   * n and k run through the same step list, on independent copies.
   */
  indexOfRefraction(options: ScalarReadOptions & BoundsReadOptions): IndexPointResultWithBounds;
  indexOfRefraction(options: ScalarReadOptions): IndexPointResult;
  indexOfRefraction(options: BoundsReadOptions): IndexResultWithBounds;
  indexOfRefraction(options?: ReadOptions): IndexResult;
  indexOfRefraction(
    options: ReadOptions = {},
  ): IndexResult | IndexResultWithBounds | IndexPointResult | IndexPointResultWithBounds {
    const parsed = parseReadOptions(options);
    const steps = this.processingStepFactory.getProcessingSteps(parsed.processing);
    const n = this.process(this.nData, steps);
    const k = this.process(this.kData, steps);

    const axis = n.axes[0].values;
    const index: Complex[] = n.data.map((re, i) => ({ re, im: -k.data[i] }));

    if (parsed.scalar) {
      if (parsed.uncertainties) {
        return [
          first(axis),
          index[0],
          firstOrNull(n.lowerBounds),
          firstOrNull(n.upperBounds),
          firstOrNull(k.lowerBounds),
          firstOrNull(k.upperBounds),
        ];
      }
      return [first(axis), index[0]];
    }
    if (parsed.uncertainties) {
      return [axis, index, n.lowerBounds, n.upperBounds, k.lowerBounds, k.upperBounds];
    }
    return [axis, index];
  }

  /** True only when both n and k carry uncertainty bounds. */
  hasUncertainties(): boolean {
    return this.nData.hasUncertainties() && this.kData.hasUncertainties();
  }

  private process(canonical: Data, steps: readonly ProcessingStep[]): Data {
    return runProcessingSteps(steps, canonical.clone());
  }

  private read(
    canonical: Data,
    options: ReadOptions,
  ): ReadResult | ReadResultWithBounds | PointResult | PointResultWithBounds {
    const parsed = parseReadOptions(options);
    const steps = this.processingStepFactory.getProcessingSteps(parsed.processing);
    const data = this.process(canonical, steps);
    const axis = data.axes[0].values;

    if (parsed.scalar) {
      return parsed.uncertainties
        ? [first(axis), first(data.data), firstOrNull(data.lowerBounds), firstOrNull(data.upperBounds)]
        : [first(axis), first(data.data)];
    }
    return parsed.uncertainties
      ? [axis, data.data, data.lowerBounds, data.upperBounds]
      : [axis, data.data];
  }
}

/**
 * A superseded or alternative dataset of a material.
 *
 * The description names what distinguishes this dataset, not merely its age.
 */
export class Version {
  material: Material;
  description: string;
  current: boolean;

  constructor(material: Material, description = '', current = false) {
    this.material = material;
    this.description = description;
    this.current = current;
  }
}
