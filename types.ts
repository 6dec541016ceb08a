// types.ts
// Shared public types of the optical constants library.

export type InterpolationKind = 'linear' | 'none';

/** Complex number; used for the refractive index ñ = n − i·k. */
export type Complex = { re: number; im: number };

/** Options accepted by the Material read API. */
export type ReadOptions = {
  /** Target independent-variable value(s), interpreted in the returned unit. */
  values?: number | readonly number[];
  /** Defaults to 'linear'; 'none' requests exact lookup. */
  interpolation?: InterpolationKind;
  uncertainties?: boolean;
  /** Target axis unit ('nm' or 'eV'); empty keeps the stored unit. */
  unit?: string;
};

export type ScalarReadOptions = ReadOptions & { values: number };
export type BoundsReadOptions = ReadOptions & { uncertainties: true };

/** Options record handed to a ProcessingStepFactory, already validated. */
export type ProcessingOptions = {
  values: number[] | null;
  interpolation: InterpolationKind;
  unit: string;
};

export type Series = number[];

export type ReadResult = [axis: Series, values: Series];
export type ReadResultWithBounds = [axis: Series, values: Series, lower: Series, upper: Series];
export type PointResult = [axis: number, value: number];
export type PointResultWithBounds = [axis: number, value: number, lower: number | null, upper: number | null];

export type IndexResult = [axis: Series, index: Complex[]];
export type IndexResultWithBounds = [
  axis: Series,
  index: Complex[],
  nLower: Series,
  nUpper: Series,
  kLower: Series,
  kUpper: Series,
];
export type IndexPointResult = [axis: number, index: Complex];
export type IndexPointResultWithBounds = [
  axis: number,
  index: Complex,
  nLower: number | null,
  nUpper: number | null,
  kLower: number | null,
  kUpper: number | null,
];

export type DuplicateSymbolPolicy = 'reject' | 'replace';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
