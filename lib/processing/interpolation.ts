// lib/processing/interpolation.ts

import type { InterpolationKind } from '../../types';
import type { Data } from '../material/data';
import { OutOfRange, ValueNotAvailable } from '../errors';

export type InterpolationParameters = {
  values: readonly number[];
  kind: InterpolationKind;
};

/**
 * Piecewise-linear interpolation of ys over xs at x.
 * xs must be monotonic (ascending or descending) and x inside its range.
 * At a knot the stored value is returned as is.
 */
export function interpLinear(xs: readonly number[], ys: readonly number[], x: number): number {
  const n = xs.length;
  if (n === 1) return ys[0];

  const ascending = xs[n - 1] >= xs[0];
  const before = (a: number, b: number) => (ascending ? a < b : a > b);

  // binary search for the last knot not after x
  let low = 0;
  let high = n - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (xs[mid] === x) return ys[mid];
    if (before(xs[mid], x)) low = mid + 1;
    else high = mid - 1;
  }

  const i = Math.max(0, Math.min(high, n - 2));
  const x0 = xs[i];
  const x1 = xs[i + 1];
  return ys[i] + (ys[i + 1] - ys[i]) * (x - x0) / (x1 - x0);
}

function checkRange(axisValues: readonly number[], values: readonly number[]) {
  if (!axisValues.length) throw new OutOfRange([...values], Number.NaN, Number.NaN);
  const min = Math.min(...axisValues);
  const max = Math.max(...axisValues);
  const outside = values.filter((v) => v < min || v > max);
  if (outside.length) throw new OutOfRange(outside, min, max);
}

function exactIndices(axisValues: readonly number[], values: readonly number[]): number[] {
  if (new Set(values).size !== values.length) {
    throw new ValueNotAvailable([...values], 'duplicate values requested');
  }
  const missing: number[] = [];
  const indices: number[] = [];
  for (const v of values) {
    const hits = axisValues.reduce<number[]>((acc, x, i) => (x === v ? [...acc, i] : acc), []);
    if (hits.length === 1) indices.push(hits[0]);
    else missing.push(v);
  }
  if (missing.length) throw new ValueNotAvailable(missing);
  return indices;
}

/**
 * Resample Data onto the requested axis values.
 *
 * Rejects any value outside the stored axis range. With kind 'none' only
 * values present verbatim on the axis are accepted. Bounds follow the data
 * when present and stay empty otherwise. Works in place on the Data it is given.
 */
export function interpolate(data: Data, parameters: InterpolationParameters): Data {
  const axis = data.axes[0];
  const xs = axis.values;
  const values = [...parameters.values];
  checkRange(xs, values);

  const withBounds = data.hasUncertainties();

  if (parameters.kind === 'none') {
    const indices = exactIndices(xs, values);
    const pick = (series: readonly number[]) => indices.map((i) => series[i]);
    data.data = pick(data.data);
    if (withBounds) {
      data.lowerBounds = pick(data.lowerBounds);
      data.upperBounds = pick(data.upperBounds);
    }
  } else {
    const resample = (series: readonly number[]) => values.map((v) => interpLinear(xs, series, v));
    data.data = resample(data.data);
    if (withBounds) {
      data.lowerBounds = resample(data.lowerBounds);
      data.upperBounds = resample(data.upperBounds);
    }
  }

  if (!withBounds) {
    data.lowerBounds = [];
    data.upperBounds = [];
  }
  axis.values = values;
  return data;
}
