// lib/material/data.ts

import { Axis } from './axis';

export type DataInit = {
  data?: readonly number[];
  axes?: readonly [Axis, Axis];
  lowerBounds?: readonly number[];
  upperBounds?: readonly number[];
};

/**
 * A numeric series with its two axes and optional uncertainty bounds.
 *
 * `data`, `axes[0].values` and (if present) both bound series are parallel.
 * Every instance owns its arrays; nothing is shared with another instance.
 */
export class Data {
  data: number[];
  axes: [Axis, Axis];
  lowerBounds: number[];
  upperBounds: number[];

  constructor(init: DataInit = {}) {
    this.data = init.data ? [...init.data] : [];
    this.axes = init.axes ? [init.axes[0].clone(), init.axes[1].clone()] : [new Axis(), new Axis()];
    this.lowerBounds = init.lowerBounds ? [...init.lowerBounds] : [];
    this.upperBounds = init.upperBounds ? [...init.upperBounds] : [];
  }

  hasUncertainties(): boolean {
    return this.lowerBounds.length > 0 && this.upperBounds.length > 0;
  }

  clone(): Data {
    return new Data(this);
  }
}
