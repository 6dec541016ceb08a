// lib/material/axis.ts

export type AxisInit = {
  values?: readonly number[];
  quantity?: string;
  symbol?: string;
  unit?: string;
};

/**
 * One labelled numeric coordinate.
 *
 * The independent axis of a Data instance carries values; the dependent axis
 * only carries the label of the measured quantity.
 */
export class Axis {
  values: number[];
  quantity: string;
  symbol: string;
  unit: string;

  constructor(init: AxisInit = {}) {
    this.values = init.values ? [...init.values] : [];
    this.quantity = init.quantity ?? '';
    this.symbol = init.symbol ?? '';
    this.unit = init.unit ?? '';
  }

  /**
   * Label for plots and tables: `$symbol$ / unit`, falling back to the
   * quantity when no symbol is set.
   */
  getLabel(): string {
    const measure = this.symbol ? `$${this.symbol}$` : this.quantity;
    return this.unit ? `${measure} / ${this.unit}` : measure;
  }

  clone(): Axis {
    return new Axis(this);
  }
}
