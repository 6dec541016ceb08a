import { Axis } from '@/lib/material/axis';
import { Data } from '@/lib/material/data';
import { Material } from '@/lib/material/material';

export const linspace = (start: number, stop: number, num: number): number[] =>
  Array.from({ length: num }, (_, i) => start + (i * (stop - start)) / (num - 1));

export function mockData(opts: {
  axis?: number[];
  data?: number[];
  lowerBounds?: number[];
  upperBounds?: number[];
  unit?: string;
} = {}): Data {
  return new Data({
    data: opts.data ?? [0.98, 0.985, 0.99],
    axes: [
      new Axis({ values: opts.axis ?? [10, 11, 12], quantity: 'wavelength', symbol: '\\lambda', unit: opts.unit ?? 'nm' }),
      new Axis({ quantity: 'dispersion coefficient', symbol: 'n' }),
    ],
    lowerBounds: opts.lowerBounds,
    upperBounds: opts.upperBounds,
  });
}

/** Three-point material; n and k share the axis, both with bounds. */
export function mockMaterial(symbol = 'Co'): Material {
  const m = new Material({ name: 'Cobalt', symbol });
  const axis = () => new Axis({ values: [10, 11, 12], quantity: 'wavelength', symbol: '\\lambda', unit: 'nm' });
  m.nData.axes[0] = axis();
  m.nData.data = [0.98, 0.985, 0.99];
  m.nData.lowerBounds = [0.97, 0.975, 0.98];
  m.nData.upperBounds = [0.99, 0.995, 1.0];
  m.kData.axes[0] = axis();
  m.kData.data = [0.02, 0.03, 0.04];
  m.kData.lowerBounds = [0.01, 0.02, 0.03];
  m.kData.upperBounds = [0.03, 0.04, 0.05];
  return m;
}
