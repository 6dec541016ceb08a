// lib/processing/unitConversion.ts

import type { Data } from '../material/data';
import { UnsupportedUnit } from '../errors';
import { AXIS_UNITS, convertWavelengthEnergy, normalizeUnit } from './units';

export type UnitConversionParameters = {
  /** Target unit; empty means no conversion. */
  unit: string;
};

/**
 * Remap the independent axis between nm and eV.
 *
 * Only axis-0 values and labels change; data and bounds are left as they are.
 * Works in place on the Data it is given.
 */
export function convertUnit(data: Data, parameters: UnitConversionParameters): Data {
  if (!parameters.unit) return data;

  const target = normalizeUnit(parameters.unit);
  if (!target) throw new UnsupportedUnit(parameters.unit);

  const axis = data.axes[0];
  const current = normalizeUnit(axis.unit);
  if (!current) throw new UnsupportedUnit(axis.unit);
  if (current === target) return data;

  axis.values = axis.values.map(convertWavelengthEnergy);
  axis.unit = target;
  axis.quantity = AXIS_UNITS[target].quantity;
  axis.symbol = AXIS_UNITS[target].symbol;
  return data;
}
