// lib/processing/units.ts
// SI 2019 exact constants and the wavelength/energy relation.

export const SPEED_OF_LIGHT = 299_792_458; // m/s
export const ELEMENTARY_CHARGE = 1.602176634e-19; // C
export const PLANCK_CONSTANT = 6.62607015e-34; // J s

/** h·c/e in nm·eV; E[eV] = HC_NM_EV / λ[nm] and vice versa. */
export const HC_NM_EV = (PLANCK_CONSTANT * SPEED_OF_LIGHT) / ELEMENTARY_CHARGE * 1e9;

export type AxisUnit = 'nm' | 'eV';

export const AXIS_UNITS: Record<AxisUnit, { quantity: string; symbol: string }> = {
  nm: { quantity: 'wavelength', symbol: '\\lambda' },
  eV: { quantity: 'energy', symbol: 'E' },
};

/** Case-insensitive match against the supported units; null if unknown. */
export function normalizeUnit(unit: string): AxisUnit | null {
  switch (unit.trim().toLowerCase()) {
    case 'nm':
      return 'nm';
    case 'ev':
      return 'eV';
    default:
      return null;
  }
}

/** The relation is its own inverse: nm → eV and eV → nm use the same formula. */
export function convertWavelengthEnergy(value: number): number {
  return HC_NM_EV / value;
}
