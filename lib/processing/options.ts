// lib/processing/options.ts
// Validation of the read options record at the Material API boundary.

import { z } from 'zod';

import type { InterpolationKind, ProcessingOptions } from '../../types';
import { InvalidOptions } from '../errors';

const finite = z.number().finite();

export const ReadOptionsSchema = z.object({
  values: z.union([finite, z.array(finite).nonempty()]).optional(),
  interpolation: z.enum(['linear', 'none']).optional(),
  uncertainties: z.boolean().optional(),
  unit: z.string().optional(),
});

export type ParsedReadOptions = {
  processing: ProcessingOptions;
  uncertainties: boolean;
  /** True when a single value was requested; results are unpacked to scalars. */
  scalar: boolean;
};

/** Accepts unvalidated input; ReadOptions is the shape it must have. */
export function parseReadOptions(options: unknown = {}): ParsedReadOptions {
  const parsed = ReadOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidOptions(`Invalid read option '${issue.path.join('.') || 'options'}': ${issue.message}`);
  }
  const { values, interpolation, uncertainties, unit } = parsed.data;
  const kind: InterpolationKind = interpolation ?? 'linear';
  return {
    processing: {
      values: values === undefined ? null : typeof values === 'number' ? [values] : [...values],
      interpolation: kind,
      unit: unit ?? '',
    },
    uncertainties: uncertainties ?? false,
    scalar: typeof values === 'number',
  };
}
