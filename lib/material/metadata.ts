// lib/material/metadata.ts
// Descriptive, non-numeric context of a dataset.

export const today = () => new Date().toISOString().slice(0, 10);

export class Uncertainties {
  /** Statistical meaning of the stored bounds, e.g. "3 sigma". */
  confidenceInterval = '';
}

export class Sample {
  /** Layer thickness in nm, if known. */
  thickness: number | null = null;
  substrate = '';
  layerStack = '';
  morphology = '';
}

export class Measurement {
  type = '';
  facility = '';
  beamline = '';
  date: string = today();
}

export class Metadata {
  uncertainties = new Uncertainties();
  sample = new Sample();
  measurement = new Measurement();
  /** Creation date of the dataset (yyyy-mm-dd). */
  date: string = today();
  comment = '';
}
