// lib/io/importer.ts
// Importers turning a metadata file plus its data file into a Material.

import fs from 'node:fs';

import { FileNotFound, MalformedData, MissingInput, UnsupportedFormat } from '../errors';
import { createLogger } from '../log';
import { Axis } from '../material/axis';
import { Material } from '../material/material';
import { AXIS_UNITS } from '../processing/units';
import type { MetadataFile } from './metadata';
import { bundledReferences, type References } from './references';

const log = createLogger('import');

export abstract class DataImporter {
  metadata: MetadataFile | null;
  references: References;

  constructor(metadata: MetadataFile | null = null, references: References = bundledReferences()) {
    this.metadata = metadata;
    this.references = references;
  }

  get dataFilename(): string {
    return this.metadata?.file.name ?? '';
  }

  importData(): Material {
    const metadata = this.metadata;
    if (!metadata) throw new MissingInput('No metadata provided');

    const material = new Material({ name: metadata.material.name, symbol: metadata.material.symbol });
    material.metadata.comment = metadata.comment;
    material.metadata.date = metadata.date;
    material.metadata.uncertainties.confidenceInterval = metadata.uncertainties.confidenceInterval;
    material.references = metadata.references.filter(Boolean).map((key) => this.references.get(key));

    const filename = this.dataFilename;
    if (!filename) throw new MissingInput('No filename for data provided');
    if (!fs.existsSync(filename)) throw new FileNotFound(filename);

    this.importDataFile(material, filename);
    log.debug(`imported '${material.symbol}' from ${filename}`);
    return material;
  }

  protected abstract importDataFile(material: Material, filename: string): void;
}

/** Whitespace-separated numeric rows; `#` lines and blank lines are skipped. */
export function parseColumns(text: string): number[][] {
  const rows: number[][] = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    const row = trimmed.split(/\s+/).map(Number);
    if (row.some((x) => !Number.isFinite(x))) {
      throw new MalformedData(`Non-numeric value on line ${i + 1}: '${trimmed}'`);
    }
    rows.push(row);
  });
  return rows;
}

/**
 * Text data: columns λ/nm, n, k, and optionally n_lower, n_upper, k_lower, k_upper.
 */
export class TxtDataImporter extends DataImporter {
  protected importDataFile(material: Material, filename: string): void {
    const rows = parseColumns(fs.readFileSync(filename, 'utf8'));
    if (!rows.length) throw new MalformedData(`No data rows in ${filename}`);

    const width = rows[0].length;
    if (width !== 3 && width !== 7) {
      throw new MalformedData(`Expected 3 or 7 columns in ${filename}, found ${width}`);
    }
    if (rows.some((r) => r.length !== width)) {
      throw new MalformedData(`Inconsistent number of columns in ${filename}`);
    }

    const column = (j: number) => rows.map((r) => r[j]);
    const wavelengths = column(0);
    if (wavelengths.some((x, i) => x <= 0 || (i > 0 && x <= wavelengths[i - 1]))) {
      throw new MalformedData(`Wavelengths in ${filename} must be positive and strictly ascending`);
    }

    const axis = () => new Axis({ values: wavelengths, unit: 'nm', ...AXIS_UNITS.nm });
    material.nData.axes[0] = axis();
    material.kData.axes[0] = axis();
    material.nData.data = column(1);
    material.kData.data = column(2);
    if (width === 7) {
      material.nData.lowerBounds = column(3);
      material.nData.upperBounds = column(4);
      material.kData.lowerBounds = column(5);
      material.kData.upperBounds = column(6);
    }
  }
}

export class DataImporterFactory {
  references: References;

  constructor(references: References = bundledReferences()) {
    this.references = references;
  }

  getImporter(metadata?: MetadataFile | null): DataImporter {
    if (!metadata) throw new MissingInput('Missing metadata');
    switch (metadata.file.format) {
      case 'text':
        return new TxtDataImporter(metadata, this.references);
      default:
        throw new UnsupportedFormat(metadata.file.format);
    }
  }
}
