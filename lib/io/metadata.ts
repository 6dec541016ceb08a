// lib/io/metadata.ts
// Metadata file accompanying each dataset: what the data file is, which
// material it belongs to, how to cite it and which versions exist.

import fs from 'node:fs';
import { z } from 'zod';

import { FileNotFound, InvalidMetadata, MissingInput } from '../errors';
import { today } from '../material/metadata';

export const METADATA_FORMAT = { type: 'OCDB metadata file', version: '0.1' } as const;

export type VersionMetadataDict = {
  /** Metadata file of the alternative dataset, relative to the data directory. */
  metadata: string;
  description: string;
};

export type MetadataDict = {
  format: { type: string; version: string };
  file: { name: string; format: string };
  material: { name: string; symbol: string };
  uncertainties: { confidenceInterval: string };
  references: string[];
  date: string;
  versions: VersionMetadataDict[];
  comment: string;
};

const MetadataDictSchema = z.object({
  format: z.object({ type: z.string(), version: z.string() }),
  file: z.object({ name: z.string(), format: z.string() }).partial().optional(),
  material: z.object({ name: z.string(), symbol: z.string() }).partial().optional(),
  uncertainties: z.object({ confidenceInterval: z.string() }).partial().optional(),
  references: z.array(z.string()).optional(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-mm-dd').optional(),
  versions: z.array(z.object({ metadata: z.string(), description: z.string() })).optional(),
  comment: z.string().optional(),
});

export class VersionMetadata {
  metadata = '';
  description = '';

  toDict(): VersionMetadataDict {
    return { metadata: this.metadata, description: this.description };
  }
}

export class MetadataFile {
  file = { name: '', format: '' };
  material = { name: '', symbol: '' };
  uncertainties = { confidenceInterval: '' };
  /** Keys into the reference library, in citation order. */
  references: string[] = [];
  date: string = today();
  versions: VersionMetadata[] = [];
  comment = '';

  get format(): { type: string; version: string } {
    return { ...METADATA_FORMAT };
  }

  static fromFile(filename: string): MetadataFile {
    return new MetadataFile().fromFile(filename);
  }

  /**
   * Map a plain dict onto this instance.
   *
   * Unknown keys are ignored; partial `file`, `material` and `uncertainties`
   * records update the existing ones.
   */
  fromDict(metadata: unknown): this {
    const parsed = MetadataDictSchema.safeParse(metadata);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidMetadata(`Wrong metadata schema at '${issue.path.join('.')}': ${issue.message}`);
    }
    const d = parsed.data;
    if (d.format.type !== METADATA_FORMAT.type) {
      throw new InvalidMetadata(`Wrong metadata format '${d.format.type}'`);
    }

    this.file = { ...this.file, ...d.file };
    this.material = { ...this.material, ...d.material };
    this.uncertainties = { ...this.uncertainties, ...d.uncertainties };
    if (d.references) this.references = [...d.references];
    if (d.date) this.date = d.date;
    if (d.versions) {
      this.versions = d.versions.map((v) => {
        const version = new VersionMetadata();
        version.metadata = v.metadata;
        version.description = v.description;
        return version;
      });
    }
    if (d.comment !== undefined) this.comment = d.comment;
    return this;
  }

  fromFile(filename: string): this {
    if (!fs.existsSync(filename)) throw new FileNotFound(filename);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filename, 'utf8'));
    } catch (e) {
      throw new InvalidMetadata(`Metadata file ${filename} is not valid JSON: ${String(e)}`);
    }
    return this.fromDict(raw);
  }

  toDict(): MetadataDict {
    return {
      format: this.format,
      file: { ...this.file },
      material: { ...this.material },
      uncertainties: { ...this.uncertainties },
      references: [...this.references],
      date: this.date,
      versions: this.versions.map((v) => v.toDict()),
      comment: this.comment,
    };
  }
}

/** Write a metadata template (or the given metadata) as JSON. */
export function createMetadataFile(filename: string, metadata: MetadataFile = new MetadataFile()) {
  if (!filename) throw new MissingInput('No filename for metadata file provided');
  fs.writeFileSync(filename, `${JSON.stringify(metadata.toDict(), null, 2)}\n`, 'utf8');
}
