// lib/io/references.ts
// Library of bibliographic records, looked up by key from metadata files.

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import type { Reference } from '../material/reference';
import { FileNotFound, InvalidMetadata } from '../errors';

export const BUNDLED_REFERENCES = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../data/references.json',
);

const ReferenceSchema = z.object({
  key: z.string().min(1),
  type: z.enum(['article', 'dataset', 'book', 'misc']),
  authors: z.array(z.string()).nonempty(),
  title: z.string(),
  journal: z.string().optional(),
  volume: z.string().optional(),
  pages: z.string().optional(),
  year: z.number().int(),
  doi: z.string().optional(),
  url: z.string().optional(),
});

const LibrarySchema = z.object({
  records: z.array(ReferenceSchema),
});

export class References {
  private records = new Map<string, Reference>();

  static fromRecords(records: Reference[]): References {
    const refs = new References();
    for (const r of records) refs.records.set(r.key, r);
    return refs;
  }

  /** Replace the records with the ones stored in a JSON library file. */
  load(filename: string = BUNDLED_REFERENCES): this {
    if (!fs.existsSync(filename)) throw new FileNotFound(filename);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filename, 'utf8'));
    } catch (e) {
      throw new InvalidMetadata(`Reference library ${filename} is not valid JSON: ${String(e)}`);
    }
    const parsed = LibrarySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidMetadata(`Wrong reference library schema at ${issue.path.join('.')}: ${issue.message}`);
    }
    this.records = new Map(parsed.data.records.map((r) => [r.key, r]));
    return this;
  }

  get size(): number {
    return this.records.size;
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  get(key: string): Reference {
    const record = this.records.get(key);
    if (!record) throw new InvalidMetadata(`Unknown reference key '${key}'`);
    return { ...record, authors: [...record.authors] };
  }
}

let bundled: References | null = null;

export function bundledReferences(): References {
  if (!bundled) bundled = new References().load();
  return bundled;
}
