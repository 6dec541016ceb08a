// lib/management/collectionCreator.ts
// Builds a Collection from a directory of metadata files and their data files.
//
// Layout below the db root:
//   metadata/<collection>/*.json   one metadata file per material
//   data/<file>                    data files, and metadata files of versions

import fs from 'node:fs';
import path from 'node:path';

import type { DuplicateSymbolPolicy } from '../../types';
import { loadConfig } from '../config';
import { FileNotFound, MissingInput } from '../errors';
import { DataImporterFactory } from '../io/importer';
import { MetadataFile } from '../io/metadata';
import { createLogger } from '../log';
import { Collection } from '../material/collection';
import { Material, Version } from '../material/material';
import { defaultProcessingStepFactory, type ProcessingStepFactory } from '../processing/factory';

const log = createLogger('collection');

export type CollectionCreatorOptions = {
  dbRoot?: string;
  duplicateSymbols?: DuplicateSymbolPolicy;
  processingStepFactory?: ProcessingStepFactory;
  importerFactory?: DataImporterFactory;
};

export class CollectionCreator {
  name = '';
  readonly dbRoot: string;
  readonly duplicateSymbols: DuplicateSymbolPolicy;
  private processingStepFactory: ProcessingStepFactory;
  private importerFactory: DataImporterFactory;

  constructor(options: CollectionCreatorOptions = {}) {
    const config = loadConfig();
    this.dbRoot = options.dbRoot ?? config.dbRoot;
    this.duplicateSymbols = options.duplicateSymbols ?? config.duplicateSymbols;
    this.processingStepFactory = options.processingStepFactory ?? defaultProcessingStepFactory;
    this.importerFactory = options.importerFactory ?? new DataImporterFactory();
  }

  get metadataDir(): string {
    return path.join(this.dbRoot, 'metadata', this.name);
  }

  get dataDir(): string {
    return path.join(this.dbRoot, 'data');
  }

  create(name = ''): Collection {
    if (name) this.name = name;
    if (!this.name) throw new MissingInput('No name provided for collection');
    if (!fs.existsSync(this.metadataDir) || !fs.statSync(this.metadataDir).isDirectory()) {
      throw new FileNotFound(this.metadataDir);
    }

    const collection = new Collection({ duplicateSymbols: this.duplicateSymbols });
    const files = fs
      .readdirSync(this.metadataDir)
      .filter((f) => f.endsWith('.json'))
      .sort();

    for (const file of files) {
      const metadata = this.readMetadata(path.join(this.metadataDir, file));
      const material = this.importMaterial(metadata);
      this.addVersions(material, metadata);
      collection.add(material);
      log.info(`loaded '${material.symbol}' (${material.versions.length} versions) into '${this.name}'`);
    }
    return collection;
  }

  private readMetadata(filename: string): MetadataFile {
    const metadata = MetadataFile.fromFile(filename);
    metadata.file.name = path.join(this.dataDir, metadata.file.name);
    return metadata;
  }

  private importMaterial(metadata: MetadataFile): Material {
    const material = this.importerFactory.getImporter(metadata).importData();
    material.processingStepFactory = this.processingStepFactory;
    return material;
  }

  private addVersions(material: Material, metadata: MetadataFile) {
    for (const v of metadata.versions) {
      const versionMetadata = this.readMetadata(path.join(this.dataDir, v.metadata));
      material.versions.push(new Version(this.importMaterial(versionMetadata), v.description));
      log.debug(`attached version '${v.description}' to '${material.symbol}'`);
    }
  }
}
