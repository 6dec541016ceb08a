// lib/index.ts
// Public entry point.

import type { Collection } from './material/collection';
import { loadConfig } from './config';
import { setLogLevel } from './log';
import { CollectionCreator, type CollectionCreatorOptions } from './management/collectionCreator';

export * from '../types';
export * from './errors';
export { loadConfig, DEFAULT_CONFIG, type OpticalConstantsConfig } from './config';
export { createLogger, setLogLevel, getLogLevel, type Logger } from './log';

export { Axis, type AxisInit } from './material/axis';
export { Data, type DataInit } from './material/data';
export { Metadata, Uncertainties, Sample, Measurement } from './material/metadata';
export { formatReference, type Reference } from './material/reference';
export { Material, Version, type MaterialInit } from './material/material';
export { Collection, isValidSymbol, type CollectionOptions } from './material/collection';

export * from './processing/steps';
export { DefaultProcessingStepFactory, defaultProcessingStepFactory, type ProcessingStepFactory } from './processing/factory';
export { convertUnit, type UnitConversionParameters } from './processing/unitConversion';
export { interpolate, interpLinear, type InterpolationParameters } from './processing/interpolation';
export { parseReadOptions, ReadOptionsSchema, type ParsedReadOptions } from './processing/options';
export { HC_NM_EV, SPEED_OF_LIGHT, ELEMENTARY_CHARGE, PLANCK_CONSTANT, normalizeUnit, type AxisUnit } from './processing/units';

export { References, bundledReferences, BUNDLED_REFERENCES } from './io/references';
export { MetadataFile, VersionMetadata, createMetadataFile, METADATA_FORMAT, type MetadataDict } from './io/metadata';
export { DataImporter, TxtDataImporter, DataImporterFactory, parseColumns } from './io/importer';
export { CollectionCreator, type CollectionCreatorOptions } from './management/collectionCreator';

/**
 * Load a named collection (e.g. 'elements') from the configured db root,
 * applying the configured log level first.
 */
export function createCollection(name: string, options: CollectionCreatorOptions = {}): Collection {
  setLogLevel(loadConfig().logLevel);
  return new CollectionCreator(options).create(name);
}
