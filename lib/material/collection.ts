// lib/material/collection.ts

import type { DuplicateSymbolPolicy } from '../../types';
import { DuplicateSymbol, InvalidSymbol } from '../errors';
import { createLogger } from '../log';
import type { Material } from './material';

const log = createLogger('collection');

const SYMBOL_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidSymbol(symbol: string): boolean {
  return SYMBOL_RE.test(symbol);
}

export type CollectionOptions = {
  /** What `add` does with a symbol already present. Defaults to 'reject'. */
  duplicateSymbols?: DuplicateSymbolPolicy;
};

/**
 * Materials keyed by their (case-sensitive) symbol, iterated in insertion order.
 *
 * Built once by a loader and read afterwards; no locking.
 */
export class Collection implements Iterable<Material> {
  readonly duplicateSymbols: DuplicateSymbolPolicy;
  private items = new Map<string, Material>();

  constructor(options: CollectionOptions = {}) {
    this.duplicateSymbols = options.duplicateSymbols ?? 'reject';
  }

  add(material: Material): void {
    const symbol = material.symbol;
    if (!isValidSymbol(symbol)) throw new InvalidSymbol(symbol);
    if (this.items.has(symbol)) {
      if (this.duplicateSymbols === 'reject') throw new DuplicateSymbol(symbol);
      log.warn(`replacing material '${symbol}'`);
    }
    // Map.set keeps the original insertion slot on replace.
    this.items.set(symbol, material);
  }

  get(symbol: string): Material | undefined {
    return this.items.get(symbol);
  }

  has(symbol: string): boolean {
    return this.items.has(symbol);
  }

  get size(): number {
    return this.items.size;
  }

  symbols(): string[] {
    return [...this.items.keys()];
  }

  [Symbol.iterator](): Iterator<Material> {
    return this.items.values();
  }
}
