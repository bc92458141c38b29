/**
 * Layered Configuration
 *
 * A configuration is an ordered stack of flat string layers. Keys use `:` as
 * the section separator (`database:password`). Later layers win; layers are
 * copied on insert and never mutated afterwards, so appending a layer of
 * resolved secrets leaves the original references intact underneath.
 */

import { readFile } from 'fs/promises';

export type ConfigurationValues = Iterable<readonly [string, string | undefined]>;

export const KEY_DELIMITER = ':';

/**
 * Immutable view of every layer merged together.
 */
export class Configuration {
  private readonly values: ReadonlyMap<string, string | undefined>;

  constructor(values: ReadonlyMap<string, string | undefined>) {
    this.values = values;
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, string | undefined]> {
    return [...this.values.entries()];
  }

  toRecord(): Record<string, string | undefined> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Flattens nested objects into `:`-delimited keys. Arrays are keyed by index,
 * scalars are stringified and null becomes an empty string.
 */
export function flattenObject(value: unknown, prefix: string = ''): Array<[string, string]> {
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => flattenObject(item, joinKey(prefix, String(index))));
  }

  if (typeof value === 'object' && value !== null) {
    return Object.entries(value).flatMap(([key, child]) => flattenObject(child, joinKey(prefix, key)));
  }

  if (prefix === '') {
    return [];
  }

  return [[prefix, value === null || value === undefined ? '' : String(value)]];
}

function joinKey(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}${KEY_DELIMITER}${key}`;
}

export class ConfigurationBuilder {
  private readonly layers: Array<ReadonlyMap<string, string | undefined>> = [];

  /**
   * Appends a layer of flat key/value pairs, e.g. a Map or `Object.entries(record)`.
   */
  addInMemory(values: ConfigurationValues): this {
    this.layers.push(new Map(values));
    return this;
  }

  /**
   * Appends a nested object as one flattened layer.
   */
  addObject(value: Record<string, unknown>): this {
    return this.addInMemory(flattenObject(value));
  }

  async addJsonFile(path: string, options: { optional?: boolean } = {}): Promise<this> {
    let contents: string;
    try {
      contents = await readFile(path, 'utf-8');
    } catch (error) {
      if (options.optional) {
        return this;
      }
      throw new Error(`Failed to read configuration file ${path}`, { cause: error });
    }

    const parsed: unknown = JSON.parse(contents);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Configuration file ${path} must contain a JSON object`);
    }
    return this.addInMemory(flattenObject(parsed));
  }

  /**
   * Appends environment variables as a layer. With a prefix only matching
   * variables are taken and the prefix is stripped; `__` maps to `:`.
   */
  addEnvironment(prefix: string = '', env: NodeJS.ProcessEnv = process.env): this {
    const entries: Array<[string, string | undefined]> = [];
    for (const [name, value] of Object.entries(env)) {
      if (!name.startsWith(prefix)) {
        continue;
      }
      entries.push([name.slice(prefix.length).split('__').join(KEY_DELIMITER), value]);
    }
    return this.addInMemory(entries);
  }

  get layerCount(): number {
    return this.layers.length;
  }

  /**
   * Merges all layers into a snapshot. Building never changes the layers.
   */
  build(): Configuration {
    const merged = new Map<string, string | undefined>();
    for (const layer of this.layers) {
      for (const [key, value] of layer) {
        merged.set(key, value);
      }
    }
    return new Configuration(merged);
  }
}
