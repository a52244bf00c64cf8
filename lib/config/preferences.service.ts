import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError } from '../errors';
import { parsePreferences, type Preferences } from './export-config';

export const DEFAULT_PREFERENCES_FILE = '.commons-export.json';

/**
 * Persisted settings. `save` is the only place configuration gets written.
 */
export interface PreferencesStore {
  load(): Promise<Preferences>;
  save(changes: Preferences): Promise<void>;
}

export class FilePreferencesStore implements PreferencesStore {
  private filePath: string;

  constructor(filePath: string = DEFAULT_PREFERENCES_FILE) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<Preferences> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new ConfigError(`Failed to read preferences from ${this.filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Preferences file ${this.filePath} is not valid JSON`, { cause: error });
    }
    return parsePreferences(json, this.filePath);
  }

  async save(changes: Preferences): Promise<void> {
    const current = await this.load();
    const next = { ...current, ...changes };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(next, null, 2)}\n`, 'utf8');
    console.log(`[preferences] ✓ Saved ${Object.keys(changes).join(', ')} to ${this.filePath}`);
  }
}

/**
 * In-memory store, for runs without a preferences file.
 */
export class MemoryPreferencesStore implements PreferencesStore {
  private values: Preferences;

  constructor(initial: Preferences = {}) {
    this.values = { ...initial };
  }

  async load(): Promise<Preferences> {
    return { ...this.values };
  }

  async save(changes: Preferences): Promise<void> {
    this.values = { ...this.values, ...changes };
  }
}
