import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FilePreferencesStore } from '../preferences.service';
import { ConfigError } from '../../errors';

describe('FilePreferencesStore', () => {
  let dir: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'commons-prefs-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads nothing when the file does not exist', async () => {
    const store = new FilePreferencesStore(path.join(dir, 'missing.json'));
    await expect(store.load()).resolves.toEqual({});
  });

  it('merges saved changes into the file', async () => {
    const file = path.join(dir, 'prefs.json');
    fs.writeFileSync(file, JSON.stringify({ username: 'Example', languageCode: 'fr' }));
    const store = new FilePreferencesStore(file);

    await store.save({ namingPattern: '$TITLE' });

    expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual({
      username: 'Example',
      languageCode: 'fr',
      namingPattern: '$TITLE',
    });
    await expect(store.load()).resolves.toEqual({ username: 'Example', languageCode: 'fr', namingPattern: '$TITLE' });
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(dir, 'prefs.json');
    fs.writeFileSync(file, '{ nope');

    await expect(new FilePreferencesStore(file).load()).rejects.toThrow(ConfigError);
  });
});
