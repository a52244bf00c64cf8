#!/usr/bin/env node
// Load environment variables FIRST before any imports
import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config();

import { CommonsService } from './lib/commons/commons.service';
import { parsePreferences, preferencesFromEnv, resolveExportConfig } from './lib/config/export-config';
import { DEFAULT_PREFERENCES_FILE, FilePreferencesStore } from './lib/config/preferences.service';
import { registerCommonsStorage } from './lib/export/commons-storage';
import { readManifest } from './lib/export/manifest';
import { errorMessage } from './lib/errors';

const USAGE = 'Usage: commons-export <manifest.json>';

async function main(): Promise<number> {
  const manifestPath = process.argv[2];
  if (!manifestPath || manifestPath === '--help' || manifestPath === '-h') {
    console.log(USAGE);
    return manifestPath ? 0 : 1;
  }

  const preferences = new FilePreferencesStore(process.env.COMMONS_PREFERENCES_FILE || DEFAULT_PREFERENCES_FILE);
  const manifest = await readManifest(manifestPath);

  // defaults <- preferences file <- environment <- export dialog options
  const config = resolveExportConfig(
    await preferences.load(),
    parsePreferences(preferencesFromEnv(process.env), 'environment'),
    manifest.options
  );

  console.log(`[export] ${manifest.images.length} image(s) from ${manifestPath}`);
  console.log(`[export] Target: ${config.apiEndpoint}`);

  const client = new CommonsService({ apiEndpoint: config.apiEndpoint, userAgent: config.userAgent });
  const storage = await registerCommonsStorage(config, { client, preferences });
  if (!storage) {
    return 1;
  }

  const { results } = await storage.exportBatch(manifest.images);
  return results.every((result) => result.outcome.status === 'succeeded') ? 0 : 2;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Export failed:', errorMessage(error, String(error)));
    process.exitCode = 1;
  });
