import type { ExportLog, ImageMetadata, UploadOutcome } from '../../types/commons';
import type { ExportConfig } from '../config/export-config';
import type { PreferencesStore } from '../config/preferences.service';
import type { UploadClient } from '../commons/commons.service';
import { createMetadataView, type MetadataView } from '../commons/metadata-view';
import { makeImageName } from '../commons/name-resolver';
import { buildImagePage } from '../commons/page-builder';
import { BatchService } from '../services/batch.service';
import { formatDetectionService } from '../services/format-detection.service';
import { TransportError, errorMessage } from '../errors';

export interface CommonsStorageDeps {
  client: UploadClient;
  preferences: PreferencesStore;
  log?: ExportLog;
}

export type StoredImage = {
  image: MetadataView;
  outcome: UploadOutcome;
};

function defaultLog(message: string): void {
  console.log(message);
}

/**
 * The "Wikimedia Commons" export target. One instance per run, one
 * BatchService per batch.
 */
export class CommonsStorage {
  private config: ExportConfig;
  private client: UploadClient;
  private preferences: PreferencesStore;
  private log: ExportLog;
  private batch: BatchService | null = null;

  constructor(config: ExportConfig, deps: CommonsStorageDeps) {
    this.config = config;
    this.client = deps.client;
    this.preferences = deps.preferences;
    this.log = deps.log || defaultLog;
  }

  /**
   * Check if an export format can be handed to this storage
   */
  supports(extension: string): boolean {
    return formatDetectionService.isSupported(extension);
  }

  /**
   * Start a batch: filter the images once and persist the naming pattern
   * in use. Returns the images that will be stored.
   */
  async initialize(images: readonly ImageMetadata[]): Promise<MetadataView[]> {
    this.batch = new BatchService(this.log);
    const { eligible } = this.batch.filterEligible(images.map(createMetadataView));

    const accepted = eligible.filter((image) => {
      const format = formatDetectionService.detectFormat(image.exportedPath);
      if (!format.isSupported) {
        this.log(`Error: ${image.path} was exported as "${format.extension || 'unknown'}", which Commons storage does not accept`);
      }
      return format.isSupported;
    });

    await this.rememberNamingPattern();

    return accepted;
  }

  // A failed write-back is logged; the batch goes on with the configured pattern.
  private async rememberNamingPattern(): Promise<void> {
    try {
      const stored = await this.preferences.load();
      if (stored.namingPattern !== this.config.namingPattern) {
        await this.preferences.save({ namingPattern: this.config.namingPattern });
      }
    } catch (error) {
      console.error('[commons-storage] ❌ Could not save the naming pattern:', errorMessage(error, 'unknown error'));
    }
  }

  /**
   * Upload one image and its description page.
   */
  async store(image: MetadataView): Promise<UploadOutcome> {
    const batch = this.requireBatch();
    const pageName = makeImageName(image, image.exportedPath, this.config.namingPattern);

    let outcome: UploadOutcome;
    try {
      const pageText = buildImagePage(image, {
        languageCode: this.config.languageCode,
        authorPattern: this.config.authorPattern,
        username: this.config.username,
        categorizeCamera: this.config.categorizeCamera,
        titleInDescription: this.config.titleInDescription,
        descriptionTemplates: this.config.descriptionTemplates,
      });

      outcome = await this.client.uploadFile(
        image.exportedPath,
        pageText,
        pageName,
        this.config.overwrite,
        this.config.comment
      );
    } catch (error) {
      const failure = new TransportError(errorMessage(error, 'Upload failed'), { cause: error });
      outcome = { status: 'failed', pageName, reason: failure.message, error: failure };
    }

    batch.recordResult(image, outcome);

    if (outcome.status === 'succeeded') {
      this.log(`exported ${outcome.pageName}`);
    } else {
      this.log(`Failed to export ${pageName}: ${outcome.reason}`);
      console.error(`[commons-storage] ❌ ${image.path}:`, outcome.error);
    }

    return outcome;
  }

  /**
   * Report the batch once every store call has finished.
   */
  finalize(): string {
    const batch = this.requireBatch();
    const message = batch.finalize();
    this.batch = null;
    return message;
  }

  /**
   * Run a whole batch, one image at a time in the order given.
   */
  async exportBatch(images: readonly ImageMetadata[]): Promise<{ summary: string; results: StoredImage[] }> {
    const accepted = await this.initialize(images);
    const results: StoredImage[] = [];

    for (const image of accepted) {
      const outcome = await this.store(image);
      results.push({ image, outcome });
    }

    const batchId = this.requireBatch().batchId;
    const summary = this.finalize();
    console.log(`[commons-storage] Batch ${batchId} done: ${summary}`);

    return { summary, results };
  }

  private requireBatch(): BatchService {
    if (!this.batch) {
      throw new Error('No batch in progress: call initialize() first');
    }
    return this.batch;
  }
}

/**
 * Log in once and hand back the storage, or null when login fails: the
 * export target is then not offered for the rest of the run.
 */
export async function registerCommonsStorage(
  config: ExportConfig,
  deps: CommonsStorageDeps
): Promise<CommonsStorage | null> {
  const log = deps.log || defaultLog;

  const loggedIn = await deps.client.login(config.username, config.password);
  if (!loggedIn) {
    log('Unable to log into Wikimedia Commons, export disabled.');
    return null;
  }

  return new CommonsStorage(config, { ...deps, log });
}
