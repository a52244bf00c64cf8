import { v4 as uuidv4 } from 'uuid';
import type { BatchSummary, ExportLog, UploadOutcome } from '../../types/commons';
import type { MetadataView } from '../commons/metadata-view';
import { EligibilityError } from '../errors';

export const SKIP_REASON_NO_RIGHTS = 'no rights';
export const SKIP_REASON_NO_TITLE = 'no meaningful title/description';

export type Ineligible = {
  error: EligibilityError;
  logLine: string;
};

export type EligibilityResult = {
  eligible: MetadataView[];
  totalCount: number;
  skipped: { image: MetadataView; outcome: Extract<UploadOutcome, { status: 'skipped' }> }[];
};

/**
 * Per-batch accounting: which images go out, how many made it.
 */
export class BatchService {
  readonly batchId: string;
  private log: ExportLog;
  private initialCount = 0;
  private succeededCount = 0;

  constructor(log: ExportLog = (message) => console.log(message)) {
    this.batchId = uuidv4();
    this.log = log;
  }

  /**
   * Check a single image. Returns the skip error and the line to log, or null if it can go out.
   */
  checkEligibility(image: MetadataView): Ineligible | null {
    if (image.rights === '') {
      return {
        error: new EligibilityError(SKIP_REASON_NO_RIGHTS),
        logLine: `Error: ${image.path} has no rights, cannot be exported to Wikimedia Commons`,
      };
    }
    if (image.title === '' && image.description === '') {
      return {
        error: new EligibilityError(SKIP_REASON_NO_TITLE),
        logLine: `Error: ${image.path} is missing a meaningful title and/or description, won't be exported to Wikimedia Commons`,
      };
    }
    return null;
  }

  /**
   * Drop images that can't be exported and remember how many were offered.
   */
  filterEligible(images: readonly MetadataView[]): EligibilityResult {
    const eligible: MetadataView[] = [];
    const skipped: EligibilityResult['skipped'] = [];

    for (const image of images) {
      const ineligible = this.checkEligibility(image);
      if (!ineligible) {
        eligible.push(image);
        continue;
      }

      const { error, logLine } = ineligible;
      this.log(logLine);
      skipped.push({ image, outcome: { status: 'skipped', reason: error.message, error } });
    }

    this.initialCount = images.length;
    return { eligible, totalCount: images.length, skipped };
  }

  recordResult(image: MetadataView, outcome: UploadOutcome): void {
    if (outcome.status === 'succeeded') {
      this.succeededCount += 1;
    }
  }

  summary(): BatchSummary {
    return {
      batchId: this.batchId,
      initialCount: this.initialCount,
      succeededCount: this.succeededCount,
    };
  }

  /**
   * Report the batch result once every image has been handled.
   */
  finalize(): string {
    const message = `exported ${this.succeededCount}/${this.initialCount} images`;
    this.log(message);
    return message;
  }
}
