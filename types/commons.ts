import type { CommonsExportError, EligibilityError } from '../lib/errors';

export type Tag = {
  name: string;
};

/**
 * Per-image record handed over by the host application.
 * Fields the host could not fill may be missing or null.
 */
export type ImageMetadata = {
  path: string;
  exportedPath?: string;
  filename: string;
  title?: string | null;
  description?: string | null;
  creator?: string | null;
  rights?: string | null;
  latitude?: number | null;
  longitude?: number | null;
  dateTaken?: string | null;
  exifMaker?: string | null;
  exifModel?: string | null;
  exifLens?: string | null;
  exifAperture?: number | null;
  exifFocalLength?: string | null;
  exifIso?: string | null;
  tags?: Tag[];
};

export type UploadOutcome =
  | {
      status: 'succeeded';
      pageName: string;
      descriptionUrl?: string;
      warnings?: unknown;
    }
  | {
      status: 'skipped';
      reason: string;
      error: EligibilityError;
    }
  | {
      status: 'failed';
      pageName: string;
      reason: string;
      error: CommonsExportError;
      warnings?: unknown;
    };

export type BatchSummary = {
  batchId: string;
  initialCount: number;
  succeededCount: number;
};

export type ClassifiedTags = {
  descriptionTemplates: string;
  otherFields: string;
  categories: string[];
  freeformWikitext: string[];
};

/**
 * Sink for user-visible progress lines.
 */
export type ExportLog = (message: string) => void;
