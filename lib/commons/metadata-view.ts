import * as path from 'path';
import type { ImageMetadata } from '../../types/commons';

/**
 * Read-only view of one image's metadata. Missing strings read as '',
 * missing numbers as undefined.
 */
export interface MetadataView {
  readonly path: string;
  readonly exportedPath: string;
  readonly filename: string;
  readonly title: string;
  readonly description: string;
  readonly creator: string | undefined;
  readonly rights: string;
  readonly latitude: number | undefined;
  readonly longitude: number | undefined;
  readonly dateTaken: string;
  readonly exifMaker: string;
  readonly exifModel: string;
  readonly exifLens: string;
  readonly exifAperture: number | undefined;
  readonly exifFocalLength: string;
  readonly exifIso: string;
  readonly tags: readonly string[];
}

function text(value: string | null | undefined): string {
  return value ?? '';
}

function num(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function createMetadataView(image: ImageMetadata): MetadataView {
  const tags = Object.freeze((image.tags || []).map((tag) => tag.name));

  return Object.freeze({
    path: image.path,
    exportedPath: image.exportedPath || image.path,
    filename: image.filename || path.basename(image.path),
    title: text(image.title),
    description: text(image.description),
    creator: image.creator ?? undefined,
    rights: text(image.rights),
    latitude: num(image.latitude),
    longitude: num(image.longitude),
    dateTaken: text(image.dateTaken),
    exifMaker: text(image.exifMaker),
    exifModel: text(image.exifModel),
    exifLens: text(image.exifLens),
    exifAperture: num(image.exifAperture),
    exifFocalLength: text(image.exifFocalLength),
    exifIso: text(image.exifIso),
    tags,
  });
}
