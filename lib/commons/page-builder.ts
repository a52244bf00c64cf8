import type { MetadataView } from './metadata-view';
import { classify } from './tag-classifier';
import { TOOL_NAME, TOOL_VERSION } from '../version';

export const DEFAULT_AUTHOR_PATTERN = '[[User:$USERNAME|$CREATOR]]';

export interface PageOptions {
  languageCode: string;
  authorPattern: string;
  username: string;
  categorizeCamera: boolean;
  titleInDescription: boolean;
  descriptionTemplates: readonly string[];
}

/**
 * Round to one decimal (half away from zero) and drop a trailing ".0".
 */
export function formatFloat(value: number): string {
  // toPrecision absorbs binary noise such as 2.85 * 10 = 28.499999999999996
  const scaled = Number((Math.abs(value) * 10).toPrecision(12));
  const rounded = (Math.sign(value) * Math.floor(scaled + 0.5)) / 10;
  return String(rounded === 0 ? 0 : rounded);
}

/**
 * EXIF "YYYY:MM:DD hh:mm:ss" to ISO 8601 "YYYY-MM-DD hh:mm:ss".
 */
export function formatExifDate(date: string): string {
  return date.replace(/(\d{4}):(\d{2}):(\d{2})/g, '$1-$2-$3');
}

export function getDescription(image: MetadataView, titleInDescription: boolean): string {
  if (titleInDescription && image.description !== '' && image.title !== '') {
    return `${image.title}: ${image.description}`;
  }
  return image.description !== '' ? image.description : image.title;
}

export function formatAuthor(pattern: string, username: string, creator: string | undefined): string {
  return pattern
    .split('$USERNAME')
    .join(username)
    .split('$CREATOR')
    .join(creator || username);
}

function formatNumericText(value: string): string {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  return trimmed !== '' && Number.isFinite(parsed) ? formatFloat(parsed) : trimmed;
}

function capitalizeMaker(maker: string): string {
  return maker.slice(0, 1).toUpperCase() + maker.slice(1).toLowerCase();
}

/**
 * Camera, aperture, focal length and ISO categories.
 */
export function cameraCategories(image: MetadataView): string[] {
  const lines: string[] = [];

  if (image.exifModel !== '') {
    const camera = `${capitalizeMaker(image.exifMaker)} ${image.exifModel}`;
    lines.push(
      image.exifLens !== ''
        ? `[[Category:Taken with ${camera} and ${image.exifLens}]]`
        : `[[Category:Taken with ${camera}]]`
    );
  }
  if (image.exifAperture !== undefined) {
    lines.push(`[[Category:F-number f/${formatFloat(image.exifAperture)}]]`);
  }
  if (image.exifFocalLength !== '') {
    lines.push(`[[Category:Lens focal length ${formatNumericText(image.exifFocalLength)} mm]]`);
  }
  if (image.exifIso !== '') {
    lines.push(`[[Category:ISO speed rating ${formatNumericText(image.exifIso)}]]`);
  }

  return lines;
}

/**
 * Build the wikitext of the file description page.
 */
export function buildImagePage(image: MetadataView, options: PageOptions): string {
  const tags = classify(image.tags, options.descriptionTemplates);

  const page = [
    '=={{int:filedesc}}==',
    '{{Information',
    `|description={{${options.languageCode}|1=${getDescription(image, options.titleInDescription)}}}` +
      tags.descriptionTemplates,
    `|date=${formatExifDate(image.dateTaken)}`,
    '|source={{own}}',
    `|author=${formatAuthor(options.authorPattern, options.username, image.creator)}`,
    `|other fields = ${tags.otherFields}`,
    '}}',
  ];

  if (image.latitude !== undefined && image.longitude !== undefined) {
    page.push(`{{Location |1=${image.latitude} |2=${image.longitude} }}`);
  }

  page.push('=={{int:license-header}}==');
  page.push(`{{self|${image.rights}}}`);
  page.push(...tags.categories, ...tags.freeformWikitext);

  if (options.categorizeCamera) {
    page.push(...cameraCategories(image));
  }

  page.push(`[[Category:Uploaded with ${TOOL_NAME} ${TOOL_VERSION}]]`);

  return page.join('\n');
}
