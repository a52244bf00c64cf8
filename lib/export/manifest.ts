import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { ImageMetadata } from '../../types/commons';
import { ConfigError } from '../errors';
import type { Preferences } from '../config/export-config';

const optionalText = z.string().nullish();
const optionalNumber = z.number().finite().nullish();

const imageSchema = z.object({
  path: z.string().min(1),
  exportedPath: z.string().min(1).optional(),
  filename: z.string().optional(),
  title: optionalText,
  description: optionalText,
  creator: optionalText,
  rights: optionalText,
  latitude: optionalNumber,
  longitude: optionalNumber,
  dateTaken: optionalText,
  exifMaker: optionalText,
  exifModel: optionalText,
  exifLens: optionalText,
  exifAperture: optionalNumber,
  // hosts write these either as text or as plain numbers
  exifFocalLength: z.union([z.string(), z.number()]).nullish(),
  exifIso: z.union([z.string(), z.number()]).nullish(),
  tags: z.array(z.union([z.string(), z.object({ name: z.string() })])).default([]),
});

/**
 * Per-batch options, the fields of the export dialog.
 */
const optionsSchema = z
  .object({
    namingPattern: z.string(),
    comment: z.string(),
    languageCode: z.string().trim().min(1),
  })
  .partial();

export const manifestSchema = z.object({
  options: optionsSchema.default({}),
  images: z.array(imageSchema),
});

export type ExportManifest = {
  options: Preferences;
  images: ImageMetadata[];
};

function asText(value: string | number | null | undefined): string | null | undefined {
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Validate a manifest and turn it into host records. Relative paths are
 * taken from `baseDir`.
 */
export function parseManifest(input: unknown, baseDir: string): ExportManifest {
  const parsed = manifestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid export manifest: ${issues.join('; ')}`);
  }

  const images = parsed.data.images.map((image): ImageMetadata => {
    const imagePath = path.resolve(baseDir, image.path);
    return {
      ...image,
      path: imagePath,
      exportedPath: image.exportedPath ? path.resolve(baseDir, image.exportedPath) : imagePath,
      filename: image.filename || path.basename(imagePath),
      exifFocalLength: asText(image.exifFocalLength),
      exifIso: asText(image.exifIso),
      tags: image.tags.map((tag) => (typeof tag === 'string' ? { name: tag } : tag)),
    };
  });

  return { options: parsed.data.options, images };
}

export async function readManifest(manifestPath: string): Promise<ExportManifest> {
  const absolute = path.resolve(manifestPath);

  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(absolute, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Failed to read manifest ${absolute}`, { cause: error });
  }

  return parseManifest(json, path.dirname(absolute));
}
