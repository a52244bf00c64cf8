import { z } from 'zod';
import { ConfigError } from '../errors';
import { DEFAULT_NAMING_PATTERN } from '../commons/name-resolver';
import { DEFAULT_AUTHOR_PATTERN } from '../commons/page-builder';
import { parseTemplatePrefixes } from '../commons/tag-classifier';
import { TOOL_NAME, TOOL_VERSION } from '../version';

export const DEFAULT_DESCRIPTION_TEMPLATES = 'Description,Depicted person,en,de,fr,es,ja,ru,zh,it,pt,ar';
export const DEFAULT_COMMENT = `Uploaded with ${TOOL_NAME} ${TOOL_VERSION}`;
export const DEFAULT_API_ENDPOINT = 'https://commons.wikimedia.org/w/api.php';
export const DEFAULT_USER_AGENT = `${TOOL_NAME}/${TOOL_VERSION} (https://www.npmjs.com/package/${TOOL_NAME})`;

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'].includes(value), {
      message: 'Expected a boolean flag',
    })
    .transform((value) => ['1', 'true', 'yes', 'on'].includes(value)),
]);

/**
 * Settings persisted between runs (the preferences file) and per-batch
 * options share this shape.
 */
export const preferencesSchema = z
  .object({
    username: z.string(),
    password: z.string(),
    overwrite: booleanFlag,
    categorizeCamera: booleanFlag,
    descriptionTemplates: z.string(),
    namingPattern: z.string(),
    authorPattern: z.string(),
    titleInDescription: booleanFlag,
    languageCode: z.string().trim().min(1),
    comment: z.string(),
    apiEndpoint: z.string().url(),
    userAgent: z.string().min(1),
  })
  .partial();

export type Preferences = z.infer<typeof preferencesSchema>;

export type ExportConfig = {
  username: string;
  password: string;
  overwrite: boolean;
  categorizeCamera: boolean;
  descriptionTemplates: string[];
  namingPattern: string;
  authorPattern: string;
  titleInDescription: boolean;
  languageCode: string;
  comment: string;
  apiEndpoint: string;
  userAgent: string;
};

const ENV_KEYS: Record<keyof Preferences, string> = {
  username: 'COMMONS_USERNAME',
  password: 'COMMONS_PASSWORD',
  overwrite: 'COMMONS_OVERWRITE',
  categorizeCamera: 'COMMONS_CATEGORIZE_CAMERA',
  descriptionTemplates: 'COMMONS_DESC_TEMPLATES',
  namingPattern: 'COMMONS_NAME_PATTERN',
  authorPattern: 'COMMONS_AUTHOR_PATTERN',
  titleInDescription: 'COMMONS_TITLE_IN_DESCRIPTION',
  languageCode: 'COMMONS_LANGUAGE',
  comment: 'COMMONS_COMMENT',
  apiEndpoint: 'COMMONS_API_ENDPOINT',
  userAgent: 'COMMONS_USER_AGENT',
};

/**
 * Pick the COMMONS_* variables that are set.
 */
export function preferencesFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return raw;
}

export function parsePreferences(input: unknown, source: string): Preferences {
  const parsed = preferencesSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Merge configuration layers, later ones winning, over the defaults.
 * Loaded once per batch and passed to every component from there on.
 */
export function resolveExportConfig(...layers: Preferences[]): ExportConfig {
  const merged: Preferences = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  return {
    username: merged.username ?? '',
    password: merged.password ?? '',
    overwrite: merged.overwrite ?? false,
    categorizeCamera: merged.categorizeCamera ?? false,
    descriptionTemplates: parseTemplatePrefixes(merged.descriptionTemplates ?? DEFAULT_DESCRIPTION_TEMPLATES),
    namingPattern: merged.namingPattern ?? DEFAULT_NAMING_PATTERN,
    authorPattern: merged.authorPattern ?? DEFAULT_AUTHOR_PATTERN,
    titleInDescription: merged.titleInDescription ?? true,
    languageCode: merged.languageCode ?? 'en',
    comment: merged.comment ?? DEFAULT_COMMENT,
    apiEndpoint: merged.apiEndpoint ?? DEFAULT_API_ENDPOINT,
    userAgent: merged.userAgent ?? DEFAULT_USER_AGENT,
  };
}
