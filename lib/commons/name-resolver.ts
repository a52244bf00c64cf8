import * as path from 'path';
import type { MetadataView } from './metadata-view';

export const DEFAULT_NAMING_PATTERN = '$TITLE ($FILE_NAME) $DESCRIPTION';

// MediaWiki refuses these in file names
const ILLEGAL_TITLE_CHARS = /[#<>[\]|{}/]/g;

/**
 * Basename of the input image: everything before the first dot.
 */
export function fileBaseName(filename: string): string {
  const dot = filename.indexOf('.');
  return dot === -1 ? filename : filename.slice(0, dot);
}

function substitute(pattern: string, values: { title: string; fileName: string; description: string }): string {
  return pattern.replace(/\$(TITLE|FILE_NAME|DESCRIPTION)/g, (_match, name: string) => {
    switch (name) {
      case 'TITLE':
        return values.title;
      case 'FILE_NAME':
        return values.fileName;
      default:
        return values.description;
    }
  });
}

/**
 * Resolve the `File:` page name (without extension) from the naming pattern.
 *
 * With both title and description available every placeholder is replaced.
 * Otherwise a pattern that asks for both falls back to
 * `$TITLE$DESCRIPTION ($FILE_NAME)`, and any other pattern gets whichever
 * of the two is set in place of both placeholders.
 */
export function resolve(pattern: string, title: string, description: string, baseName: string): string {
  if (title !== '' && description !== '') {
    return substitute(pattern, { title, fileName: baseName, description });
  }

  const presentData = title + description;
  if (pattern.includes('$TITLE') && pattern.includes('$DESCRIPTION')) {
    return `${presentData} (${baseName})`;
  }

  return substitute(pattern, { title: presentData, fileName: baseName, description: presentData });
}

/**
 * Full target file name for an image: resolved pattern plus the extension
 * of the exported temporary file.
 */
export function makeImageName(image: MetadataView, exportedPath: string, pattern: string): string {
  const baseName = fileBaseName(image.filename);
  const effectivePattern = pattern.trim() === '' ? DEFAULT_NAMING_PATTERN : pattern;

  let name = resolve(effectivePattern, image.title, image.description, baseName)
    .replace(ILLEGAL_TITLE_CHARS, '-')
    .trim();
  if (name === '') {
    name = baseName.trim() || 'Untitled';
  }

  const ext = path.extname(exportedPath).slice(1);
  return ext ? `${name}.${ext}` : name;
}
