import { describe, it, expect } from '@jest/globals';
import { parseManifest } from '../manifest';
import { ConfigError } from '../../errors';

describe('parseManifest', () => {
  it('turns manifest entries into host records', () => {
    const manifest = parseManifest(
      {
        options: { namingPattern: '$TITLE', languageCode: 'de' },
        images: [
          {
            path: 'raw/img001.CR2',
            exportedPath: 'out/img001.jpg',
            title: 'Sunset',
            rights: 'CC0',
            exifFocalLength: 35,
            exifIso: '400',
            tags: ['Category:Lakes', { name: '{{Panorama}}' }],
          },
        ],
      },
      '/work'
    );

    expect(manifest.options).toEqual({ namingPattern: '$TITLE', languageCode: 'de' });
    expect(manifest.images).toEqual([
      {
        path: '/work/raw/img001.CR2',
        exportedPath: '/work/out/img001.jpg',
        filename: 'img001.CR2',
        title: 'Sunset',
        rights: 'CC0',
        exifFocalLength: '35',
        exifIso: '400',
        tags: [{ name: 'Category:Lakes' }, { name: '{{Panorama}}' }],
      },
    ]);
  });

  it('defaults the exported file to the source file', () => {
    const manifest = parseManifest({ images: [{ path: '/photos/a.png' }] }, '/work');

    expect(manifest.options).toEqual({});
    expect(manifest.images[0].exportedPath).toBe('/photos/a.png');
    expect(manifest.images[0].tags).toEqual([]);
  });

  it('reports where the manifest is wrong', () => {
    expect(() => parseManifest({ images: [{ path: '' }] }, '/work')).toThrow(ConfigError);
    expect(() => parseManifest({ images: [{ path: 'a.jpg', latitude: 'north' }] }, '/work')).toThrow(
      /^Invalid export manifest: images\.0\.latitude: /
    );
  });
});
