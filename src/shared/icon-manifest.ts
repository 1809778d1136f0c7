/**
 * Contents.json for the AppIcon asset catalog
 *
 * Slots are declared by logical size, idiom and scale; the filename of each is
 * derived from its pixel size so it always names a file the renderer writes.
 */

import { MANIFEST_INFO } from './config';
import { iconFilename, pixelSizeOf } from './icon-sizes';
import type { IconIdiom, IconSetContents, IconSlot } from './types';

const slot = (points: number, idiom: IconIdiom, scale: number): IconSlot => ({ points, idiom, scale });

export const ICON_SLOTS: readonly IconSlot[] = [
  // iPhone notifications
  slot(20, 'iphone', 2), slot(20, 'iphone', 3),
  // iPhone settings
  slot(29, 'iphone', 2), slot(29, 'iphone', 3),
  // iPhone spotlight
  slot(40, 'iphone', 2), slot(40, 'iphone', 3),
  // iPhone app
  slot(60, 'iphone', 2), slot(60, 'iphone', 3),
  // iPad notifications
  slot(20, 'ipad', 1), slot(20, 'ipad', 2),
  // iPad settings
  slot(29, 'ipad', 1), slot(29, 'ipad', 2),
  // iPad spotlight
  slot(40, 'ipad', 1), slot(40, 'ipad', 2),
  // iPad app
  slot(76, 'ipad', 1), slot(76, 'ipad', 2),
  // iPad Pro
  slot(83.5, 'ipad', 2),
  // App Store
  slot(1024, 'ios-marketing', 1),
  // macOS
  slot(16, 'mac', 1), slot(16, 'mac', 2),
  slot(32, 'mac', 1), slot(32, 'mac', 2),
  slot(128, 'mac', 1), slot(128, 'mac', 2),
  slot(256, 'mac', 1), slot(256, 'mac', 2),
  slot(512, 'mac', 1), slot(512, 'mac', 2),
];

export function buildIconSetContents(slots: readonly IconSlot[] = ICON_SLOTS): IconSetContents {
  return {
    images: slots.map(s => ({
      size: `${s.points}x${s.points}`,
      idiom: s.idiom,
      filename: iconFilename(pixelSizeOf(s)),
      scale: `${s.scale}x`,
    })),
    info: { ...MANIFEST_INFO },
  };
}

/** Filenames referenced by the manifest that none of the rendered sizes produce */
export function findUnrenderedFilenames(
  contents: IconSetContents,
  renderedSizes: Iterable<number>,
): string[] {
  const rendered = new Set<string>();
  for (const px of renderedSizes) rendered.add(iconFilename(px));

  const missing = contents.images
    .map(image => image.filename)
    .filter(filename => !rendered.has(filename));
  return [...new Set(missing)];
}
