/**
 * Icon size table for the iOS and macOS app icon sets
 */

import type { SizeEntry } from './types';

const entry = (points: number, scale: number): SizeEntry => ({ points, scale });

export const ICON_SIZES: readonly SizeEntry[] = [
  // iOS
  entry(20, 1), entry(20, 2), entry(20, 3),
  entry(29, 1), entry(29, 2), entry(29, 3),
  entry(40, 1), entry(40, 2), entry(40, 3),
  entry(60, 2), entry(60, 3),
  entry(76, 1), entry(76, 2),
  entry(83.5, 2),
  entry(1024, 1),
  // macOS
  entry(16, 1), entry(16, 2),
  entry(32, 1), entry(32, 2),
  entry(128, 1), entry(128, 2),
  entry(256, 1), entry(256, 2),
  entry(512, 1), entry(512, 2),
];

export function pixelSizeOf({ points, scale }: SizeEntry): number {
  return Math.floor(points * scale);
}

export function iconFilename(pixelSize: number): string {
  return `icon_${pixelSize}x${pixelSize}.png`;
}

/**
 * Pixel sizes to render, in table order. Entries that land on a size already
 * seen (40pt@1x and 20pt@2x, 512pt@2x and 1024pt@1x, ...) are dropped.
 */
export function uniquePixelSizes(entries: readonly SizeEntry[] = ICON_SIZES): number[] {
  const seen = new Set<number>();
  const sizes: number[] = [];
  for (const e of entries) {
    const px = pixelSizeOf(e);
    if (seen.has(px)) continue;
    seen.add(px);
    sizes.push(px);
  }
  return sizes;
}
