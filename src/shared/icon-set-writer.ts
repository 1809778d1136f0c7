/**
 * Icon Set Writer
 * Renders every unique pixel size of the size table into an asset catalog
 * icon set directory and writes its Contents.json.
 *
 * Existing files are overwritten, so a rerun reproduces the same directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MANIFEST_FILENAME } from './config';
import { buildIconSetContents, findUnrenderedFilenames, ICON_SLOTS } from './icon-manifest';
import { renderIcon } from './icon-renderer';
import { iconFilename, ICON_SIZES, uniquePixelSizes } from './icon-sizes';
import type { IconSlot, SizeEntry } from './types';

export interface IconSetOptions {
  outputDir: string;
  sizes?: readonly SizeEntry[];
  slots?: readonly IconSlot[];
  /** Called after each PNG is written */
  onIconWritten?: (filename: string, pixelSize: number) => void;
}

export interface IconSetResult {
  outputDir: string;
  /** PNG filenames in the order they were written */
  files: string[];
  manifestPath: string;
}

/** The manifest references icons the size table never renders */
export class IconSetError extends Error {
  constructor(public readonly missingFiles: string[]) {
    super(`Manifest references icons that were not rendered: ${missingFiles.join(', ')}`);
    this.name = 'IconSetError';
  }
}

export async function generateIconSet(options: IconSetOptions): Promise<IconSetResult> {
  const { outputDir, sizes = ICON_SIZES, slots = ICON_SLOTS, onIconWritten } = options;

  fs.mkdirSync(outputDir, { recursive: true });

  const pixelSizes = uniquePixelSizes(sizes);
  const files: string[] = [];

  for (const px of pixelSizes) {
    const png = await renderIcon(px);
    const filename = iconFilename(px);
    fs.writeFileSync(path.join(outputDir, filename), png);
    files.push(filename);
    onIconWritten?.(filename, px);
  }

  const contents = buildIconSetContents(slots);
  const missing = findUnrenderedFilenames(contents, pixelSizes);
  if (missing.length > 0) {
    throw new IconSetError(missing);
  }

  const manifestPath = path.join(outputDir, MANIFEST_FILENAME);
  fs.writeFileSync(manifestPath, JSON.stringify(contents, null, 2) + '\n');

  return { outputDir, files, manifestPath };
}
