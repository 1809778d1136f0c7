/**
 * Icon Generator Configuration
 *
 * Everything is fixed at build time: there are no flags and no config file.
 * The output directory is relative to the working directory the script runs in.
 */

import type { Color } from './types';

/** Asset catalog icon set, relative to the project root */
export const ICON_SET_PATH_SEGMENTS = ['Shared', 'Resources', 'Assets.xcassets', 'AppIcon.appiconset'];

export const MANIFEST_FILENAME = 'Contents.json';

export const MANIFEST_INFO = { version: 1, author: 'xcode' } as const;

// --- Palette ---

export const BUBBLE_COLOR: Color = { r: 255, g: 255, b: 255, a: 255 };
export const DOT_COLOR: Color = { r: 200, g: 100, b: 120, a: 255 };
