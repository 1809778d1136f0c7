/**
 * Chat Bubble Icon Renderer
 * Draws the app icon as an SVG and rasterizes it with sharp: a coral-to-pink
 * gradient square with rounded corners, a white speech bubble with a tail,
 * and three "typing" dots.
 */

import sharp from 'sharp';
import { BUBBLE_COLOR, DOT_COLOR } from './config';
import type { BubbleGeometry, Color, Point } from './types';

function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.trunc(value)));
}

/** Background colour of row `y`: (255, 140, 100) at the top towards (178, 80, 180) */
export function gradientRowColor(y: number, size: number): Color {
  const ratio = y / size;
  return {
    r: clampChannel(255 * (1 - ratio * 0.3)),
    g: clampChannel(140 - ratio * 60),
    b: clampChannel(100 + ratio * 80),
    a: 255,
  };
}

export function toHex({ r, g, b }: Color): string {
  return '#' + [r, g, b].map(c => c.toString(16).padStart(2, '0')).join('');
}

export function computeBubbleGeometry(size: number): BubbleGeometry {
  const margin = Math.floor(size / 6);
  const left = margin;
  const top = margin;
  const right = size - margin;
  const bottom = size - margin - Math.floor(size / 8);

  // Tail hangs off the bottom-left of the bubble
  const tailTop = bottom - Math.floor(size / 20);
  const tail: [Point, Point, Point] = [
    { x: left + Math.floor(size / 8), y: tailTop },
    { x: left + Math.floor(size / 16), y: bottom + Math.floor(size / 8) },
    { x: left + Math.floor(size / 4), y: tailTop },
  ];

  const dotY = Math.floor((top + bottom) / 2);
  const centerX = Math.floor((left + right) / 2);
  const spacing = Math.floor(size / 6);

  return {
    size,
    cornerRadius: Math.floor(size / 4),
    bubble: { left, top, right, bottom, radius: Math.floor(size / 8) },
    tail,
    dots: {
      centers: [-1, 0, 1].map(i => ({ x: centerX + i * spacing, y: dotY })),
      radius: Math.floor(size / 20),
    },
  };
}

function assertPixelSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Icon size must be a positive integer, got ${size}`);
  }
}

/**
 * Generate the icon SVG at a given pixel size. The gradient is laid down one
 * row at a time so every row gets exactly its interpolated colour.
 */
export function generateChatBubbleSVG(size: number): string {
  assertPixelSize(size);
  const { cornerRadius, bubble, tail, dots } = computeBubbleGeometry(size);

  const rows: string[] = [];
  for (let y = 0; y < size; y++) {
    rows.push(`<rect x="0" y="${y}" width="${size}" height="1" fill="${toHex(gradientRowColor(y, size))}"/>`);
  }

  const tailPoints = tail.map(p => `${p.x},${p.y}`).join(' ');
  const dotCircles = dots.centers
    .map(c => `<circle cx="${c.x}" cy="${c.y}" r="${dots.radius}"/>`)
    .join('\n    ');

  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${size} ${size}" width="${size}" height="${size}">
  <defs>
    <clipPath id="corners">
      <rect x="0" y="0" width="${size}" height="${size}" rx="${cornerRadius}" ry="${cornerRadius}"/>
    </clipPath>
  </defs>

  <!-- Gradient background, rounded corners -->
  <g clip-path="url(#corners)" shape-rendering="crispEdges">
    ${rows.join('\n    ')}
  </g>

  <!-- Bubble -->
  <g fill="${toHex(BUBBLE_COLOR)}">
    <rect x="${bubble.left}" y="${bubble.top}" width="${bubble.right - bubble.left}" height="${bubble.bottom - bubble.top}" rx="${bubble.radius}" ry="${bubble.radius}"/>
    <polygon points="${tailPoints}"/>
  </g>

  <!-- Typing dots -->
  <g fill="${toHex(DOT_COLOR)}">
    ${dotCircles}
  </g>
</svg>`;
}

/** Rasterize the icon to an RGBA PNG of exactly size×size */
export async function renderIcon(size: number): Promise<Buffer> {
  const svg = generateChatBubbleSVG(size);
  return sharp(Buffer.from(svg))
    .resize(size, size)
    .ensureAlpha()
    .png({ compressionLevel: 9 })
    .toBuffer();
}
