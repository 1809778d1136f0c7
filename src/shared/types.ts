/**
 * Shared types for the app icon generator
 */

/** 8-bit RGBA colour */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface Point {
  x: number;
  y: number;
}

/** A logical point size at a display scale factor, e.g. 83.5pt @2x */
export interface SizeEntry {
  points: number;
  scale: number;
}

/** Platform context an icon slot targets */
export type IconIdiom = 'iphone' | 'ipad' | 'ios-marketing' | 'mac';

/** One asset-catalog slot before it is mapped to a file */
export interface IconSlot extends SizeEntry {
  idiom: IconIdiom;
}

/** Entry of the `images` array in Contents.json */
export interface IconSetImage {
  size: string;
  idiom: IconIdiom;
  filename: string;
  scale: string;
}

/** Shape of Contents.json */
export interface IconSetContents {
  images: IconSetImage[];
  info: {
    version: number;
    author: string;
  };
}

/** Pixel-space layout of the chat bubble for one canvas size */
export interface BubbleGeometry {
  size: number;
  cornerRadius: number;
  bubble: {
    left: number;
    top: number;
    right: number;
    bottom: number;
    radius: number;
  };
  tail: [Point, Point, Point];
  dots: {
    centers: Point[];
    radius: number;
  };
}
