import { clamp } from '../utils/helpers';
import type { ColorSpace, RGBColor } from './types';

function toByte(value: number): number {
  return Math.round(clamp(value, 0, 1) * 255);
}

/**
 * @param h - Hue, 0..1 of a full turn
 */
export function hsvToRgb(h: number, s: number, v: number): RGBColor {
  const sector = (((h * 6) % 6) + 6) % 6;
  const chroma = v * s;
  const x = chroma * (1 - Math.abs((sector % 2) - 1));
  const m = v - chroma;
  const [r, g, b] = hueSector(sector, chroma, x);
  return [toByte(r + m), toByte(g + m), toByte(b + m)];
}

/**
 * @param h - Hue, 0..1 of a full turn
 */
export function hslToRgb(h: number, s: number, l: number): RGBColor {
  const sector = (((h * 6) % 6) + 6) % 6;
  const chroma = (1 - Math.abs(2 * l - 1)) * s;
  const x = chroma * (1 - Math.abs((sector % 2) - 1));
  const m = l - chroma / 2;
  const [r, g, b] = hueSector(sector, chroma, x);
  return [toByte(r + m), toByte(g + m), toByte(b + m)];
}

function hueSector(sector: number, chroma: number, x: number): RGBColor {
  if (sector < 1) return [chroma, x, 0];
  if (sector < 2) return [x, chroma, 0];
  if (sector < 3) return [0, chroma, x];
  if (sector < 4) return [0, x, chroma];
  if (sector < 5) return [x, 0, chroma];
  return [chroma, 0, x];
}

export function cmykToRgb(c: number, m: number, y: number, k: number): RGBColor {
  return [toByte((1 - c) * (1 - k)), toByte((1 - m) * (1 - k)), toByte((1 - y) * (1 - k))];
}

/**
 * Full-range (JPEG) YCbCr; chroma components are centred on 0.5.
 */
export function ycbcrToRgb(luma: number, cb: number, cr: number): RGBColor {
  return [
    toByte(luma + 1.402 * (cr - 0.5)),
    toByte(luma - 0.344136 * (cb - 0.5) - 0.714136 * (cr - 0.5)),
    toByte(luma + 1.772 * (cb - 0.5)),
  ];
}

/**
 * CIE L*a*b* (D65) to sRGB.
 *
 * @param lightness - L*, 0..100
 * @param a - a*, -128..127
 * @param b - b*, -128..127
 */
export function cielabToRgb(lightness: number, a: number, b: number): RGBColor {
  const fy = (lightness + 16) / 116;
  const fx = fy + a / 500;
  const fz = fy - b / 200;
  const inverse = (t: number): number => (t > 6 / 29 ? t ** 3 : 3 * (6 / 29) ** 2 * (t - 4 / 29));

  const x = 0.95047 * inverse(fx);
  const y = inverse(fy);
  const z = 1.08883 * inverse(fz);

  const gamma = (c: number): number => (c <= 0.0031308 ? 12.92 * c : 1.055 * c ** (1 / 2.4) - 0.055);
  return [
    toByte(gamma(3.2404542 * x - 1.5371385 * y - 0.4985314 * z)),
    toByte(gamma(-0.969266 * x + 1.8760108 * y + 0.041556 * z)),
    toByte(gamma(0.0556434 * x - 0.2040259 * y + 1.0572252 * z)),
  ];
}

/**
 * Converts channels normalised to 0..1, given in the canonical band order of
 * the color space, to sRGB.
 */
export function toRgb(colorSpace: Exclude<ColorSpace, 'none'>, channels: readonly number[]): RGBColor {
  const [c0, c1, c2, c3] = channels;
  switch (colorSpace) {
    case 'rgb':
      return [toByte(c0), toByte(c1), toByte(c2)];
    case 'hsv':
      return hsvToRgb(c0, c1, c2);
    case 'hsl':
      return hslToRgb(c0, c1, c2);
    case 'cmyk':
      return cmykToRgb(c0, c1, c2, c3);
    case 'ycbcr':
      return ycbcrToRgb(c0, c1, c2);
    case 'cielab':
      return cielabToRgb(c0 * 100, c1 * 255 - 128, c2 * 255 - 128);
  }
}
