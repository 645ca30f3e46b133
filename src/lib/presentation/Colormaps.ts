import colormapData from './colormaps.json';
import type { ColorRamp, RGBColor } from './types';

/**
 * Available colormap names (matplotlib-style)
 */
export type ColormapName = 'viridis' | 'magma' | 'terrain' | 'jet' | 'coolwarm' | 'gray';

/**
 * List of all available colormap names
 */
export const COLORMAP_NAMES: ColormapName[] = ['viridis', 'magma', 'terrain', 'jet', 'coolwarm', 'gray'];

/**
 * Human-readable display names for colormaps
 */
export const COLORMAP_LABELS: Record<ColormapName, string> = {
  viridis: 'Viridis',
  magma: 'Magma',
  terrain: 'Terrain',
  jet: 'Jet',
  coolwarm: 'Cool-Warm',
  gray: 'Grayscale',
};

function toRamp(name: string, entries: readonly (readonly number[])[]): ColorRamp {
  return entries.map((entry): RGBColor => {
    const [r, g, b] = entry;
    if (entry.length !== 3 || [r, g, b].some((channel) => !Number.isInteger(channel) || channel < 0 || channel > 255)) {
      throw new Error(`Invalid color in colormap ${name}: [${entry.join(', ')}]`);
    }
    return [r, g, b];
  });
}

/**
 * All available colormaps
 */
export const COLORMAPS: Readonly<Record<ColormapName, ColorRamp>> = Object.freeze({
  viridis: toRamp('viridis', colormapData.viridis),
  magma: toRamp('magma', colormapData.magma),
  terrain: toRamp('terrain', colormapData.terrain),
  jet: toRamp('jet', colormapData.jet),
  coolwarm: toRamp('coolwarm', colormapData.coolwarm),
  gray: toRamp('gray', colormapData.gray),
});

export function isColormapName(value: string): value is ColormapName {
  return COLORMAP_NAMES.some((name) => name === value);
}

/**
 * Gets a colormap by name.
 *
 * @param name - The colormap name
 * @returns The color ramp array
 */
export function getColormap(name: ColormapName): ColorRamp {
  return COLORMAPS[name] || COLORMAPS.viridis;
}

/**
 * Interpolates a color from a color ramp.
 *
 * @param t - Position along the ramp, 0..1 (clamped)
 */
export function interpolateRamp(ramp: ColorRamp, t: number): RGBColor {
  // Handle NaN or invalid t values
  if (!Number.isFinite(t)) {
    return ramp[0];
  }
  if (ramp.length === 1) {
    return ramp[0];
  }

  const clampedT = Math.max(0, Math.min(1, t));
  const idx = Math.min(Math.floor(clampedT * (ramp.length - 1)), ramp.length - 2);
  const localT = clampedT * (ramp.length - 1) - idx;

  return [
    Math.round(ramp[idx][0] + (ramp[idx + 1][0] - ramp[idx][0]) * localT),
    Math.round(ramp[idx][1] + (ramp[idx + 1][1] - ramp[idx][1]) * localT),
    Math.round(ramp[idx][2] + (ramp[idx + 1][2] - ramp[idx][2]) * localT),
  ];
}
