/**
 * @file pastel-color.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/** Source of uniform numbers in [0, 1), e.g. Math.random */
export type RandomSource = () => number;

export const PASTEL_RANGES = {
  HUE: { min: 0, max: 359 },
  SATURATION: { min: 25, max: 45 },
  LIGHTNESS: { min: 75, max: 90 },
} as const;

/**
 * Converts an HSL triple (hue in degrees, saturation and lightness in percent)
 * to a `#rrggbb` string. Channels are truncated, not rounded.
 */
export function hslToHex(hue: number, saturation: number, lightness: number): string {
  const s = saturation / 100;
  const l = lightness / 100;

  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = l - c / 2;

  let rgb: [number, number, number];
  if (hue < 60) {
    rgb = [c, x, 0];
  } else if (hue < 120) {
    rgb = [x, c, 0];
  } else if (hue < 180) {
    rgb = [0, c, x];
  } else if (hue < 240) {
    rgb = [0, x, c];
  } else if (hue < 300) {
    rgb = [x, 0, c];
  } else {
    rgb = [c, 0, x];
  }

  return (
    '#' +
    rgb
      .map((channel) => Math.floor((channel + m) * 255).toString(16).padStart(2, '0'))
      .join('')
  );
}

function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Cosmetic color shown next to a connection's messages.
 * Assigned once per connection; two connections may share a color.
 */
export class PastelColor {
  private constructor(
    readonly hue: number,
    readonly saturation: number,
    readonly lightness: number,
    readonly hex: string
  ) {}

  static fromHsl(hue: number, saturation: number, lightness: number): PastelColor {
    return new PastelColor(hue, saturation, lightness, hslToHex(hue, saturation, lightness));
  }

  static random(random: RandomSource = Math.random): PastelColor {
    return PastelColor.fromHsl(
      randomInt(random, PASTEL_RANGES.HUE.min, PASTEL_RANGES.HUE.max),
      randomInt(random, PASTEL_RANGES.SATURATION.min, PASTEL_RANGES.SATURATION.max),
      randomInt(random, PASTEL_RANGES.LIGHTNESS.min, PASTEL_RANGES.LIGHTNESS.max)
    );
  }

  toString(): string {
    return this.hex;
  }
}
