import { AnimationError } from '../errors';
import cssColors from './cssColors.json';

/** RGBA color with integer channels in [0, 255]. */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export type ColorTuple =
  | readonly [number, number, number]
  | readonly [number, number, number, number];

/** Anything `parseColor` accepts: a color, a CSS name, a hex string or a tuple. */
export type ColorLike = Color | string | ColorTuple;

const CSS_COLORS: Readonly<Record<string, readonly number[]>> = cssColors;

function clampChannel(channel: number): number {
  if (!Number.isFinite(channel)) return 0;
  if (channel <= 0) return 0;
  if (channel >= 255) return 255;
  return Math.round(channel);
}

export function createColor(r: number, g: number, b: number, a = 255): Color {
  return Object.freeze({
    r: clampChannel(r),
    g: clampChannel(g),
    b: clampChannel(b),
    a: clampChannel(a),
  });
}

function invalid(value: unknown, detail: string): AnimationError {
  return new AnimationError(
    'InvalidColor',
    `parseColor(): ${detail} (got ${JSON.stringify(value)})`
  );
}

export function colorFromName(name: string): Color {
  const key = name.toLowerCase().replace(/[\s_-]/g, '');
  const rgb = CSS_COLORS[key];
  if (!rgb || rgb.length !== 3) throw invalid(name, 'unknown color name');
  const [r = 0, g = 0, b = 0] = rgb;
  return createColor(r, g, b);
}

const HEX_DIGITS = /^[0-9a-f]+$/i;

/** Parses `#rgb`, `#rgba`, `#rrggbb` and `#rrggbbaa`. */
export function colorFromHex(hex: string): Color {
  const digits = hex.startsWith('#') ? hex.slice(1) : hex;
  if (!HEX_DIGITS.test(digits)) throw invalid(hex, 'invalid hex color');

  let pairs: string[];
  if (digits.length === 3 || digits.length === 4) {
    pairs = Array.from(digits, (d) => d + d);
  } else if (digits.length === 6 || digits.length === 8) {
    pairs = digits.match(/../g) ?? [];
  } else {
    throw invalid(hex, 'hex color must have 3, 4, 6 or 8 digits');
  }

  const [r = 0, g = 0, b = 0, a = 255] = pairs.map((p) => parseInt(p, 16));
  return createColor(r, g, b, a);
}

function isColor(value: ColorLike): value is Color {
  return typeof value === 'object' && 'r' in value;
}

export function parseColor(value: ColorLike): Color {
  if (typeof value === 'string') {
    return value.startsWith('#') ? colorFromHex(value) : colorFromName(value);
  }
  if (isColor(value)) return value;
  if (value.length === 3) return createColor(value[0], value[1], value[2]);
  if (value.length === 4) {
    return createColor(value[0], value[1], value[2], value[3]);
  }
  throw invalid(value, 'color tuples must have 3 or 4 channels');
}

/**
 * Componentwise blend, alpha included. Channels are rounded, so `t = 0`
 * and `t = 1` return the endpoints exactly.
 */
export function lerpColor(from: Color, to: Color, t: number): Color {
  return createColor(
    from.r + (to.r - from.r) * t,
    from.g + (to.g - from.g) * t,
    from.b + (to.b - from.b) * t,
    from.a + (to.a - from.a) * t
  );
}

function hexByte(channel: number): string {
  return channel.toString(16).padStart(2, '0');
}

export function colorToHex(color: Color): string {
  const rgb = `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;
  return color.a === 255 ? rgb : `${rgb}${hexByte(color.a)}`;
}

/** Float alpha in [0, 1] is scaled to 255; anything else is a byte value. */
export function withAlpha(color: Color, alpha: number): Color {
  const byte = Number.isInteger(alpha) && alpha > 1 ? alpha : alpha * 255;
  return createColor(color.r, color.g, color.b, byte);
}
