import { AnimationError } from '../errors';

/**
 * Maps normalized progress in [0, 1] to eased progress. `f(0) = 0` and
 * `f(1) = 1`, but back and elastic curves leave [0, 1] in between.
 */
export type EasingFunction = (t: number) => number;

const BACK_OVERSHOOT = 1.70158;
const IN_OUT_BACK_SCALE = 1.525;
const ELASTIC_PERIOD = 0.3;
const IN_OUT_ELASTIC_PERIOD = 0.45;

export const linear: EasingFunction = (t) => t;

export const easeInQuad: EasingFunction = (t) => t * t;
export const easeOutQuad: EasingFunction = (t) => 1 - (1 - t) * (1 - t);
export const easeInOutQuad: EasingFunction = (t) =>
  t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2;

export const easeInCubic: EasingFunction = (t) => t * t * t;
export const easeOutCubic: EasingFunction = (t) => 1 - (1 - t) ** 3;
export const easeInOutCubic: EasingFunction = (t) =>
  t < 0.5 ? 4 * t * t * t : 1 - (-2 * t + 2) ** 3 / 2;

export const easeInQuart: EasingFunction = (t) => t ** 4;
export const easeOutQuart: EasingFunction = (t) => 1 - (1 - t) ** 4;
export const easeInOutQuart: EasingFunction = (t) =>
  t < 0.5 ? 8 * t ** 4 : 1 - (-2 * t + 2) ** 4 / 2;

export const easeInQuint: EasingFunction = (t) => t ** 5;
export const easeOutQuint: EasingFunction = (t) => 1 - (1 - t) ** 5;
export const easeInOutQuint: EasingFunction = (t) =>
  t < 0.5 ? 16 * t ** 5 : 1 - (-2 * t + 2) ** 5 / 2;

export const easeInSine: EasingFunction = (t) =>
  1 - Math.cos((t * Math.PI) / 2);
export const easeOutSine: EasingFunction = (t) => Math.sin((t * Math.PI) / 2);
export const easeInOutSine: EasingFunction = (t) =>
  -(Math.cos(Math.PI * t) - 1) / 2;

// 2^(10t - 10) never reaches 0 on its own, so both ends are pinned.
export const easeInExpo: EasingFunction = (t) =>
  t === 0 ? 0 : 2 ** (10 * t - 10);
export const easeOutExpo: EasingFunction = (t) =>
  t === 1 ? 1 : 1 - 2 ** (-10 * t);
export const easeInOutExpo: EasingFunction = (t) => {
  if (t === 0 || t === 1) return t;
  return t < 0.5 ? 2 ** (20 * t - 10) / 2 : (2 - 2 ** (-20 * t + 10)) / 2;
};

export const easeInCirc: EasingFunction = (t) => 1 - Math.sqrt(1 - t * t);
export const easeOutCirc: EasingFunction = (t) =>
  Math.sqrt(1 - (t - 1) ** 2);
export const easeInOutCirc: EasingFunction = (t) =>
  t < 0.5
    ? (1 - Math.sqrt(1 - (2 * t) ** 2)) / 2
    : (Math.sqrt(1 - (-2 * t + 2) ** 2) + 1) / 2;

export type CurveVariant = 'in' | 'out' | 'inOut';

/** Back curves pull past the start (in), the end (out) or both (inOut). */
export function createBackEasing(
  variant: CurveVariant,
  overshoot = BACK_OVERSHOOT
): EasingFunction {
  const c1 = overshoot;
  const c3 = c1 + 1;
  const c2 = c1 * IN_OUT_BACK_SCALE;

  switch (variant) {
    case 'in':
      return (t) => c3 * t * t * t - c1 * t * t;
    case 'out':
      return (t) => 1 + c3 * (t - 1) ** 3 + c1 * (t - 1) ** 2;
    case 'inOut':
      return (t) =>
        t < 0.5
          ? ((2 * t) ** 2 * ((c2 + 1) * 2 * t - c2)) / 2
          : ((2 * t - 2) ** 2 * ((c2 + 1) * (t * 2 - 2) + c2) + 2) / 2;
  }
}

/**
 * Exponentially damped sine. `period` is in normalized time; the wave is
 * phase-shifted by a quarter period so it meets the endpoints.
 */
export function createElasticEasing(
  variant: CurveVariant,
  period = variant === 'inOut' ? IN_OUT_ELASTIC_PERIOD : ELASTIC_PERIOD
): EasingFunction {
  const shift = period / 4;
  const omega = (2 * Math.PI) / period;

  switch (variant) {
    case 'in':
      return (t) => {
        if (t === 0 || t === 1) return t;
        return -(2 ** (10 * t - 10)) * Math.sin((t - 1 - shift) * omega);
      };
    case 'out':
      return (t) => {
        if (t === 0 || t === 1) return t;
        return 2 ** (-10 * t) * Math.sin((t - shift) * omega) + 1;
      };
    case 'inOut':
      return (t) => {
        if (t === 0 || t === 1) return t;
        const wave = Math.sin((2 * t - 1 - shift) * omega);
        return t < 0.5
          ? -(2 ** (20 * t - 10) * wave) / 2
          : (2 ** (-20 * t + 10) * wave) / 2 + 1;
      };
  }
}

export const easeInBack = createBackEasing('in');
export const easeOutBack = createBackEasing('out');
export const easeInOutBack = createBackEasing('inOut');

export const easeInElastic = createElasticEasing('in');
export const easeOutElastic = createElasticEasing('out');
export const easeInOutElastic = createElasticEasing('inOut');

const BOUNCE_N = 7.5625;
const BOUNCE_D = 2.75;

export const easeOutBounce: EasingFunction = (t) => {
  if (t < 1 / BOUNCE_D) return BOUNCE_N * t * t;
  if (t < 2 / BOUNCE_D) {
    const shifted = t - 1.5 / BOUNCE_D;
    return BOUNCE_N * shifted * shifted + 0.75;
  }
  if (t < 2.5 / BOUNCE_D) {
    const shifted = t - 2.25 / BOUNCE_D;
    return BOUNCE_N * shifted * shifted + 0.9375;
  }
  const shifted = t - 2.625 / BOUNCE_D;
  return BOUNCE_N * shifted * shifted + 0.984375;
};
export const easeInBounce: EasingFunction = (t) => 1 - easeOutBounce(1 - t);
export const easeInOutBounce: EasingFunction = (t) =>
  t < 0.5
    ? (1 - easeOutBounce(1 - 2 * t)) / 2
    : (1 + easeOutBounce(2 * t - 1)) / 2;

const EASING_PRESETS = Object.freeze({
  linear,
  ease_in: easeInQuad,
  ease_out: easeOutQuad,
  ease_in_out: easeInOutQuad,
  ease_in_quad: easeInQuad,
  ease_out_quad: easeOutQuad,
  ease_in_out_quad: easeInOutQuad,
  ease_in_cubic: easeInCubic,
  ease_out_cubic: easeOutCubic,
  ease_in_out_cubic: easeInOutCubic,
  ease_in_quart: easeInQuart,
  ease_out_quart: easeOutQuart,
  ease_in_out_quart: easeInOutQuart,
  ease_in_quint: easeInQuint,
  ease_out_quint: easeOutQuint,
  ease_in_out_quint: easeInOutQuint,
  ease_in_sine: easeInSine,
  ease_out_sine: easeOutSine,
  ease_in_out_sine: easeInOutSine,
  ease_in_expo: easeInExpo,
  ease_out_expo: easeOutExpo,
  ease_in_out_expo: easeInOutExpo,
  ease_in_circ: easeInCirc,
  ease_out_circ: easeOutCirc,
  ease_in_out_circ: easeInOutCirc,
  ease_in_back: easeInBack,
  ease_out_back: easeOutBack,
  ease_in_out_back: easeInOutBack,
  ease_in_elastic: easeInElastic,
  ease_out_elastic: easeOutElastic,
  ease_in_out_elastic: easeInOutElastic,
  ease_in_bounce: easeInBounce,
  ease_out_bounce: easeOutBounce,
  ease_in_out_bounce: easeInOutBounce,
} satisfies Record<string, EasingFunction>);

export type EasingName = keyof typeof EASING_PRESETS;

/** Registered name, any spelling `normalizeEasingName` accepts, or a curve. */
export type EasingInput = EasingName | (string & {}) | EasingFunction;

export function easingNames(): EasingName[] {
  return Object.keys(EASING_PRESETS).filter(isEasingName);
}

export function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(EASING_PRESETS, name);
}

/** `easeOutCubic`, `ease-out-cubic` and `Ease Out Cubic` all become `ease_out_cubic`. */
export function normalizeEasingName(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toLowerCase();
}

/** Functions pass through unchanged; names are looked up in the registry. */
export function resolveEasing(
  input: EasingInput | undefined
): EasingFunction {
  if (typeof input === 'function') return input;
  if (input === undefined) return linear;

  const name = normalizeEasingName(input);
  if (!isEasingName(name)) {
    throw new AnimationError(
      'UnknownEasingName',
      `resolveEasing(): unknown easing "${input}". Available: ${easingNames().join(', ')}`
    );
  }
  return EASING_PRESETS[name];
}

export function ease(name: string): EasingFunction {
  return resolveEasing(name);
}
