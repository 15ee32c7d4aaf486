import { Result, fail, ok } from './errors.js';
import { CodecError, parseInteger } from './primitives.js';

/** Easing functions, indexed by their numeric code. */
export const EASINGS = [
  'Linear',
  'EasingOut',
  'EasingIn',
  'QuadIn',
  'QuadOut',
  'QuadInOut',
  'CubicIn',
  'CubicOut',
  'CubicInOut',
  'QuartIn',
  'QuartOut',
  'QuartInOut',
  'QuintIn',
  'QuintOut',
  'QuintInOut',
  'SineIn',
  'SineOut',
  'SineInOut',
  'ExpoIn',
  'ExpoOut',
  'ExpoInOut',
  'CircIn',
  'CircOut',
  'CircInOut',
  'ElasticIn',
  'ElasticOut',
  'ElasticHalfOut',
  'ElasticQuarterOut',
  'ElasticInOut',
  'BackIn',
  'BackOut',
  'BackInOut',
  'BounceIn',
  'BounceOut',
  'BounceInOut',
] as const;

export type Easing = (typeof EASINGS)[number];

export function parseEasing(text: string): Result<Easing, CodecError> {
  const code = parseInteger(text);
  if (!code.ok) return code;
  const easing = EASINGS[code.value];
  if (easing === undefined) {
    return fail(new CodecError('OutOfRange', text, `Unknown easing type ${code.value}`));
  }
  return ok(easing);
}

export function easingCode(easing: Easing): number {
  return EASINGS.indexOf(easing);
}
