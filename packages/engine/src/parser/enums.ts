/**
 * Small closed enumerations whose spelling depends on the format version.
 */
import { Codec, CodecError } from './primitives.js';
import { fail, ok } from './errors.js';
import { Version, versionPolicy } from '../version.js';

export const LAYER_CODES = {
  Background: 0,
  Fail: 1,
  Pass: 2,
  Foreground: 3,
  Overlay: 4,
} as const;

export type Layer = keyof typeof LAYER_CODES;

export const ORIGIN_CODES = {
  TopLeft: 0,
  Centre: 1,
  CentreLeft: 2,
  TopRight: 3,
  BottomCentre: 4,
  TopCentre: 5,
  Custom: 6,
  CentreRight: 7,
  BottomLeft: 8,
  BottomRight: 9,
} as const;

export type Origin = keyof typeof ORIGIN_CODES;

export const LOOP_TYPE_CODES = {
  LoopForever: 0,
  LoopOnce: 1,
} as const;

export type LoopType = keyof typeof LOOP_TYPE_CODES;

export interface EnumCodec<T extends string> {
  /** Accepts the name or the numeric code at any version. */
  parse(text: string): T | undefined;
  /** Numeric code or name, as the version's policy dictates. */
  format(value: T, version: Version): string;
  code(value: T): number;
  readonly names: readonly T[];
}

export function enumCodec<T extends string>(codes: Readonly<Record<T, number>>): EnumCodec<T> {
  const isName = (key: string): key is T => Object.prototype.hasOwnProperty.call(codes, key);
  const names = Object.keys(codes).filter(isName);
  const byCode = new Map<string, T>(names.map(name => [String(codes[name]), name]));
  return {
    parse: text => (isName(text) ? text : byCode.get(text)),
    format: (value, version) =>
      versionPolicy(version).enumSpelling === 'numeric' ? String(codes[value]) : value,
    code: value => codes[value],
    names,
  };
}

/** Adapt an enum to the field codec shape used by record parsers. */
export function enumField<T extends string>(codec: EnumCodec<T>, label: string): Codec<T> {
  return text => {
    const value = codec.parse(text);
    return value === undefined ? fail(new CodecError('OutOfRange', text, `Unknown ${label} \`${text}\``)) : ok(value);
  };
}

export const layerCodec = enumCodec<Layer>(LAYER_CODES);
export const originCodec = enumCodec<Origin>(ORIGIN_CODES);
export const loopTypeCodec = enumCodec<LoopType>(LOOP_TYPE_CODES);
