/**
 * Scalar codecs shared by every record parser.
 */
import { EventsError, FieldName, Result, fail, invalid, missing, ok } from './errors.js';
import type { FilePath } from './ast.js';

export type CodecErrorCode =
  | 'NotAnInteger'
  | 'NotADecimal'
  | 'OutOfRange'
  | 'NotZeroOrOne'
  | 'UnknownFlagBits'
  | 'InvalidSetLength'
  | 'EmptyValue';

/** Why a single scalar failed to decode; attached as `cause` to field errors. */
export class CodecError extends EventsError {
  readonly value: string;

  constructor(code: CodecErrorCode, value: string, message: string) {
    super(code, message);
    this.name = 'CodecError';
    this.value = value;
  }
}

export type Codec<T> = (text: string) => Result<T, CodecError>;

export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** 32-bit signed integer. */
export function parseInteger(text: string): Result<number, CodecError> {
  if (!INTEGER_RE.test(text)) return fail(new CodecError('NotAnInteger', text, `\`${text}\` is not an integer`));
  const value = Number(text);
  if (value < INT_MIN || value > INT_MAX) {
    return fail(new CodecError('OutOfRange', text, `\`${text}\` does not fit in a 32-bit integer`));
  }
  return ok(value);
}

/** Integer within `[min, max]`. */
export function integerInRange(min: number, max: number): Codec<number> {
  return (text: string) => {
    const parsed = parseInteger(text);
    if (!parsed.ok) return parsed;
    if (parsed.value < min || parsed.value > max) {
      return fail(new CodecError('OutOfRange', text, `\`${text}\` is outside ${min}..${max}`));
    }
    return parsed;
  };
}

/** Plain decimal notation: no exponent, no `NaN` or `Infinity`. */
export function parseDecimal(text: string): Result<number, CodecError> {
  if (!DECIMAL_RE.test(text)) return fail(new CodecError('NotADecimal', text, `\`${text}\` is not a decimal`));
  return ok(Number(text));
}

export function parseZeroOneBool(text: string): Result<boolean, CodecError> {
  const parsed = parseInteger(text);
  if (!parsed.ok) return parsed;
  if (parsed.value === 0) return ok(false);
  if (parsed.value === 1) return ok(true);
  return fail(new CodecError('NotZeroOrOne', text, 'Expected a value of 0 or 1'));
}

export function formatZeroOneBool(value: boolean): string {
  return value ? '1' : '0';
}

/**
 * Integer bit field mapped onto flag names, bit `i` being `flags[i]`.
 * Bits beyond the known flags are rejected.
 */
export function parseBitFlags<T extends string>(text: string, flags: readonly T[]): Result<Set<T>, CodecError> {
  const parsed = parseInteger(text);
  if (!parsed.ok) return parsed;
  const value = parsed.value;
  if (value < 0 || value >= 2 ** flags.length) {
    return fail(new CodecError('UnknownFlagBits', text, `\`${text}\` sets bits outside the ${flags.length} known flags`));
  }
  const set = new Set<T>();
  flags.forEach((flag, bit) => {
    if ((value >> bit) & 1) set.add(flag);
  });
  return ok(set);
}

export function formatBitFlags<T extends string>(set: ReadonlySet<T>, flags: readonly T[]): string {
  return String(flags.reduce((acc, flag, bit) => (set.has(flag) ? acc | (1 << bit) : acc), 0));
}

/** `a:b:c` decoded item by item; `length` pins the item count when given. */
export function parseColonSet<T>(text: string, item: Codec<T>, length?: number): Result<T[], CodecError> {
  const parts = text.split(':');
  if (length !== undefined && parts.length !== length) {
    return fail(new CodecError('InvalidSetLength', text, `Expected ${length} \`:\` separated values, got ${parts.length}`));
  }
  const values: T[] = [];
  for (const part of parts) {
    const parsed = item(part);
    if (!parsed.ok) return parsed;
    values.push(parsed.value);
  }
  return ok(values);
}

export function formatColonSet<T>(values: readonly T[], item: (value: T) => string): string {
  return values.map(item).join(':');
}

/** `1.5e-7` spelled out as `0.00000015`. */
function expandExponent(text: string): string {
  const [mantissa, exponent] = text.split('e');
  const negative = mantissa.startsWith('-');
  const [whole, fraction = ''] = (negative ? mantissa.slice(1) : mantissa).split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  let plain: string;
  if (point <= 0) plain = `0.${'0'.repeat(-point)}${digits}`;
  else if (point >= digits.length) plain = digits + '0'.repeat(point - digits.length);
  else plain = `${digits.slice(0, point)}.${digits.slice(point)}`;
  return negative ? `-${plain}` : plain;
}

/** Shortest decimal text that reads back to the same number, never in exponent form. */
export function formatDecimal(value: number): string {
  if (Object.is(value, -0)) return '0';
  const text = String(value);
  return text.includes('e') ? expandExponent(text) : text;
}

export function parseFilePath(text: string): Result<FilePath, CodecError> {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return ok({ path: text.slice(1, -1), quoted: true });
  }
  if (text.length === 0) return fail(new CodecError('EmptyValue', text, 'File path is empty'));
  return ok({ path: text, quoted: false });
}

export function formatFilePath(filePath: FilePath): string {
  return filePath.quoted || filePath.path.includes(',') ? `"${filePath.path}"` : filePath.path;
}

/** Split on commas that are outside double quotes. Quotes stay in the fields. */
export function splitFields(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const ch of line) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === ',' && !inQuotes) {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/** Remaining fields from `index`, re-joined; the last field of a grammar takes the rest of the line. */
export function restOf(fields: readonly string[], index: number): string {
  return fields.slice(index).join(',');
}

/**
 * Decode `fields[index]` as the named field; with `rest` the field takes the
 * remainder of the line from `index`.
 */
export function readField<T>(
  fields: readonly string[],
  index: number,
  name: FieldName,
  codec: Codec<T>,
  rest = false,
): Result<T, EventsError> {
  if (fields.length <= index) return fail(missing(name));
  const text = rest ? restOf(fields, index) : fields[index];
  const parsed = codec(text);
  if (!parsed.ok) return fail(invalid(name, text, parsed.error));
  return parsed;
}
