import {
  formatBitFlags,
  formatColonSet,
  formatDecimal,
  formatFilePath,
  parseBitFlags,
  parseColonSet,
  parseDecimal,
  parseFilePath,
  parseInteger,
  parseZeroOneBool,
  readField,
  splitFields,
} from '../src/parser/primitives';
import { FieldError } from '../src/parser/errors';

describe('integer and decimal codecs', () => {
  test('parseInteger accepts signed 32-bit integers', () => {
    expect(parseInteger('42')).toEqual({ ok: true, value: 42 });
    expect(parseInteger('-7')).toEqual({ ok: true, value: -7 });
    expect(parseInteger('+3')).toEqual({ ok: true, value: 3 });
    expect(parseInteger('2147483647')).toEqual({ ok: true, value: 2147483647 });
  });

  test('parseInteger rejects decimals, blanks and out of range values', () => {
    const decimal = parseInteger('1.5');
    expect(decimal.ok).toBe(false);
    if (!decimal.ok) expect(decimal.error.code).toBe('NotAnInteger');

    expect(parseInteger('').ok).toBe(false);
    expect(parseInteger(' 1').ok).toBe(false);

    const big = parseInteger('2147483648');
    expect(big.ok).toBe(false);
    if (!big.ok) expect(big.error.code).toBe('OutOfRange');
  });

  test('parseDecimal takes plain notation only', () => {
    expect(parseDecimal('0.5')).toEqual({ ok: true, value: 0.5 });
    expect(parseDecimal('-.25')).toEqual({ ok: true, value: -0.25 });
    expect(parseDecimal('3.')).toEqual({ ok: true, value: 3 });
    expect(parseDecimal('1e3').ok).toBe(false);
    expect(parseDecimal('NaN').ok).toBe(false);
    expect(parseDecimal('Infinity').ok).toBe(false);
  });

  test('formatDecimal prints negative zero as 0', () => {
    expect(formatDecimal(-0)).toBe('0');
    expect(formatDecimal(1.25)).toBe('1.25');
    expect(formatDecimal(320)).toBe('320');
  });

  test('formatDecimal spells out very small and very large values', () => {
    expect(formatDecimal(0.0000001)).toBe('0.0000001');
    expect(formatDecimal(-1.5e-7)).toBe('-0.00000015');
    expect(formatDecimal(1e21)).toBe('1000000000000000000000');
    expect(formatDecimal(1.25e22)).toBe('12500000000000000000000');
    expect(parseDecimal(formatDecimal(1e-7))).toEqual({ ok: true, value: 1e-7 });
    expect(parseDecimal(formatDecimal(1e21))).toEqual({ ok: true, value: 1e21 });
  });
});

describe('flag and set codecs', () => {
  test('parseZeroOneBool', () => {
    expect(parseZeroOneBool('0')).toEqual({ ok: true, value: false });
    expect(parseZeroOneBool('1')).toEqual({ ok: true, value: true });
    const two = parseZeroOneBool('2');
    expect(two.ok).toBe(false);
    if (!two.ok) expect(two.error.code).toBe('NotZeroOrOne');
  });

  test('bit flags map bits onto names in order', () => {
    const flags = ['a', 'b', 'c'] as const;
    const parsed = parseBitFlags('5', flags);
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect([...parsed.value]).toEqual(['a', 'c']);
      expect(formatBitFlags(parsed.value, flags)).toBe('5');
    }
    const unknown = parseBitFlags('8', flags);
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) expect(unknown.error.code).toBe('UnknownFlagBits');
  });

  test('colon sets check their length when pinned', () => {
    expect(parseColonSet('1:2:3', parseInteger)).toEqual({ ok: true, value: [1, 2, 3] });
    const short = parseColonSet('1:2', parseInteger, 3);
    expect(short.ok).toBe(false);
    if (!short.ok) expect(short.error.code).toBe('InvalidSetLength');
    expect(formatColonSet([1, 2], String)).toBe('1:2');
  });
});

describe('file paths and field splitting', () => {
  test('quoted paths remember their quotes', () => {
    expect(parseFilePath('"sb/a b.png"')).toEqual({ ok: true, value: { path: 'sb/a b.png', quoted: true } });
    expect(parseFilePath('bg.jpg')).toEqual({ ok: true, value: { path: 'bg.jpg', quoted: false } });
    expect(parseFilePath('').ok).toBe(false);
  });

  test('paths with commas are always quoted on output', () => {
    expect(formatFilePath({ path: 'a,b.png', quoted: false })).toBe('"a,b.png"');
    expect(formatFilePath({ path: 'a.png', quoted: true })).toBe('"a.png"');
    expect(formatFilePath({ path: 'a.png', quoted: false })).toBe('a.png');
  });

  test('splitFields keeps commas inside quotes', () => {
    expect(splitFields('0,0,"a,b.jpg",1,2')).toEqual(['0', '0', '"a,b.jpg"', '1', '2']);
    expect(splitFields('F,0,1,')).toEqual(['F', '0', '1', '']);
  });

  test('readField reports missing and invalid fields by name', () => {
    const fields = ['2', '100', 'abc'];
    const missingField = readField(fields, 3, 'end_time', parseInteger);
    expect(missingField.ok).toBe(false);
    if (!missingField.ok) {
      expect(missingField.error).toBeInstanceOf(FieldError);
      expect(missingField.error.code).toBe('MissingEndTime');
    }
    const invalidField = readField(fields, 2, 'end_time', parseInteger);
    expect(invalidField.ok).toBe(false);
    if (!invalidField.ok) expect(invalidField.error.code).toBe('InvalidEndTime');

    const rest = readField(['3', '0', '1', '2,3'], 2, 'blue', parseInteger, true);
    expect(rest.ok).toBe(false);
  });
});
