import { checkTriggerType, formatTriggerType, parseTriggerType } from '../src/parser/triggerType';
import { parseTriggerName } from '../src/parser/peggy';

function errorCode(text: string): string | undefined {
  const result = parseTriggerType(text);
  return result.ok ? undefined : result.error.code;
}

describe('trigger name grammar', () => {
  test('splits hit sound names into words and a custom set', () => {
    expect(parseTriggerName('HitSoundDrumNormalClap3')).toEqual({
      kind: 'hitSound',
      words: ['Drum', 'Normal', 'Clap'],
      custom: '3',
    });
    expect(parseTriggerName('HitSound')).toEqual({ kind: 'hitSound', words: [], custom: null });
  });

  test('keywords must match the whole name', () => {
    expect(parseTriggerName('Failing')).toEqual({ kind: 'keyword', name: 'Failing' });
    expect(parseTriggerName('PassingX')).toBeUndefined();
    expect(parseTriggerName('passing')).toBeUndefined();
  });
});

describe('parseTriggerType', () => {
  test('keywords', () => {
    expect(parseTriggerType('Passing')).toEqual({ ok: true, value: { kind: 'passing' } });
    expect(parseTriggerType('Failing')).toEqual({ ok: true, value: { kind: 'failing' } });
    expect(parseTriggerType('HitObjectHit')).toEqual({ ok: true, value: { kind: 'hitObjectHit' } });
  });

  test('hit sound fields are assigned in order', () => {
    expect(parseTriggerType('HitSoundSoftWhistle')).toEqual({
      ok: true,
      value: { kind: 'hitSound', sampleSet: 'Soft', addition: 'Whistle' },
    });
    expect(parseTriggerType('HitSoundDrumNormalClap3')).toEqual({
      ok: true,
      value: { kind: 'hitSound', sampleSet: 'Drum', additionsSampleSet: 'Normal', addition: 'Clap', customSampleSet: 3 },
    });
    expect(parseTriggerType('HitSound7')).toEqual({ ok: true, value: { kind: 'hitSound', customSampleSet: 7 } });
  });

  test('more than three words is too many', () => {
    const result = parseTriggerType('HitSoundAllSoftDrumWhistle');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TooManyHitSoundFields');
      expect(result.error.message).toBe('There are too many `HitSound` fields: 4');
    }
  });

  test('out of order and repeated fields are misplaced', () => {
    expect(errorCode('HitSoundWhistleSoft')).toBe('MisplacedHitSoundField');
    expect(errorCode('HitSoundNormalSoftDrum')).toBe('MisplacedHitSoundField');
    expect(errorCode('HitSoundWhistleClap')).toBe('MisplacedHitSoundField');
  });

  test('unknown words and names', () => {
    expect(errorCode('HitSoundLoud')).toBe('UnknownHitSoundType');
    expect(errorCode('HitSoundsoft')).toBe('UnknownTriggerType');
    expect(errorCode('Hitting')).toBe('UnknownTriggerType');
    expect(errorCode('')).toBe('UnknownTriggerType');
  });

  test('custom sample sets must fit an integer', () => {
    expect(errorCode('HitSoundSoft99999999999')).toBe('InvalidCustomSampleSet');
  });
});

describe('formatTriggerType', () => {
  test('concatenates the parts back', () => {
    for (const text of ['Passing', 'HitObjectHit', 'HitSound', 'HitSoundSoftWhistle', 'HitSoundDrumNormalClap3', 'HitSound7']) {
      const parsed = parseTriggerType(text);
      expect(parsed.ok).toBe(true);
      if (parsed.ok) expect(formatTriggerType(parsed.value)).toBe(text);
    }
  });

  test('checkTriggerType flags an additions set without a main set', () => {
    expect(checkTriggerType({ kind: 'hitSound', additionsSampleSet: 'Soft' })?.code).toBe('MisplacedHitSoundField');
    expect(checkTriggerType({ kind: 'hitSound', customSampleSet: -1 })?.code).toBe('InvalidCustomSampleSet');
    expect(checkTriggerType({ kind: 'passing' })).toBeUndefined();
  });
});
