/**
 * Trigger names of `T` commands:
 *
 *   HitSound[SampleSet[AdditionsSampleSet]][Addition][CustomSampleSet]
 *   Passing | Failing | HitObjectHit
 */
import { Result, TriggerTypeError, fail, ok } from './errors.js';
import { parseTriggerName } from './peggy/index.js';
import { parseInteger } from './primitives.js';

export const SAMPLE_SETS = ['All', 'Normal', 'Soft', 'Drum'] as const;
export type SampleSet = (typeof SAMPLE_SETS)[number];

export const HIT_SOUND_ADDITIONS = ['Whistle', 'Finish', 'Clap'] as const;
export type HitSoundAddition = (typeof HIT_SOUND_ADDITIONS)[number];

const MAX_HIT_SOUND_FIELDS = 3;

export interface HitSoundTrigger {
  kind: 'hitSound';
  sampleSet?: SampleSet;
  /** Only valid together with `sampleSet`. */
  additionsSampleSet?: SampleSet;
  addition?: HitSoundAddition;
  customSampleSet?: number;
}

export type TriggerType = HitSoundTrigger | { kind: 'passing' } | { kind: 'failing' } | { kind: 'hitObjectHit' };

const isSampleSet = (word: string): word is SampleSet => (SAMPLE_SETS as readonly string[]).includes(word);
const isAddition = (word: string): word is HitSoundAddition => (HIT_SOUND_ADDITIONS as readonly string[]).includes(word);

export function parseTriggerType(text: string): Result<TriggerType, TriggerTypeError> {
  const raw = parseTriggerName(text);
  if (!raw) return fail(new TriggerTypeError('UnknownTriggerType', `Unknown trigger type \`${text}\``));

  if (raw.kind === 'keyword') {
    if (raw.name === 'Passing') return ok({ kind: 'passing' });
    if (raw.name === 'Failing') return ok({ kind: 'failing' });
    return ok({ kind: 'hitObjectHit' });
  }

  if (raw.words.length > MAX_HIT_SOUND_FIELDS) {
    return fail(new TriggerTypeError('TooManyHitSoundFields', `There are too many \`HitSound\` fields: ${raw.words.length}`));
  }

  const trigger: HitSoundTrigger = { kind: 'hitSound' };
  for (const word of raw.words) {
    if (isSampleSet(word)) {
      if (trigger.addition !== undefined || trigger.additionsSampleSet !== undefined) {
        return fail(misplaced(word));
      }
      if (trigger.sampleSet === undefined) trigger.sampleSet = word;
      else trigger.additionsSampleSet = word;
    } else if (isAddition(word)) {
      if (trigger.addition !== undefined) return fail(misplaced(word));
      trigger.addition = word;
    } else {
      return fail(new TriggerTypeError('UnknownHitSoundType', `Unknown \`HitSound\` type \`${word}\``));
    }
  }

  if (raw.custom !== null) {
    const custom = parseInteger(raw.custom);
    if (!custom.ok) {
      return fail(new TriggerTypeError('InvalidCustomSampleSet', `Invalid custom sample set \`${raw.custom}\``));
    }
    trigger.customSampleSet = custom.value;
  }

  return ok(trigger);
}

function misplaced(word: string): TriggerTypeError {
  return new TriggerTypeError('MisplacedHitSoundField', `\`HitSound\` field \`${word}\` is out of order`);
}

/** Structural check for triggers built in code rather than parsed. */
export function checkTriggerType(trigger: TriggerType): TriggerTypeError | undefined {
  if (trigger.kind !== 'hitSound') return undefined;
  if (trigger.additionsSampleSet !== undefined && trigger.sampleSet === undefined) {
    return misplaced(trigger.additionsSampleSet);
  }
  if (trigger.customSampleSet !== undefined && (!Number.isInteger(trigger.customSampleSet) || trigger.customSampleSet < 0)) {
    return new TriggerTypeError('InvalidCustomSampleSet', `Invalid custom sample set \`${trigger.customSampleSet}\``);
  }
  return undefined;
}

export function formatTriggerType(trigger: TriggerType): string {
  switch (trigger.kind) {
    case 'passing':
      return 'Passing';
    case 'failing':
      return 'Failing';
    case 'hitObjectHit':
      return 'HitObjectHit';
    case 'hitSound':
      return [
        'HitSound',
        trigger.sampleSet ?? '',
        trigger.additionsSampleSet ?? '',
        trigger.addition ?? '',
        trigger.customSampleSet ?? '',
      ].join('');
  }
}
