import { generate } from 'peggy';

/**
 * Grammar for the trigger name of a `T` command. It only splits the name into
 * its parts; which combinations are allowed is checked in `triggerType.ts`.
 */
export const TRIGGER_GRAMMAR = `
TriggerName
  = HitSound
  / name:$("Passing" / "Failing" / "HitObjectHit") !. { return { kind: "keyword", name }; }

HitSound
  = "HitSound" words:Word* custom:Digits? !. { return { kind: "hitSound", words, custom }; }

Word
  = $([A-Z] [a-z]*)

Digits
  = $([0-9]+)
`;

export interface RawKeywordTrigger {
  kind: 'keyword';
  name: string;
}

export interface RawHitSoundTrigger {
  kind: 'hitSound';
  words: string[];
  custom: string | null;
}

export type RawTriggerName = RawKeywordTrigger | RawHitSoundTrigger;

let parser: { parse(input: string): unknown } | undefined;

function getParser(): { parse(input: string): unknown } {
  if (!parser) parser = generate(TRIGGER_GRAMMAR);
  return parser;
}

function isRawTriggerName(value: unknown): value is RawTriggerName {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  if (value.kind === 'keyword') return 'name' in value && typeof value.name === 'string';
  if (value.kind === 'hitSound') {
    return (
      'words' in value &&
      Array.isArray(value.words) &&
      value.words.every(w => typeof w === 'string') &&
      'custom' in value &&
      (value.custom === null || typeof value.custom === 'string')
    );
  }
  return false;
}

/** Split a trigger name into its parts, or `undefined` when it matches no trigger shape. */
export function parseTriggerName(input: string): RawTriggerName | undefined {
  let result: unknown;
  try {
    result = getParser().parse(input);
  } catch (e) {
    if (e instanceof Error && e.name === 'SyntaxError') return undefined;
    throw e;
  }
  if (!isRawTriggerName(result)) {
    throw new Error(`Trigger grammar produced an unexpected value for \`${input}\``);
  }
  return result;
}
