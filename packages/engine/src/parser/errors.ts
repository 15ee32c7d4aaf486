/**
 * Error types for the events parser.
 *
 * Field-level parsers never throw: they return a `Result`. The public
 * `parseEvents` entry point wraps the first failure in a `LineError` that
 * carries the physical line index.
 */

export type Result<T, E = EventsError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Base error class. `code` is stable and safe to switch on. */
export class EventsError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EventsError';
    this.code = code;
  }
}

/** Field tags, as they appear in error codes and messages. */
export type FieldName =
  | 'start_time'
  | 'end_time'
  | 'file_name'
  | 'file_path'
  | 'x'
  | 'y'
  | 'red'
  | 'green'
  | 'blue'
  | 'layer'
  | 'origin'
  | 'volume'
  | 'frame_count'
  | 'frame_delay'
  | 'loop_type'
  | 'easing'
  | 'start_opacity'
  | 'move_x'
  | 'move_y'
  | 'start_scale'
  | 'scale_x'
  | 'scale_y'
  | 'start_rotation'
  | 'parameter_type'
  | 'loop_count'
  | 'trigger_type'
  | 'group_number'
  | 'continuing_opacities'
  | 'continuing_move'
  | 'continuing_scale'
  | 'continuing_scales'
  | 'continuing_rotation'
  | 'continuing_colours'
  | 'continuing_parameters';

export type FieldErrorKind = 'missing' | 'invalid';

function pascalCase(field: string): string {
  return field
    .split('_')
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/** `Missing<Field>` when the field is absent, `Invalid<Field>` when it fails to decode. */
export class FieldError extends EventsError {
  readonly kind: FieldErrorKind;
  readonly field: FieldName;
  readonly value?: string;

  constructor(kind: FieldErrorKind, field: FieldName, options?: { value?: string; cause?: unknown }) {
    const code = `${kind === 'missing' ? 'Missing' : 'Invalid'}${pascalCase(field)}`;
    const message = kind === 'missing' ? `Missing \`${field}\` field` : `Invalid \`${field}\` value`;
    super(code, message, { cause: options?.cause });
    this.name = 'FieldError';
    this.kind = kind;
    this.field = field;
    this.value = options?.value;
  }
}

export const missing = (field: FieldName): FieldError => new FieldError('missing', field);

export const invalid = (field: FieldName, value?: string, cause?: unknown): FieldError =>
  new FieldError('invalid', field, { value, cause });

export type UnknownTypeCode = 'UnknownObjectType' | 'UnknownEventType' | 'UnknownCommandType';

const unknownTypeLabel: Record<UnknownTypeCode, string> = {
  UnknownObjectType: 'object',
  UnknownEventType: 'event',
  UnknownCommandType: 'command',
};

/** The leading type token matched none of the known headers. */
export class UnknownTypeError extends EventsError {
  readonly token: string;

  constructor(code: UnknownTypeCode, token: string) {
    super(code, `Unknown ${unknownTypeLabel[code]} type \`${token}\``);
    this.name = 'UnknownTypeError';
    this.token = token;
  }
}

export class IndentationError extends EventsError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super('InvalidIndentation', `Invalid indentation, expected ${expected}, got ${actual}`);
    this.name = 'IndentationError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class StoryboardCmdWithNoSpriteError extends EventsError {
  constructor() {
    super('StoryboardCmdWithNoSprite', 'Storyboard command has no sprite or animation above it to attach to');
    this.name = 'StoryboardCmdWithNoSpriteError';
  }
}

export type TriggerTypeErrorCode =
  | 'TooManyHitSoundFields'
  | 'UnknownTriggerType'
  | 'UnknownHitSoundType'
  | 'MisplacedHitSoundField'
  | 'InvalidCustomSampleSet';

/** Detail of an `InvalidTriggerType` failure, attached as its `cause`. */
export class TriggerTypeError extends EventsError {
  constructor(code: TriggerTypeErrorCode, message: string) {
    super(code, message);
    this.name = 'TriggerTypeError';
  }
}

export type ContinuingFieldErrorCode = 'ContinuingGreenOmitted' | 'ContinuingBlueOmitted' | 'ContinuingSecondFieldOmitted';

/** A continuing record other than the last one leaves out a component. */
export class ContinuingFieldError extends EventsError {
  readonly index: number;

  constructor(code: ContinuingFieldErrorCode, index: number) {
    const field = code === 'ContinuingGreenOmitted' ? 'green' : code === 'ContinuingBlueOmitted' ? 'blue' : 'second';
    super(code, `Continuing record ${index} omits its ${field} field without being the last record`);
    this.name = 'ContinuingFieldError';
    this.index = index;
  }
}

/** Any of the above, anchored to the physical 0-based line it came from. */
export class LineError extends EventsError {
  readonly lineIndex: number;
  readonly error: EventsError;

  constructor(error: EventsError, lineIndex: number) {
    super(error.code, `Line ${lineIndex + 1}: ${error.message}`, { cause: error });
    this.name = 'LineError';
    this.lineIndex = lineIndex;
    this.error = error;
  }

  /** Format the error with the offending source line underneath. */
  format(source?: string): string {
    const lines = [`Error [${this.code}] at line ${this.lineIndex + 1}:`, `  ${this.error.message}`];
    if (source !== undefined) {
      const sourceLine = source.split('\n')[this.lineIndex];
      if (sourceLine !== undefined) {
        lines.push('');
        lines.push(`  ${this.lineIndex + 1} | ${sourceLine.replace(/\r$/, '')}`);
      }
    }
    return lines.join('\n');
  }
}
