/**
 * Value records of animating commands and their continuing keyframes.
 *
 * `F,0,1000,2000,0,1,0.5` is three keyframes: 1000-2000 reaching 0, then
 * 2000-3000 reaching 1, then 3000-4000 reaching 0.5. Each continuing keyframe
 * starts where the previous one ended and lasts as long as the first.
 *
 * Only the last continuing record may leave out trailing components. A left
 * out component takes the value of the first component of the same record.
 */
import {
  ContinuingFieldError,
  ContinuingFieldErrorCode,
  EventsError,
  FieldName,
  Result,
  fail,
  invalid,
  missing,
  ok,
} from './errors.js';
import { Codec, CodecError, formatDecimal, integerInRange, parseDecimal } from './primitives.js';
import type { Keyframed, ParameterType, PartialRgb, PartialVector2, Rgb, Vector2 } from './ast.js';

export interface KeyframeShape<C, TStart, TContinuing> {
  component: Codec<C>;
  formatComponent: (value: C) => string;
  /** Field tag of each component of the first record. */
  fields: readonly FieldName[];
  continuingField: FieldName;
  /** Code reported when component `index` is left out where it may not be. */
  omittedCode: (index: number) => ContinuingFieldErrorCode;
  start: (components: C[]) => TStart;
  continuing: (components: C[]) => TContinuing;
  startComponents: (value: TStart) => C[];
  /** Always `fields.length` long; left out components are `undefined`. */
  continuingComponents: (value: TContinuing) => (C | undefined)[];
}

const secondFieldOmitted = (): ContinuingFieldErrorCode => 'ContinuingSecondFieldOmitted';

export function scalarShape(field: FieldName, continuingField: FieldName): KeyframeShape<number, number, number> {
  return {
    component: parseDecimal,
    formatComponent: formatDecimal,
    fields: [field],
    continuingField,
    omittedCode: secondFieldOmitted,
    start: ([value]) => value,
    continuing: ([value]) => value,
    startComponents: value => [value],
    continuingComponents: value => [value],
  };
}

export function pairShape(
  xField: FieldName,
  yField: FieldName,
  continuingField: FieldName,
): KeyframeShape<number, Vector2, PartialVector2> {
  return {
    component: parseDecimal,
    formatComponent: formatDecimal,
    fields: [xField, yField],
    continuingField,
    omittedCode: secondFieldOmitted,
    start: ([x, y]) => ({ x, y }),
    continuing: ([x, y]) => (y === undefined ? { x } : { x, y }),
    startComponents: value => [value.x, value.y],
    continuingComponents: value => [value.x, value.y],
  };
}

export const colourShape: KeyframeShape<number, Rgb, PartialRgb> = {
  component: integerInRange(0, 255),
  formatComponent: String,
  fields: ['red', 'green', 'blue'],
  continuingField: 'continuing_colours',
  omittedCode: index => (index === 1 ? 'ContinuingGreenOmitted' : 'ContinuingBlueOmitted'),
  start: ([red, green, blue]) => ({ red, green, blue }),
  continuing: ([red, green, blue]) => {
    if (green === undefined) return { red };
    if (blue === undefined) return { red, green };
    return { red, green, blue };
  },
  startComponents: value => [value.red, value.green, value.blue],
  continuingComponents: value => [value.red, value.green, value.blue],
};

export function parseParameterType(text: string): Result<ParameterType, CodecError> {
  if (text === 'H' || text === 'V' || text === 'A') return ok(text);
  return fail(new CodecError('NotADecimal', text, `Unknown parameter type \`${text}\``));
}

export const parameterShape: KeyframeShape<ParameterType, ParameterType, ParameterType> = {
  component: parseParameterType,
  formatComponent: value => value,
  fields: ['parameter_type'],
  continuingField: 'continuing_parameters',
  omittedCode: secondFieldOmitted,
  start: ([value]) => value,
  continuing: ([value]) => value,
  startComponents: value => [value],
  continuingComponents: value => [value],
};

export const FADE_SHAPE = scalarShape('start_opacity', 'continuing_opacities');
export const MOVE_SHAPE = pairShape('move_x', 'move_y', 'continuing_move');
export const MOVE_X_SHAPE = scalarShape('move_x', 'continuing_move');
export const MOVE_Y_SHAPE = scalarShape('move_y', 'continuing_move');
export const SCALE_SHAPE = scalarShape('start_scale', 'continuing_scale');
export const VECTOR_SCALE_SHAPE = pairShape('scale_x', 'scale_y', 'continuing_scales');
export const ROTATE_SHAPE = scalarShape('start_rotation', 'continuing_rotation');
export const COLOUR_SHAPE = colourShape;
export const PARAMETER_SHAPE = parameterShape;

/**
 * Decode the value texts that follow `<type>,<easing>,<start>,<end>`:
 * one full first record, then continuing records of the same arity, the
 * last of which may be cut short.
 */
export function parseKeyframeValues<C, TStart, TContinuing>(
  values: readonly string[],
  shape: KeyframeShape<C, TStart, TContinuing>,
): Result<{ start: TStart; continuing: TContinuing[] }, EventsError> {
  const arity = shape.fields.length;
  const first: C[] = [];
  for (let i = 0; i < arity; i++) {
    const field = shape.fields[i];
    const text = values[i];
    if (text === undefined) return fail(missing(field));
    const parsed = shape.component(text);
    if (!parsed.ok) return fail(invalid(field, text, parsed.error));
    first.push(parsed.value);
  }

  const continuing: TContinuing[] = [];
  for (let i = arity; i < values.length; i += arity) {
    const components: C[] = [];
    for (const text of values.slice(i, i + arity)) {
      const parsed = shape.component(text);
      if (!parsed.ok) return fail(invalid(shape.continuingField, text, parsed.error));
      components.push(parsed.value);
    }
    continuing.push(shape.continuing(components));
  }

  return ok({ start: shape.start(first), continuing });
}

/** Value texts of a keyframed command, as the serializer writes them. */
export function formatKeyframeValues<C, TStart, TContinuing>(
  command: Keyframed<TStart, TContinuing>,
  shape: KeyframeShape<C, TStart, TContinuing>,
): string[] {
  const texts = shape.startComponents(command.start).map(shape.formatComponent);
  for (const record of command.continuing) {
    for (const component of shape.continuingComponents(record)) {
      if (component !== undefined) texts.push(shape.formatComponent(component));
    }
  }
  return texts;
}

/** Reject records that leave out a component anywhere but at the end of the last record. */
export function checkContinuing<C, TStart, TContinuing>(
  records: readonly TContinuing[],
  shape: KeyframeShape<C, TStart, TContinuing>,
): ContinuingFieldError | undefined {
  for (let i = 0; i < records.length; i++) {
    const components = shape.continuingComponents(records[i]);
    const omitted = components.indexOf(undefined);
    if (omitted === -1) continue;
    const isLast = i === records.length - 1;
    const laterPresent = components.slice(omitted).some(c => c !== undefined);
    if (!isLast || laterPresent) return new ContinuingFieldError(shape.omittedCode(omitted), i);
  }
  return undefined;
}

/** A continuing record with left out components filled from its first component. */
export function resolveContinuing<C, TStart, TContinuing>(
  record: TContinuing,
  shape: KeyframeShape<C, TStart, TContinuing>,
): TStart {
  const components = shape.continuingComponents(record);
  const first = components[0];
  const filled: C[] = [];
  for (const component of components) {
    const value = component ?? first;
    if (value !== undefined) filled.push(value);
  }
  return shape.start(filled);
}

export interface Keyframe<T> {
  startTime: number;
  endTime: number;
  value: T;
}

/** Materialize every keyframe of a command, continuing ones included. */
export function expandKeyframes<C, TStart, TContinuing>(
  command: Keyframed<TStart, TContinuing>,
  shape: KeyframeShape<C, TStart, TContinuing>,
): Keyframe<TStart>[] {
  const endTime = command.endTime ?? command.startTime;
  const duration = endTime - command.startTime;
  const keyframes: Keyframe<TStart>[] = [{ startTime: command.startTime, endTime, value: command.start }];
  let previousEnd = endTime;
  for (const record of command.continuing) {
    keyframes.push({ startTime: previousEnd, endTime: previousEnd + duration, value: resolveContinuing(record, shape) });
    previousEnd += duration;
  }
  return keyframes;
}
