/**
 * Single command lines, without their indentation.
 */
import {
  Command,
  CommandProperties,
  ContainerCommandProperties,
  KeyframedCommandProperties,
  Keyframed,
  TriggerCommand,
} from './ast.js';
import {
  COLOUR_SHAPE,
  FADE_SHAPE,
  KeyframeShape,
  MOVE_SHAPE,
  MOVE_X_SHAPE,
  MOVE_Y_SHAPE,
  PARAMETER_SHAPE,
  ROTATE_SHAPE,
  SCALE_SHAPE,
  VECTOR_SCALE_SHAPE,
  checkContinuing,
  formatKeyframeValues,
  parseKeyframeValues,
} from './continuing.js';
import { parseEasing, easingCode } from './easing.js';
import { EventsError, Result, UnknownTypeError, fail, invalid, missing, ok } from './errors.js';
import { parseInteger, restOf } from './primitives.js';
import { checkTriggerType, formatTriggerType, parseTriggerType } from './triggerType.js';

export const COMMAND_TOKENS = {
  fade: 'F',
  move: 'M',
  moveX: 'MX',
  moveY: 'MY',
  scale: 'S',
  vectorScale: 'V',
  rotate: 'R',
  colour: 'C',
  parameter: 'P',
  loop: 'L',
  trigger: 'T',
} as const satisfies Record<CommandProperties['type'], string>;

function parseKeyframed<C, TStart, TContinuing>(
  fields: readonly string[],
  shape: KeyframeShape<C, TStart, TContinuing>,
): Result<Keyframed<TStart, TContinuing>, EventsError> {
  if (fields.length < 2) return fail(missing('easing'));
  const easing = parseEasing(fields[1]);
  if (!easing.ok) return fail(invalid('easing', fields[1], easing.error));

  if (fields.length < 3) return fail(missing('start_time'));
  const startTime = parseInteger(fields[2]);
  if (!startTime.ok) return fail(invalid('start_time', fields[2], startTime.error));

  if (fields.length < 4) return fail(missing('end_time'));
  let endTime: number | undefined;
  if (fields[3] !== '') {
    const parsed = parseInteger(fields[3]);
    if (!parsed.ok) return fail(invalid('end_time', fields[3], parsed.error));
    endTime = parsed.value;
  }

  const values = parseKeyframeValues(fields.slice(4), shape);
  if (!values.ok) return values;

  const command: Keyframed<TStart, TContinuing> = {
    easing: easing.value,
    startTime: startTime.value,
    start: values.value.start,
    continuing: values.value.continuing,
  };
  if (endTime !== undefined) command.endTime = endTime;
  return ok(command);
}

function parseLoop(fields: readonly string[]): Result<CommandProperties, EventsError> {
  if (fields.length < 2) return fail(missing('start_time'));
  const startTime = parseInteger(fields[1]);
  if (!startTime.ok) return fail(invalid('start_time', fields[1], startTime.error));

  if (fields.length < 3) return fail(missing('loop_count'));
  const countText = restOf(fields, 2);
  const loopCount = parseInteger(countText);
  if (!loopCount.ok) return fail(invalid('loop_count', countText, loopCount.error));

  return ok<CommandProperties>({ type: 'loop', startTime: startTime.value, loopCount: loopCount.value, commands: [] });
}

function parseTrigger(fields: readonly string[]): Result<CommandProperties, EventsError> {
  if (fields.length < 2) return fail(missing('trigger_type'));
  const triggerType = parseTriggerType(fields[1]);
  if (!triggerType.ok) return fail(invalid('trigger_type', fields[1], triggerType.error));

  if (fields.length < 3) return fail(missing('start_time'));
  const startTime = parseInteger(fields[2]);
  if (!startTime.ok) return fail(invalid('start_time', fields[2], startTime.error));

  if (fields.length < 4) return fail(missing('end_time'));
  const endTime = parseInteger(fields[3]);
  if (!endTime.ok) return fail(invalid('end_time', fields[3], endTime.error));

  const trigger: TriggerCommand = {
    type: 'trigger',
    triggerType: triggerType.value,
    startTime: startTime.value,
    endTime: endTime.value,
    commands: [],
  };
  if (fields.length > 4) {
    const groupText = restOf(fields, 4);
    const group = parseInteger(groupText);
    if (!group.ok) return fail(invalid('group_number', groupText, group.error));
    trigger.groupNumber = group.value;
  }
  return ok(trigger);
}

/** Parse one command line with its indentation already stripped. */
export function parseCommand(line: string): Result<Command, EventsError> {
  const fields = line.split(',');
  const token = fields[0];
  const properties = parseProperties(token, fields);
  if (!properties.ok) return properties;
  return ok({ properties: properties.value });
}

function parseProperties(token: string, fields: readonly string[]): Result<CommandProperties, EventsError> {
  switch (token) {
    case 'F': {
      const r = parseKeyframed(fields, FADE_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'fade', ...r.value }) : r;
    }
    case 'M': {
      const r = parseKeyframed(fields, MOVE_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'move', ...r.value }) : r;
    }
    case 'MX': {
      const r = parseKeyframed(fields, MOVE_X_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'moveX', ...r.value }) : r;
    }
    case 'MY': {
      const r = parseKeyframed(fields, MOVE_Y_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'moveY', ...r.value }) : r;
    }
    case 'S': {
      const r = parseKeyframed(fields, SCALE_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'scale', ...r.value }) : r;
    }
    case 'V': {
      const r = parseKeyframed(fields, VECTOR_SCALE_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'vectorScale', ...r.value }) : r;
    }
    case 'R': {
      const r = parseKeyframed(fields, ROTATE_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'rotate', ...r.value }) : r;
    }
    case 'C': {
      const r = parseKeyframed(fields, COLOUR_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'colour', ...r.value }) : r;
    }
    case 'P': {
      const r = parseKeyframed(fields, PARAMETER_SHAPE);
      return r.ok ? ok<CommandProperties>({ type: 'parameter', ...r.value }) : r;
    }
    case 'L':
      return parseLoop(fields);
    case 'T':
      return parseTrigger(fields);
    default:
      return fail(new UnknownTypeError('UnknownCommandType', token));
  }
}

function formatKeyframed<C, TStart, TContinuing>(
  token: string,
  command: Keyframed<TStart, TContinuing>,
  shape: KeyframeShape<C, TStart, TContinuing>,
): string {
  return [
    token,
    String(easingCode(command.easing)),
    String(command.startTime),
    command.endTime === undefined ? '' : String(command.endTime),
    ...formatKeyframeValues(command, shape),
  ].join(',');
}

function formatContainer(properties: ContainerCommandProperties): string {
  if (properties.type === 'loop') {
    return `L,${properties.startTime},${properties.loopCount}`;
  }
  const head = `T,${formatTriggerType(properties.triggerType)},${properties.startTime},${properties.endTime}`;
  return properties.groupNumber === undefined ? head : `${head},${properties.groupNumber}`;
}

/** Render a command's own line, without indentation or children. */
export function formatCommandProperties(properties: CommandProperties): string {
  const token = COMMAND_TOKENS[properties.type];
  switch (properties.type) {
    case 'fade':
      return formatKeyframed(token, properties, FADE_SHAPE);
    case 'move':
      return formatKeyframed(token, properties, MOVE_SHAPE);
    case 'moveX':
      return formatKeyframed(token, properties, MOVE_X_SHAPE);
    case 'moveY':
      return formatKeyframed(token, properties, MOVE_Y_SHAPE);
    case 'scale':
      return formatKeyframed(token, properties, SCALE_SHAPE);
    case 'vectorScale':
      return formatKeyframed(token, properties, VECTOR_SCALE_SHAPE);
    case 'rotate':
      return formatKeyframed(token, properties, ROTATE_SHAPE);
    case 'colour':
      return formatKeyframed(token, properties, COLOUR_SHAPE);
    case 'parameter':
      return formatKeyframed(token, properties, PARAMETER_SHAPE);
    case 'loop':
    case 'trigger':
      return formatContainer(properties);
  }
}

function checkKeyframed(properties: KeyframedCommandProperties): EventsError | undefined {
  switch (properties.type) {
    case 'fade':
      return checkContinuing(properties.continuing, FADE_SHAPE);
    case 'move':
      return checkContinuing(properties.continuing, MOVE_SHAPE);
    case 'moveX':
      return checkContinuing(properties.continuing, MOVE_X_SHAPE);
    case 'moveY':
      return checkContinuing(properties.continuing, MOVE_Y_SHAPE);
    case 'scale':
      return checkContinuing(properties.continuing, SCALE_SHAPE);
    case 'vectorScale':
      return checkContinuing(properties.continuing, VECTOR_SCALE_SHAPE);
    case 'rotate':
      return checkContinuing(properties.continuing, ROTATE_SHAPE);
    case 'colour':
      return checkContinuing(properties.continuing, COLOUR_SHAPE);
    case 'parameter':
      return checkContinuing(properties.continuing, PARAMETER_SHAPE);
  }
}

/**
 * Structural check of a command built in code, children included: continuing
 * records may only be cut short at the very end and trigger names must be
 * writable.
 */
export function validateCommand(command: Command): EventsError | undefined {
  const pending: Command[] = [command];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const properties = next.properties;
    if (properties.type === 'loop') {
      pending.push(...properties.commands);
    } else if (properties.type === 'trigger') {
      const error = checkTriggerType(properties.triggerType);
      if (error) return error;
      pending.push(...properties.commands);
    } else {
      const error = checkKeyframed(properties);
      if (error) return error;
    }
  }
  return undefined;
}
