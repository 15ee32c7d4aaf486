import { Command, Event, Events, StoryboardObject } from './ast.js';
import { parseCommand, validateCommand } from './command.js';
import { CommandTreeBuilder } from './commandTree.js';
import { EventsError, LineError, Result, StoryboardCmdWithNoSpriteError, fail, ok } from './errors.js';
import { parseNormalEvent } from './normalEvent.js';
import { parseStoryboardObject } from './storyboardObject.js';
import { Version, versionPolicy } from '../version.js';
import { createLogger } from '../util/logger.js';
import { warn } from '../util/diag.js';

const log = createLogger('parser');

export interface ParseOptions {
  /** Shown in diagnostics. */
  file?: string;
}

const INDENT_CHARS = new Set([' ', '_']);

function indentation(line: string): number {
  let depth = 0;
  while (depth < line.length && INDENT_CHARS.has(line[depth])) depth++;
  return depth;
}

function parseTopLevel(line: string, version: Version): Result<Event, EventsError> {
  const object = parseStoryboardObject(line);
  if (object.ok) return ok({ type: 'storyboard', object: object.value });
  if (object.error.code !== 'UnknownObjectType') return object;

  const normal = parseNormalEvent(line, version);
  return normal.ok ? ok<Event>(normal.value) : normal;
}

/** Like `parseEvents`, but returns the first failure instead of throwing it. */
export function safeParseEvents(text: string, version: Version, options: ParseOptions = {}): Result<Events, LineError> {
  const policy = versionPolicy(version);
  const events: Events = [];
  // Builder for the object on the previous event line, if that line was one.
  let owner: CommandTreeBuilder | undefined;

  const lines = text.split('\n');
  for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
    const line = lines[lineIndex].replace(/\r$/, '');
    if (line.trim().length === 0) continue;

    if (line.startsWith('//')) {
      events.push({ type: 'comment', text: line.slice(2) });
      owner = undefined;
      continue;
    }

    const depth = indentation(line);
    const body = line.slice(depth);

    if (depth === 0) {
      const event = parseTopLevel(body, version);
      if (!event.ok) return fail(new LineError(event.error, lineIndex));
      events.push(event.value);
      owner = event.value.type === 'storyboard' ? new CommandTreeBuilder(event.value.object.commands) : undefined;
      if (
        event.value.type === 'normal' &&
        event.value.params.kind === 'colourTransformation' &&
        !policy.colourTransformation
      ) {
        warn('parser', `colour transformation has no textual form at version ${version}`, { file: options.file, lineIndex });
      }
      continue;
    }

    if (!owner) return fail(new LineError(new StoryboardCmdWithNoSpriteError(), lineIndex));
    const command = parseCommand(body);
    if (!command.ok) return fail(new LineError(command.error, lineIndex));
    const pushed = owner.push(command.value, depth);
    if (!pushed.ok) return fail(new LineError(pushed.error, lineIndex));
  }

  log.debug(`parsed ${events.length} events at version ${version}`);
  return ok(events);
}

/**
 * Parse the body of an [Events] section. Throws a `LineError` for the first
 * line that fails; nothing is returned for a partially parsed section.
 */
export function parseEvents(text: string, version: Version, options: ParseOptions = {}): Events {
  const result = safeParseEvents(text, version, options);
  if (!result.ok) {
    log.debug(result.error.message);
    throw result.error;
  }
  return result.value;
}

/** Append a command to the object's top level after validating it. */
export function pushCommand(object: StoryboardObject, command: Command): Result<void, EventsError> {
  const error = validateCommand(command);
  if (error) return fail(error);
  object.commands.push(command);
  return ok(undefined);
}

export { parseCommand, formatCommandProperties, validateCommand, COMMAND_TOKENS } from './command.js';
export { parseNormalEvent, formatNormalEvent } from './normalEvent.js';
export { parseStoryboardObject, formatStoryboardObject } from './storyboardObject.js';
export { CommandTreeBuilder } from './commandTree.js';
