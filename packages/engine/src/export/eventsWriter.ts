/*
 * Text writer for an [Events] section.
 */
import { Command, Event, Events } from '../parser/ast.js';
import { formatCommandProperties } from '../parser/command.js';
import { formatNormalEvent } from '../parser/normalEvent.js';
import { formatStoryboardObject } from '../parser/storyboardObject.js';
import { Version, versionPolicy } from '../version.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('writer');

export type IndentChar = ' ' | '_';

export interface SerializeOptions {
  /** Character repeated once per nesting level before a command. Defaults to a space. */
  indent?: IndentChar;
}

/**
 * Lines of a command and everything nested under it, `depth` being the
 * indentation of the command itself.
 */
function commandLines(commands: readonly Command[], depth: number, indent: IndentChar): string[] {
  const lines: string[] = [];
  const pending: { command: Command; depth: number }[] = [];
  for (let i = commands.length - 1; i >= 0; i--) pending.push({ command: commands[i], depth });

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const { command, depth: level } = next;
    lines.push(indent.repeat(level) + formatCommandProperties(command.properties));
    const props = command.properties;
    if (props.type === 'loop' || props.type === 'trigger') {
      for (let i = props.commands.length - 1; i >= 0; i--) {
        pending.push({ command: props.commands[i], depth: level + 1 });
      }
    }
  }
  return lines;
}

/** A single command with its children, indented as if directly under an object. */
export function serializeCommand(command: Command, options: SerializeOptions = {}, depth = 1): string {
  return commandLines([command], depth, options.indent ?? ' ').join('\n');
}

/**
 * Text of one event; an object comes with its commands. `undefined` when the
 * event cannot be written at `version`.
 */
export function serializeEvent(event: Event, version: Version, options: SerializeOptions = {}): string | undefined {
  switch (event.type) {
    case 'comment':
      return `//${event.text}`;
    case 'normal':
      return formatNormalEvent(event, version);
    case 'storyboard': {
      const header = formatStoryboardObject(event.object, version);
      return [header, ...commandLines(event.object.commands, 1, options.indent ?? ' ')].join('\n');
    }
  }
}

/**
 * Write events back to text at `version`. Returns `undefined` as soon as one
 * of them has no textual form there.
 */
export function serializeEvents(events: Events, version: Version, options: SerializeOptions = {}): string | undefined {
  versionPolicy(version);
  const parts: string[] = [];
  for (const event of events) {
    const text = serializeEvent(event, version, options);
    if (text === undefined) {
      log.debug(`event of type ${event.type} has no textual form at version ${version}`);
      return undefined;
    }
    parts.push(text);
  }
  return parts.join('\n');
}
