/*
 * JSON export of a parsed [Events] section.
 */
import { writeFileSync } from 'fs';
import { Command, Events } from '../parser/ast.js';
import { Version, versionPolicy } from '../version.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('export');

export interface EventsSummary {
  comments: number;
  backgrounds: number;
  videos: number;
  breaks: number;
  colourTransformations: number;
  samples: number;
  sprites: number;
  animations: number;
  /** Every command, nested ones included. */
  commands: number;
}

export interface EventsDocument {
  exportedAt: string;
  version: Version;
  summary: EventsSummary;
  events: Events;
}

function countCommands(commands: readonly Command[]): number {
  let count = 0;
  const pending = [...commands];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    count++;
    if (next.properties.type === 'loop' || next.properties.type === 'trigger') {
      pending.push(...next.properties.commands);
    }
  }
  return count;
}

export function summarizeEvents(events: Events): EventsSummary {
  const summary: EventsSummary = {
    comments: 0,
    backgrounds: 0,
    videos: 0,
    breaks: 0,
    colourTransformations: 0,
    samples: 0,
    sprites: 0,
    animations: 0,
    commands: 0,
  };
  for (const event of events) {
    if (event.type === 'comment') {
      summary.comments++;
    } else if (event.type === 'storyboard') {
      if (event.object.objectType.kind === 'sprite') summary.sprites++;
      else summary.animations++;
      summary.commands += countCommands(event.object.commands);
    } else {
      switch (event.params.kind) {
        case 'background':
          summary.backgrounds++;
          break;
        case 'video':
          summary.videos++;
          break;
        case 'break':
          summary.breaks++;
          break;
        case 'colourTransformation':
          summary.colourTransformations++;
          break;
        case 'sample':
          summary.samples++;
          break;
      }
    }
  }
  return summary;
}

export interface ExportJSONOptions {
  /** Also write the document to this path; `.json` is appended when missing. */
  outPath?: string;
  /** Timestamp recorded in the document. Defaults to now. */
  now?: Date;
}

/** Build the JSON document for `events`, returning its text. */
export function exportEventsJSON(events: Events, version: Version, opts: ExportJSONOptions = {}): string {
  versionPolicy(version);
  const doc: EventsDocument = {
    exportedAt: (opts.now ?? new Date()).toISOString(),
    version,
    summary: summarizeEvents(events),
    events,
  };
  const text = JSON.stringify(doc, null, 2);

  if (opts.outPath !== undefined) {
    const outPath = opts.outPath.toLowerCase().endsWith('.json') ? opts.outPath : `${opts.outPath}.json`;
    writeFileSync(outPath, text, 'utf8');
    log.info(`wrote ${text.length} bytes to ${outPath}`);
  }
  return text;
}
