// Programmatic entry points of the CLI, next to the engine helpers it wraps.
export { createProgram, run } from './cli.js';
export { readEventsSection, type EventsSource } from './sectionReader.js';
export { parseEvents, serializeEvents, exportEventsJSON } from '@osbkit/engine';
