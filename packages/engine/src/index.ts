export * from './parser/ast.js';
export {
  parseEvents,
  safeParseEvents,
  pushCommand,
  type ParseOptions,
  parseCommand,
  formatCommandProperties,
  validateCommand,
  COMMAND_TOKENS,
  parseNormalEvent,
  formatNormalEvent,
  parseStoryboardObject,
  formatStoryboardObject,
  CommandTreeBuilder,
} from './parser/index.js';
export * from './parser/errors.js';
export * from './parser/primitives.js';
export * from './parser/enums.js';
export * from './parser/easing.js';
export * from './parser/triggerType.js';
export {
  type KeyframeShape,
  type Keyframe,
  expandKeyframes,
  resolveContinuing,
  checkContinuing,
  FADE_SHAPE,
  MOVE_SHAPE,
  MOVE_X_SHAPE,
  MOVE_Y_SHAPE,
  SCALE_SHAPE,
  VECTOR_SCALE_SHAPE,
  ROTATE_SHAPE,
  COLOUR_SHAPE,
  PARAMETER_SHAPE,
} from './parser/continuing.js';
export * from './version.js';
export { serializeEvents, serializeEvent, serializeCommand, type SerializeOptions, type IndentChar } from './export/eventsWriter.js';
export { exportEventsJSON, summarizeEvents, type EventsSummary, type EventsDocument, type ExportJSONOptions } from './export/jsonExport.js';
export * from './util/index.js';
