/**
 * Timeline entries of the [Events] section: backgrounds, videos, breaks,
 * colour transformations and samples.
 */
import { EventParams, FilePath, NormalEvent, Position, SampleParams } from './ast.js';
import { enumField, layerCodec } from './enums.js';
import { EventsError, Result, UnknownTypeError, fail, ok } from './errors.js';
import { formatDecimal, formatFilePath, integerInRange, parseDecimal, parseFilePath, parseInteger, readField, splitFields } from './primitives.js';
import { Version, timeFromText, timeToText, versionPolicy } from '../version.js';

const parseColourComponent = integerInRange(0, 255);
const parseVolume = integerInRange(0, 100);
const parseLayer = enumField(layerCodec, 'layer');

interface FileWithPosition {
  fileName: FilePath;
  position?: Position;
}

/** `<file>[,<x>,<y>]` from field 2 on. */
function parseFileWithPosition(fields: readonly string[], version: Version): Result<FileWithPosition, EventsError> {
  const hasPosition = fields.length > 3;
  const fileName = readField(fields, 2, 'file_name', parseFilePath, !hasPosition);
  if (!fileName.ok) return fileName;
  if (!hasPosition) {
    return ok(versionPolicy(version).positionMandatory ? { fileName: fileName.value, position: { x: 0, y: 0 } } : { fileName: fileName.value });
  }

  const x = readField(fields, 3, 'x', parseInteger);
  if (!x.ok) return x;
  const y = readField(fields, 4, 'y', parseInteger, true);
  if (!y.ok) return y;
  return ok({ fileName: fileName.value, position: { x: x.value, y: y.value } });
}

function parseSample(fields: readonly string[], shortHand: boolean): Result<SampleParams, EventsError> {
  const layer = readField(fields, 2, 'layer', parseLayer);
  if (!layer.ok) return layer;
  const hasVolume = fields.length > 4;
  const fileName = readField(fields, 3, 'file_name', parseFilePath, !hasVolume);
  if (!fileName.ok) return fileName;

  const params: SampleParams = { kind: 'sample', layer: layer.value, fileName: fileName.value, shortHand };
  if (hasVolume) {
    const volume = readField(fields, 4, 'volume', parseVolume, true);
    if (!volume.ok) return volume;
    params.volume = volume.value;
  }
  return ok(params);
}

function parseParams(token: string, fields: readonly string[], version: Version): Result<EventParams, EventsError> {
  switch (token) {
    case '0': {
      const file = parseFileWithPosition(fields, version);
      if (!file.ok) return file;
      return ok<EventParams>({ kind: 'background', ...file.value });
    }
    case '1':
    case 'Video': {
      const file = parseFileWithPosition(fields, version);
      if (!file.ok) return file;
      return ok<EventParams>({ kind: 'video', ...file.value, shortHand: token === '1' });
    }
    case '2':
    case 'Break': {
      const endTime = readField(fields, 2, 'end_time', parseInteger, true);
      if (!endTime.ok) return endTime;
      return ok<EventParams>({ kind: 'break', endTime: timeFromText(endTime.value, version), shortHand: token === '2' });
    }
    case '3': {
      const red = readField(fields, 2, 'red', parseColourComponent);
      if (!red.ok) return red;
      const green = readField(fields, 3, 'green', parseColourComponent);
      if (!green.ok) return green;
      const blue = readField(fields, 4, 'blue', parseColourComponent, true);
      if (!blue.ok) return blue;
      return ok<EventParams>({ kind: 'colourTransformation', red: red.value, green: green.value, blue: blue.value });
    }
    case '5':
    case 'Sample':
      return parseSample(fields, token === '5');
    default:
      return fail(new UnknownTypeError('UnknownEventType', token));
  }
}

/**
 * Parse a depth-0 line as a normal event. The header is checked before
 * anything else so an unknown header reports `UnknownEventType` even when
 * the rest of the line is short. Sample times may be fractional.
 */
export function parseNormalEvent(line: string, version: Version): Result<NormalEvent, EventsError> {
  const fields = splitFields(line);
  const token = fields[0];
  if (!['0', '1', 'Video', '2', 'Break', '3', '5', 'Sample'].includes(token)) {
    return fail(new UnknownTypeError('UnknownEventType', token));
  }

  const isSample = token === '5' || token === 'Sample';
  const startTime = readField(fields, 1, 'start_time', isSample ? parseDecimal : parseInteger);
  if (!startTime.ok) return startTime;
  const params = parseParams(token, fields, version);
  if (!params.ok) return params;
  return ok({ type: 'normal', startTime: timeFromText(startTime.value, version), params: params.value });
}

function formatPosition(position: Position | undefined, version: Version): string {
  const resolved = position ?? (versionPolicy(version).positionMandatory ? { x: 0, y: 0 } : undefined);
  return resolved === undefined ? '' : `,${resolved.x},${resolved.y}`;
}

/** Text of a normal event at `version`, or `undefined` when it has none there. */
export function formatNormalEvent(event: NormalEvent, version: Version): string | undefined {
  const start = timeToText(event.startTime, version);
  const params = event.params;
  switch (params.kind) {
    case 'background':
      return `0,${start},${formatFilePath(params.fileName)}${formatPosition(params.position, version)}`;
    case 'video':
      return `${params.shortHand ? '1' : 'Video'},${start},${formatFilePath(params.fileName)}${formatPosition(params.position, version)}`;
    case 'break':
      return `${params.shortHand ? '2' : 'Break'},${start},${timeToText(params.endTime, version)}`;
    case 'colourTransformation':
      if (!versionPolicy(version).colourTransformation) return undefined;
      return `3,${start},${params.red},${params.green},${params.blue}`;
    case 'sample': {
      const time = formatDecimal(timeToText(event.startTime, version));
      const head = `${params.shortHand ? '5' : 'Sample'},${time},${layerCodec.code(params.layer)},${formatFilePath(params.fileName)}`;
      return params.volume === undefined ? head : `${head},${params.volume}`;
    }
  }
}
