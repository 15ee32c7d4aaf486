/**
 * Sprite and animation header lines. Commands are attached afterwards by the
 * command tree builder.
 */
import { ObjectType, Position, StoryboardObject } from './ast.js';
import { enumField, layerCodec, loopTypeCodec, originCodec } from './enums.js';
import { EventsError, Result, UnknownTypeError, fail, ok } from './errors.js';
import { formatDecimal, formatFilePath, parseDecimal, parseFilePath, parseInteger, readField, splitFields } from './primitives.js';
import { Version } from '../version.js';

const parseLayer = enumField(layerCodec, 'layer');
const parseOrigin = enumField(originCodec, 'origin');
const parseLoopType = enumField(loopTypeCodec, 'loop type');

type ObjectKind = ObjectType['kind'];

function objectKind(token: string): { kind: ObjectKind; shortHand: boolean } | undefined {
  switch (token) {
    case 'Sprite':
      return { kind: 'sprite', shortHand: false };
    case '4':
      return { kind: 'sprite', shortHand: true };
    case 'Animation':
      return { kind: 'animation', shortHand: false };
    case '6':
      return { kind: 'animation', shortHand: true };
    default:
      return undefined;
  }
}

export function parseStoryboardObject(line: string): Result<StoryboardObject, EventsError> {
  const fields = splitFields(line);
  const header = objectKind(fields[0]);
  if (!header) return fail(new UnknownTypeError('UnknownObjectType', fields[0]));
  const isSprite = header.kind === 'sprite';

  const layer = readField(fields, 1, 'layer', parseLayer);
  if (!layer.ok) return layer;
  const origin = readField(fields, 2, 'origin', parseOrigin);
  if (!origin.ok) return origin;
  const positionless = isSprite && header.shortHand && fields.length <= 4;
  const filePath = readField(fields, 3, 'file_path', parseFilePath, positionless);
  if (!filePath.ok) return filePath;
  let position: Position | undefined;
  if (!positionless) {
    const x = readField(fields, 4, 'x', parseDecimal);
    if (!x.ok) return x;
    const y = readField(fields, 5, 'y', parseDecimal, isSprite);
    if (!y.ok) return y;
    position = { x: x.value, y: y.value };
  }

  let objectType: ObjectType;
  if (isSprite) {
    objectType = { kind: 'sprite', filePath: filePath.value };
  } else {
    const frameCount = readField(fields, 6, 'frame_count', parseInteger);
    if (!frameCount.ok) return frameCount;
    const hasLoopType = fields.length > 8;
    const frameDelay = readField(fields, 7, 'frame_delay', parseDecimal, !hasLoopType);
    if (!frameDelay.ok) return frameDelay;
    objectType = { kind: 'animation', filePath: filePath.value, frameCount: frameCount.value, frameDelay: frameDelay.value };
    if (hasLoopType) {
      const loopType = readField(fields, 8, 'loop_type', parseLoopType, true);
      if (!loopType.ok) return loopType;
      objectType.loopType = loopType.value;
    }
  }

  const object: StoryboardObject = {
    layer: layer.value,
    origin: origin.value,
    objectType,
    commands: [],
    shortHand: header.shortHand,
  };
  if (position) object.position = position;
  return ok(object);
}

/** Header line of an object, without its commands. */
export function formatStoryboardObject(object: StoryboardObject, version: Version): string {
  const type = object.objectType;
  const head = type.kind === 'sprite' ? (object.shortHand ? '4' : 'Sprite') : object.shortHand ? '6' : 'Animation';
  const parts = [head, layerCodec.format(object.layer, version), originCodec.format(object.origin, version), formatFilePath(type.filePath)];
  // A `4` sprite without a position writes none; every other header needs one.
  const position = object.position ?? (type.kind === 'sprite' && object.shortHand ? undefined : { x: 0, y: 0 });
  if (position) parts.push(formatDecimal(position.x), formatDecimal(position.y));
  if (type.kind === 'animation') {
    parts.push(String(type.frameCount), formatDecimal(type.frameDelay));
    if (type.loopType !== undefined) parts.push(loopTypeCodec.format(type.loopType, version));
  }
  return parts.join(',');
}
