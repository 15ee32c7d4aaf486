/**
 * In-memory model of an [Events] section.
 */
import type { Easing } from './easing.js';
import type { Layer, LoopType, Origin } from './enums.js';
import type { TriggerType } from './triggerType.js';

export interface Position {
  x: number;
  y: number;
}

export interface FilePath {
  path: string;
  /** Written between double quotes. */
  quoted: boolean;
}

// ---------- Events ----------

export interface CommentEvent {
  type: 'comment';
  text: string;
}

export interface NormalEvent {
  type: 'normal';
  /** Stored with the legacy time offset already applied. */
  startTime: number;
  params: EventParams;
}

export interface StoryboardEvent {
  type: 'storyboard';
  object: StoryboardObject;
}

export type Event = CommentEvent | NormalEvent | StoryboardEvent;

/** A whole section, in source line order. */
export type Events = Event[];

export interface BackgroundParams {
  kind: 'background';
  fileName: FilePath;
  position?: Position;
}

export interface VideoParams {
  kind: 'video';
  fileName: FilePath;
  position?: Position;
  /** `1` rather than `Video`. */
  shortHand: boolean;
}

export interface BreakParams {
  kind: 'break';
  endTime: number;
  /** `2` rather than `Break`. */
  shortHand: boolean;
}

export interface ColourTransformationParams {
  kind: 'colourTransformation';
  red: number;
  green: number;
  blue: number;
}

export interface SampleParams {
  kind: 'sample';
  layer: Layer;
  fileName: FilePath;
  /** 0-100, the game uses 100 when absent. */
  volume?: number;
  /** `5` rather than `Sample`. */
  shortHand: boolean;
}

export type EventParams = BackgroundParams | VideoParams | BreakParams | ColourTransformationParams | SampleParams;

// ---------- Storyboard objects ----------

export interface SpriteType {
  kind: 'sprite';
  filePath: FilePath;
}

export interface AnimationType {
  kind: 'animation';
  filePath: FilePath;
  frameCount: number;
  frameDelay: number;
  /** Absent in the text means `LoopForever`. */
  loopType?: LoopType;
}

export type ObjectType = SpriteType | AnimationType;

export interface StoryboardObject {
  layer: Layer;
  origin: Origin;
  /** Only a `4` sprite header may leave it out. */
  position?: Position;
  objectType: ObjectType;
  /** Top-level commands, in source order. */
  commands: Command[];
  /** `4`/`6` header rather than `Sprite`/`Animation`. */
  shortHand: boolean;
}

// ---------- Commands ----------

export interface Vector2 {
  x: number;
  y: number;
}

/** The last continuing record of a pair command may omit `y`. */
export interface PartialVector2 {
  x: number;
  y?: number;
}

export interface Rgb {
  red: number;
  green: number;
  blue: number;
}

/** The last continuing record of a colour command may omit `blue`, or `green` and `blue`. */
export interface PartialRgb {
  red: number;
  green?: number;
  blue?: number;
}

export type ParameterType = 'H' | 'V' | 'A';

/**
 * Shared shape of the animating commands: a first keyframe from `startTime`
 * to `endTime` reaching `start`, then one keyframe per `continuing` record.
 */
export interface Keyframed<TStart, TContinuing> {
  easing: Easing;
  startTime: number;
  /** Empty in the text, meaning the same as `startTime`. */
  endTime?: number;
  start: TStart;
  continuing: TContinuing[];
}

export interface FadeCommand extends Keyframed<number, number> {
  type: 'fade';
}

export interface MoveCommand extends Keyframed<Vector2, PartialVector2> {
  type: 'move';
}

export interface MoveXCommand extends Keyframed<number, number> {
  type: 'moveX';
}

export interface MoveYCommand extends Keyframed<number, number> {
  type: 'moveY';
}

export interface ScaleCommand extends Keyframed<number, number> {
  type: 'scale';
}

export interface VectorScaleCommand extends Keyframed<Vector2, PartialVector2> {
  type: 'vectorScale';
}

export interface RotateCommand extends Keyframed<number, number> {
  type: 'rotate';
}

export interface ColourCommand extends Keyframed<Rgb, PartialRgb> {
  type: 'colour';
}

export interface ParameterCommand extends Keyframed<ParameterType, ParameterType> {
  type: 'parameter';
}

export interface LoopCommand {
  type: 'loop';
  startTime: number;
  loopCount: number;
  commands: Command[];
}

export interface TriggerCommand {
  type: 'trigger';
  triggerType: TriggerType;
  startTime: number;
  endTime: number;
  groupNumber?: number;
  commands: Command[];
}

export type KeyframedCommandProperties =
  | FadeCommand
  | MoveCommand
  | MoveXCommand
  | MoveYCommand
  | ScaleCommand
  | VectorScaleCommand
  | RotateCommand
  | ColourCommand
  | ParameterCommand;

export type ContainerCommandProperties = LoopCommand | TriggerCommand;

export type CommandProperties = KeyframedCommandProperties | ContainerCommandProperties;

export interface Command {
  properties: CommandProperties;
}

export function isContainer(properties: CommandProperties): properties is ContainerCommandProperties {
  return properties.type === 'loop' || properties.type === 'trigger';
}
