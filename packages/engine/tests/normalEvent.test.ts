import { NormalEvent } from '../src/parser/ast';
import { formatNormalEvent, parseNormalEvent } from '../src/parser/normalEvent';

function parsed(line: string, version: number): NormalEvent {
  const result = parseNormalEvent(line, version);
  if (!result.ok) throw result.error;
  return result.value;
}

describe('parseNormalEvent', () => {
  test('background with a quoted file and a position', () => {
    expect(parsed('0,0,"bg.jpg",10,-20', 14)).toEqual({
      type: 'normal',
      startTime: 0,
      params: { kind: 'background', fileName: { path: 'bg.jpg', quoted: true }, position: { x: 10, y: -20 } },
    });
  });

  test('missing positions are filled in from version 14 only', () => {
    expect(parsed('0,0,bg.jpg', 14).params).toEqual({
      kind: 'background',
      fileName: { path: 'bg.jpg', quoted: false },
      position: { x: 0, y: 0 },
    });
    const older = parsed('0,0,bg.jpg', 12).params;
    expect(older).toEqual({ kind: 'background', fileName: { path: 'bg.jpg', quoted: false } });
    expect('position' in older).toBe(false);
  });

  test('video headers remember their spelling', () => {
    expect(parsed('1,500,"intro.mp4",10,20', 8).params).toEqual({
      kind: 'video',
      fileName: { path: 'intro.mp4', quoted: true },
      position: { x: 10, y: 20 },
      shortHand: true,
    });
    expect(parsed('Video,500,"intro.mp4"', 8).params).toMatchObject({ kind: 'video', shortHand: false });
  });

  test('break times get the legacy offset at versions 3 and 4', () => {
    expect(parsed('2,1000,2000', 4)).toEqual({
      type: 'normal',
      startTime: 1024,
      params: { kind: 'break', endTime: 2024, shortHand: true },
    });
    expect(parsed('Break,1000,2000', 5)).toEqual({
      type: 'normal',
      startTime: 1000,
      params: { kind: 'break', endTime: 2000, shortHand: false },
    });
  });

  test('colour transformation', () => {
    expect(parsed('3,100,255,128,0', 7).params).toEqual({ kind: 'colourTransformation', red: 255, green: 128, blue: 0 });
  });

  test('samples take a layer name or code and an optional volume', () => {
    expect(parsed('Sample,1000,3,"hit.wav",70', 14).params).toEqual({
      kind: 'sample',
      layer: 'Foreground',
      fileName: { path: 'hit.wav', quoted: true },
      volume: 70,
      shortHand: false,
    });
    expect(parsed('5,1000,Pass,hit.wav', 14).params).toEqual({
      kind: 'sample',
      layer: 'Pass',
      fileName: { path: 'hit.wav', quoted: false },
      shortHand: true,
    });
  });

  test('sample times may be fractional and get the legacy offset', () => {
    expect(parsed('5,1000.5,0,hit.wav', 14).startTime).toBe(1000.5);
    expect(parsed('5,1000.5,0,hit.wav', 4).startTime).toBe(1024.5);
    const result = parseNormalEvent('0,1.5,bg.jpg', 14);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('InvalidStartTime');
  });

  test('a comma inside a quoted file name is part of the name', () => {
    expect(parsed('0,0,"a,b.jpg",1,2', 14).params).toMatchObject({ fileName: { path: 'a,b.jpg', quoted: true } });
  });

  test.each([
    ['9,0,x', 'UnknownEventType'],
    ['Background,0,bg.jpg', 'UnknownEventType'],
    ['0', 'MissingStartTime'],
    ['0,x,bg.jpg', 'InvalidStartTime'],
    ['0,0', 'MissingFileName'],
    ['0,0,bg.jpg,5', 'MissingY'],
    ['0,0,bg.jpg,a,5', 'InvalidX'],
    ['0,0,bg.jpg,5,6,7', 'InvalidY'],
    ['2,0', 'MissingEndTime'],
    ['2,0,5,6', 'InvalidEndTime'],
    ['3,0,1,2', 'MissingBlue'],
    ['3,0,1,2,300', 'InvalidBlue'],
    ['3,0,-1,2,3', 'InvalidRed'],
    ['Sample,0,9,a.wav', 'InvalidLayer'],
    ['Sample,0,1', 'MissingFileName'],
    ['Sample,0,1,a.wav,101', 'InvalidVolume'],
  ])('%s fails with %s', (line, code) => {
    const result = parseNormalEvent(line, 14);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(code);
  });
});

describe('formatNormalEvent', () => {
  test('positions are always printed from version 14', () => {
    const event: NormalEvent = {
      type: 'normal',
      startTime: 0,
      params: { kind: 'background', fileName: { path: 'bg.jpg', quoted: true } },
    };
    expect(formatNormalEvent(event, 14)).toBe('0,0,"bg.jpg",0,0');
    expect(formatNormalEvent(event, 12)).toBe('0,0,"bg.jpg"');
  });

  test('legacy offset is removed on output', () => {
    expect(formatNormalEvent(parsed('2,1000,2000', 3), 3)).toBe('2,1000,2000');
  });

  test('colour transformations have no text from version 14', () => {
    const event = parsed('3,100,255,128,0', 13);
    expect(formatNormalEvent(event, 13)).toBe('3,100,255,128,0');
    expect(formatNormalEvent(event, 14)).toBeUndefined();
  });

  test('sample layers are written as codes', () => {
    expect(formatNormalEvent(parsed('Sample,1000,Foreground,"hit.wav",70', 14), 14)).toBe('Sample,1000,3,"hit.wav",70');
    expect(formatNormalEvent(parsed('5,0,0,hit.wav', 14), 14)).toBe('5,0,0,hit.wav');
  });

  test('fractional sample times are written back with the offset removed', () => {
    expect(formatNormalEvent(parsed('5,1000.5,0,hit.wav', 14), 14)).toBe('5,1000.5,0,hit.wav');
    expect(formatNormalEvent(parsed('Sample,1000.5,Pass,hit.wav,20', 4), 4)).toBe('Sample,1000.5,2,hit.wav,20');
  });

  test('file names with commas are quoted', () => {
    const event: NormalEvent = {
      type: 'normal',
      startTime: 5,
      params: { kind: 'video', fileName: { path: 'a,b.mp4', quoted: false }, shortHand: false },
    };
    expect(formatNormalEvent(event, 6)).toBe('Video,5,"a,b.mp4"');
  });
});
