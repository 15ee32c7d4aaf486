import { readEventsSection } from '../src/sectionReader';

describe('readEventsSection', () => {
  test('takes the version from the header and the [Events] body', () => {
    const source = [
      'osu file format v14',
      '',
      '[General]',
      'AudioFilename: audio.mp3',
      '',
      '[Events]',
      '//Background and Video events',
      '0,0,"bg.jpg",0,0',
      '',
      '[TimingPoints]',
      '0,500,4,2,0,100,1,0',
    ].join('\n');
    expect(readEventsSection(source)).toEqual({
      version: 14,
      versionFromHeader: true,
      body: '//Background and Video events\n0,0,"bg.jpg",0,0\n',
      lineOffset: 6,
    });
  });

  test('a bare body uses the fallback version', () => {
    expect(readEventsSection('2,100,163', 4)).toEqual({
      version: 4,
      versionFromHeader: false,
      body: '2,100,163',
      lineOffset: 0,
    });
  });

  test('a header without sections is followed by the body', () => {
    expect(readEventsSection('osu file format v12\n//x')).toEqual({
      version: 12,
      versionFromHeader: true,
      body: '//x',
      lineOffset: 1,
    });
  });

  test('a file with sections but no [Events] has an empty body', () => {
    expect(readEventsSection('osu file format v14\n[General]\nMode: 0').body).toBe('');
  });

  test('a byte order mark before the header is ignored', () => {
    expect(readEventsSection('\uFEFFosu file format v9\r\n[Events]\r\n//a').version).toBe(9);
  });
});
