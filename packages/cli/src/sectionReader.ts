import { LATEST_VERSION, Version } from '@osbkit/engine';

const FORMAT_HEADER = /^osu file format v(\d+)\s*$/;
const SECTION_HEADER = /^\[([A-Za-z]+)\]\s*$/;

export interface EventsSource {
  /** From the file header when present, otherwise the fallback. */
  version: Version;
  /** Whether the file header named the version. */
  versionFromHeader: boolean;
  /** Body of the [Events] section, or the whole input when it has no sections. */
  body: string;
  /** 0-based line of the input where `body` starts. */
  lineOffset: number;
}

/**
 * Locate the [Events] body of a beatmap or storyboard file. A file without
 * section headers is taken as a bare events body.
 */
export function readEventsSection(source: string, fallbackVersion: Version = LATEST_VERSION): EventsSource {
  const lines = source.replace(/^\uFEFF/, '').split('\n');

  let version = fallbackVersion;
  let versionFromHeader = false;
  let start = 0;
  const firstContent = lines.findIndex(line => line.trim().length > 0);
  const header = firstContent === -1 ? null : FORMAT_HEADER.exec(lines[firstContent].trim());
  if (header) {
    version = Number(header[1]);
    versionFromHeader = true;
    start = firstContent + 1;
  }

  const sectionIndex = lines.findIndex(line => line.trim() === '[Events]');
  if (sectionIndex === -1) {
    const hasOtherSections = lines.some(line => SECTION_HEADER.test(line.trim()));
    const body = hasOtherSections ? '' : lines.slice(start).join('\n');
    return { version, versionFromHeader, body, lineOffset: start };
  }

  let end = lines.length;
  for (let i = sectionIndex + 1; i < lines.length; i++) {
    if (SECTION_HEADER.test(lines[i].trim())) {
      end = i;
      break;
    }
  }
  return {
    version,
    versionFromHeader,
    body: lines.slice(sectionIndex + 1, end).join('\n'),
    lineOffset: sectionIndex + 1,
  };
}
