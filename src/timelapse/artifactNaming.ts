import path from 'path';
import { localDateTime } from '../time/parseTime';
import type { ArtifactNaming } from './types';

export const DEFAULT_NAMING: ArtifactNaming = {
  prefix: 'camera_frame_',
  extension: 'jpg',
};

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** `<prefix>YYYYMMDD_HHMMSS.<ext>` in local time. */
export function formatArtifactName(capturedAt: Date, naming: ArtifactNaming = DEFAULT_NAMING) {
  const date = `${pad(capturedAt.getFullYear(), 4)}${pad(capturedAt.getMonth() + 1)}${pad(capturedAt.getDate())}`;
  const time = `${pad(capturedAt.getHours())}${pad(capturedAt.getMinutes())}${pad(capturedAt.getSeconds())}`;
  return `${naming.prefix}${date}_${time}.${naming.extension}`;
}

/** Stills land in `YYYY/MM/DD` below the output directory. */
export function artifactPathFor(outputDir: string, capturedAt: Date, naming: ArtifactNaming = DEFAULT_NAMING) {
  return path.join(
    outputDir,
    pad(capturedAt.getFullYear(), 4),
    pad(capturedAt.getMonth() + 1),
    pad(capturedAt.getDate()),
    formatArtifactName(capturedAt, naming),
  );
}

/** Recovers the capture time from a file name, or undefined when the name does not follow the pattern. */
export function parseArtifactTime(filename: string, naming: ArtifactNaming = DEFAULT_NAMING): Date | undefined {
  const pattern = new RegExp(
    `^${escapeRegExp(naming.prefix)}(\\d{4})(\\d{2})(\\d{2})_(\\d{2})(\\d{2})(\\d{2})\\.${escapeRegExp(naming.extension)}$`,
    'i',
  );
  const match = pattern.exec(path.basename(filename));
  if (!match) return undefined;

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const capturedAt = localDateTime(year, month - 1, day, hours, minutes, seconds);
  if (
    capturedAt.getFullYear() !== year ||
    capturedAt.getMonth() !== month - 1 ||
    capturedAt.getDate() !== day ||
    capturedAt.getHours() !== hours ||
    capturedAt.getMinutes() !== minutes ||
    capturedAt.getSeconds() !== seconds
  ) {
    return undefined;
  }
  return capturedAt;
}
