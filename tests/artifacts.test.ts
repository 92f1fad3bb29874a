import { test } from '@fast-check/vitest';
import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isPipelineError } from '../src/errors';
import { artifactPathFor, formatArtifactName, parseArtifactTime } from '../src/timelapse/artifactNaming';
import { checkInputDir, scanArtifacts } from '../src/timelapse/artifactScan';
import { captureTimeArbitrary } from './arbitraries';

describe('artifact naming', () => {
  const capturedAt = new Date(2024, 2, 5, 7, 8, 9);

  it('formats the capture time into the file name', () => {
    expect(formatArtifactName(capturedAt)).toBe('camera_frame_20240305_070809.jpg');
    expect(formatArtifactName(capturedAt, { prefix: 'porch_', extension: 'png' })).toBe('porch_20240305_070809.png');
  });

  it('files stills under a dated directory', () => {
    expect(artifactPathFor('/out', capturedAt)).toBe('/out/2024/03/05/camera_frame_20240305_070809.jpg');
  });

  it('recovers the capture time from a path', () => {
    expect(parseArtifactTime('/out/2024/03/05/camera_frame_20240305_070809.jpg')).toEqual(capturedAt);
    expect(parseArtifactTime('CAMERA_FRAME_20240305_070809.JPG')).toEqual(capturedAt);
  });

  it('keeps four-digit years below 100', () => {
    const early = new Date(2000, 5, 1, 12, 0, 0);
    early.setFullYear(50);

    expect(formatArtifactName(early)).toBe('camera_frame_00500601_120000.jpg');
    expect(artifactPathFor('/out', early)).toBe('/out/0050/06/01/camera_frame_00500601_120000.jpg');
    expect(parseArtifactTime('camera_frame_00500601_120000.jpg')?.getFullYear()).toBe(50);
  });

  it('rejects names that do not carry a valid timestamp', () => {
    expect(parseArtifactTime('camera_frame_20240230_070809.jpg')).toBeUndefined();
    expect(parseArtifactTime('camera_frame_20240305_246000.jpg')).toBeUndefined();
    expect(parseArtifactTime('camera_frame_2024030_070809.jpg')).toBeUndefined();
    expect(parseArtifactTime('other_20240305_070809.jpg')).toBeUndefined();
    expect(parseArtifactTime('camera_frame_20240305_070809.png')).toBeUndefined();
  });

  test.prop([captureTimeArbitrary])('a formatted name parses back to the same name', (date) => {
    const name = formatArtifactName(date);
    const parsed = parseArtifactTime(name);
    expect(parsed && formatArtifactName(parsed)).toBe(name);
  });
});

describe('scanArtifacts', () => {
  let root: string;

  const touch = async (...segments: string[]) => {
    const file = path.join(root, ...segments);
    await fsp.mkdir(path.dirname(file), { recursive: true });
    await fsp.writeFile(file, 'jpeg');
    return file;
  };

  beforeEach(async () => {
    root = await fsp.mkdtemp(path.join(os.tmpdir(), 'camera-scan-'));
  });

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true });
  });

  it('walks nested directories in name order', async () => {
    const later = await touch('2024', '03', '05', 'camera_frame_20240305_070809.jpg');
    const earlier = await touch('2024', '03', '04', 'camera_frame_20240304_235959.jpg');
    await touch('notes.txt');
    await touch('other_20240305_070809.jpg');

    const artifacts = await scanArtifacts(root);

    expect(artifacts).toEqual([
      { identifier: earlier, capturedAt: new Date(2024, 2, 4, 23, 59, 59) },
      { identifier: later, capturedAt: new Date(2024, 2, 5, 7, 8, 9) },
    ]);
  });

  it('skips and logs stills with unparseable timestamps', async () => {
    const bad = await touch('camera_frame_bad.jpg');
    await touch('camera_frame_20240305_070809.jpg');
    const logger = vi.fn();

    const artifacts = await scanArtifacts(root, { logger });

    expect(artifacts).toHaveLength(1);
    expect(logger).toHaveBeenCalledWith('[scan]', 'Skipping file with unparseable timestamp', bad);
  });

  it('honours a custom naming scheme', async () => {
    const png = await touch('porch_20240305_070809.png');
    await touch('camera_frame_20240305_070809.jpg');

    const artifacts = await scanArtifacts(root, { naming: { prefix: 'porch_', extension: 'png' } });

    expect(artifacts.map((a) => a.identifier)).toEqual([png]);
  });

  it('returns nothing for an empty directory', async () => {
    expect(await scanArtifacts(root)).toEqual([]);
  });

  it('rejects a missing directory or a plain file', async () => {
    const file = await touch('camera_frame_20240305_070809.jpg');
    const missing = path.join(root, 'missing');

    const errors = await Promise.all([checkInputDir(missing), checkInputDir(file)].map((p) => p.catch((e: unknown) => e)));

    expect(errors.map((e) => isPipelineError(e) && [e.kind, e.message])).toEqual([
      ['ScanFailed', `failed to access input directory: ${missing}`],
      ['ScanFailed', `input path is not a directory: ${file}`],
    ]);
  });
});
