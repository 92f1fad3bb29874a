import { promises as fsp } from 'fs';
import path from 'path';
import { createError } from '../errors';
import { type Logger, tagLogger } from '../logging';
import { DEFAULT_NAMING, parseArtifactTime } from './artifactNaming';
import type { ArtifactNaming, TimestampedArtifact } from './types';

export interface ScanOptions {
  naming?: ArtifactNaming;
  logger?: Logger;
}

export async function checkInputDir(inputDir: string) {
  const stats = await fsp.stat(inputDir).catch((err: unknown) => {
    throw createError('ScanFailed', `failed to access input directory: ${inputDir}`, 'scan', err);
  });
  if (!stats.isDirectory()) {
    throw createError('ScanFailed', `input path is not a directory: ${inputDir}`, 'scan');
  }
}

/**
 * Walks `inputDir` recursively and returns every artifact whose file name carries
 * a capture timestamp, in discovery order (entries sorted by name at each level).
 * Files that merely look like artifacts but carry an unparseable timestamp are skipped.
 */
export async function scanArtifacts(inputDir: string, options: ScanOptions = {}): Promise<TimestampedArtifact[]> {
  const naming = options.naming ?? DEFAULT_NAMING;
  const log = tagLogger('scan', options.logger);
  const extension = `.${naming.extension.toLowerCase()}`;
  await checkInputDir(inputDir);

  const artifacts: TimestampedArtifact[] = [];
  let skipped = 0;

  const walk = async (dir: string): Promise<void> => {
    const entries = await fsp.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
      throw createError('ScanFailed', `error walking directory: ${dir}`, 'scan', err);
    });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
        continue;
      }
      if (!entry.isFile()) continue;
      if (!entry.name.toLowerCase().endsWith(extension)) continue;
      if (!entry.name.startsWith(naming.prefix)) continue;

      const capturedAt = parseArtifactTime(entry.name, naming);
      if (!capturedAt) {
        skipped += 1;
        log('Skipping file with unparseable timestamp', entryPath);
        continue;
      }
      artifacts.push({ identifier: entryPath, capturedAt });
    }
  };

  await walk(inputDir);
  log(`Found ${artifacts.length} artifacts in ${inputDir}`, skipped ? `(${skipped} skipped)` : '');
  return artifacts;
}
