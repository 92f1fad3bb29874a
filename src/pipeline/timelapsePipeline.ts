import { promises as fsp } from 'fs';
import type { AssembleOptions, FfmpegEncoder } from '../encoder/FfmpegEncoder';
import { createError } from '../errors';
import { type Logger, tagLogger } from '../logging';
import type { TimeInterval } from '../time/interval';
import { checkInputDir, scanArtifacts } from '../timelapse/artifactScan';
import { scheduleFrames } from '../timelapse/FrameScheduler';
import type { ArtifactNaming, ScheduledFrame } from '../timelapse/types';

export interface TimelapseOptions extends AssembleOptions {
  inputDir: string;
  ratio: number;
  interval?: TimeInterval;
  maxOutputRate?: number;
  naming?: ArtifactNaming;
  encoder: Pick<FfmpegEncoder, 'assembleVideo'>;
  logger?: Logger;
}

export interface TimelapseResult {
  outputFile: string;
  frames: ScheduledFrame[];
}

const exists = (file: string) =>
  fsp.access(file).then(
    () => true,
    () => false,
  );

export async function buildTimelapse(options: TimelapseOptions): Promise<TimelapseResult> {
  const log = tagLogger('pipeline', options.logger);
  await checkInputDir(options.inputDir);
  if (!options.overwrite && (await exists(options.outputFile))) {
    throw createError(
      'OutputExists',
      `output file ${options.outputFile} already exists (use -y to overwrite)`,
      'encode',
    );
  }

  const artifacts = await scanArtifacts(options.inputDir, { naming: options.naming, logger: options.logger });
  const frames = scheduleFrames(artifacts, options.ratio, {
    interval: options.interval,
    maxOutputRate: options.maxOutputRate,
  });
  log(`Scheduled ${frames.length} of ${artifacts.length} stills`);

  const { outputFile, overwrite, cropX, cropY, videoCodec } = options;
  await options.encoder.assembleVideo(frames, { outputFile, overwrite, cropX, cropY, videoCodec });
  return { outputFile, frames };
}
