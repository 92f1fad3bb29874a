import { promises as fsp } from 'fs';
import path from 'path';
import { CaptureSessionController } from '../capture/CaptureSessionController';
import type { CaptureConfig, PeerSession } from '../capture/types';
import type { DeviceClient } from '../device/DeviceClient';
import type { FfmpegEncoder } from '../encoder/FfmpegEncoder';
import { createError, type PipelineError } from '../errors';
import { type Logger, tagLogger } from '../logging';
import { artifactPathFor, DEFAULT_NAMING } from '../timelapse/artifactNaming';
import type { ArtifactNaming } from '../timelapse/types';

export interface CaptureStillOptions {
  enterpriseId: string;
  outputDir: string;
  devices: Pick<DeviceClient, 'findCaptureDevice' | 'relaySignal'>;
  createPeer: () => PeerSession;
  encoder: Pick<FfmpegEncoder, 'extractStill'>;
  config?: Partial<CaptureConfig>;
  naming?: ArtifactNaming;
  logger?: Logger;
  now?: () => Date;
}

export interface CaptureStillResult {
  imagePath: string;
  warnings: PipelineError[];
}

/**
 * One still: locate the camera, record a short clip over a fresh peer
 * session, and write its first frame under `outputDir/YYYY/MM/DD`.
 */
export async function captureStill(options: CaptureStillOptions): Promise<CaptureStillResult> {
  const log = tagLogger('pipeline', options.logger);
  const now = options.now ?? (() => new Date());

  const device = await options.devices.findCaptureDevice(options.enterpriseId);
  const controller = new CaptureSessionController({
    peer: options.createPeer(),
    exchangeAnswer: (offerSdp) => options.devices.relaySignal(device, offerSdp),
    config: options.config,
    logger: options.logger,
  });
  const { buffer, warnings } = await controller.capture();

  const imagePath = artifactPathFor(options.outputDir, now(), options.naming ?? DEFAULT_NAMING);
  await fsp.mkdir(path.dirname(imagePath), { recursive: true }).catch((err: unknown) => {
    throw createError('EncoderFailed', `failed to create output directory ${path.dirname(imagePath)}`, 'encode', err);
  });
  await options.encoder.extractStill(buffer, imagePath);
  log('Saved still to', imagePath);
  return { imagePath, warnings };
}
