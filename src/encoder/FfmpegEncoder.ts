import { spawn } from 'child_process';
import { createError } from '../errors';
import type { Logger } from '../logging';
import { buildConcatScript } from '../timelapse/concatScript';
import type { ScheduledFrame } from '../timelapse/types';
import { buildCropFilter, type CropRange } from './cropFilter';

export interface FfmpegEncoderOptions {
  command?: string;
  logger?: Logger;
}

export interface AssembleOptions {
  outputFile: string;
  overwrite?: boolean;
  cropX?: CropRange;
  cropY?: CropRange;
  videoCodec?: string;
}

const DEFAULT_COMMAND = 'ffmpeg';

export function buildStillArgs(imagePath: string) {
  return ['-f', 'h264', '-i', 'pipe:0', '-update', '1', '-frames:v', '1', imagePath];
}

export function buildTimelapseArgs(options: AssembleOptions) {
  const args = options.overwrite ? ['-y'] : [];
  args.push('-f', 'concat', '-protocol_whitelist', 'file,pipe', '-safe', '0', '-i', 'pipe:0');
  args.push('-c:v', options.videoCodec || 'libx264');
  const crop = buildCropFilter(options.cropX, options.cropY);
  if (crop) {
    args.push('-vf', crop);
  }
  args.push('-preset', 'slow', '-crf', '18', '-tune', 'stillimage', '-pix_fmt', 'yuv420p', options.outputFile);
  return args;
}

/**
 * Runs ffmpeg with its input on stdin: a raw H.264 buffer for stills, or a
 * concat-demuxer script for timelapses.
 */
export class FfmpegEncoder {
  private command: string;
  private logger?: Logger;

  constructor(options: FfmpegEncoderOptions = {}) {
    this.command = options.command || DEFAULT_COMMAND;
    this.logger = options.logger;
  }

  async checkAvailable() {
    await this.run(['-version']);
  }

  async extractStill(h264: Buffer, imagePath: string) {
    await this.run(buildStillArgs(imagePath), h264);
    this.log('Extracted first frame to', imagePath);
    return imagePath;
  }

  async assembleVideo(frames: readonly ScheduledFrame[], options: AssembleOptions) {
    await this.run(buildTimelapseArgs(options), buildConcatScript(frames));
    this.log(`Timelapse generated from ${frames.length} frames:`, options.outputFile);
    return options.outputFile;
  }

  private run(args: string[], input?: Buffer | string) {
    this.log('Spawning encoder', this.command, args.join(' '));
    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const output: string[] = [];
      child.stdout?.on('data', (data) => output.push(data.toString()));
      child.stderr?.on('data', (data) => output.push(data.toString()));
      child.once('error', (err) => {
        if ('code' in err && err.code === 'ENOENT') {
          reject(createError('EncoderUnavailable', `${this.command} is not installed`, 'encode', err));
          return;
        }
        reject(createError('EncoderFailed', `failed to start ${this.command}: ${err.message}`, 'encode', err));
      });
      child.once('close', (code, signal) => {
        this.log('Encoder closed', code, signal || '');
        if (code === 0) {
          resolve(output.join(''));
          return;
        }
        reject(
          createError(
            'EncoderFailed',
            `${this.command} exited with ${code ?? signal}\n${this.command} output: ${output.join('').trim()}`,
            'encode',
          ),
        );
      });
      // ffmpeg may exit before reading all of stdin; the exit status reports the real problem
      child.stdin?.on('error', (err) => this.log('Encoder stdin error', err.message));
      child.stdin?.end(input);
    });
  }

  private log(...args: unknown[]) {
    if (this.logger) {
      this.logger('[encoder]', ...args);
    }
  }
}
