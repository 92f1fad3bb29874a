#!/usr/bin/env node
import path from 'path';
import { parseArgs } from 'util';
import { TokenSource } from './auth/TokenSource';
import { WeriftPeerSession } from './capture/WeriftPeerSession';
import { DEFAULT_TIMELAPSE, loadSettings } from './config';
import { DeviceClient } from './device/DeviceClient';
import { createGoogleDeviceApi } from './device/googleDeviceApi';
import { parseCropRange } from './encoder/cropFilter';
import { FfmpegEncoder } from './encoder/FfmpegEncoder';
import { createError, describeError, isPipelineError, type PipelineError } from './errors';
import { createConsoleLogger } from './logging';
import { captureStill } from './pipeline/capturePipeline';
import { buildTimelapse } from './pipeline/timelapsePipeline';
import { makeInterval } from './time/interval';
import { parseDuration, parseSpeedup, parseTimestamp } from './time/parseTime';

export const USAGE = `Usage:
  camera-timelapse capture [options]
    --enterprise-id <id>      enterprise the camera is registered to (env SDM_ENTERPRISE_ID)
    --output-dir <dir>        directory for captured stills (env CAMERA_OUTPUT_DIR, default .)
    --credentials <file>      OAuth client file (env CAMERA_CREDENTIALS_FILE, default credentials.json)
    --token <file>            token cache (env CAMERA_TOKEN_FILE, default token.json)
    --record-seconds <n>      length of the recorded clip (default 5)
    --ffmpeg <path>           ffmpeg binary (env FFMPEG_PATH, default ffmpeg)
    -q, --quiet               only print the saved path and errors

  camera-timelapse timelapse [options] [input-dir]
    -s, --speedup <ratio>     e.g. '1h/1m' or '1d/30s' (default 1h/1s)
    -o, --output <file>       output video (default timelapse.mp4)
    -y, --overwrite           overwrite the output file if it exists
    --crop-x <start-end>      crop horizontally by width ratios, e.g. 0.4-0.6
    --crop-y <start-end>      crop vertically by height ratios, e.g. 0.4-0.6
    --start-time <time>       HH:MM, YYYY-MM-DD or 'YYYY-MM-DD HH:MM'
    --end-time <time>         same formats as --start-time
    --duration <duration>     e.g. 1d6h30m, 2d, 6h30m
    --max-fps <n>             highest output frame rate (default 60)
    --ffmpeg <path>           ffmpeg binary (env FFMPEG_PATH, default ffmpeg)
    -q, --quiet               only print the output path and errors`;

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

const parseFlags = <T>(parse: () => T): T => {
  try {
    return parse();
  } catch (err) {
    throw createError('InvalidArgument', messageOf(err), 'cli', err);
  }
};

const positiveNumber = (value: string | undefined, name: string) => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw createError('InvalidArgument', `${name} must be a positive number, got '${value}'`, 'cli');
  }
  return parsed;
};

const printWarnings = (warnings: readonly PipelineError[]) => {
  warnings.forEach((warning) => console.warn(`Warning [${warning.kind}] (${warning.stage}): ${warning.message}`));
};

export async function runCapture(argv: string[], env: NodeJS.ProcessEnv = process.env) {
  const { values } = parseFlags(() =>
    parseArgs({
      args: argv,
      options: {
        'enterprise-id': { type: 'string' },
        'output-dir': { type: 'string' },
        credentials: { type: 'string' },
        token: { type: 'string' },
        'record-seconds': { type: 'string' },
        ffmpeg: { type: 'string' },
        quiet: { type: 'boolean', short: 'q' },
      },
    }),
  );
  const settings = loadSettings(env);
  const enterpriseId = values['enterprise-id'] ?? settings.enterpriseId;
  if (!enterpriseId) {
    throw createError('InvalidArgument', 'enterprise ID is required (--enterprise-id or SDM_ENTERPRISE_ID)', 'cli');
  }
  const recordSeconds = positiveNumber(values['record-seconds'], 'record-seconds');
  const logger = createConsoleLogger(values.quiet ?? false);

  const encoder = new FfmpegEncoder({ command: values.ffmpeg ?? settings.ffmpegPath, logger });
  await encoder.checkAvailable();

  const tokenSource = new TokenSource({
    credentialsFile: values.credentials ?? settings.credentialsFile,
    tokenFile: values.token ?? settings.tokenFile,
    logger,
  });
  await tokenSource.getAccessToken();
  const devices = new DeviceClient(createGoogleDeviceApi(await tokenSource.getClient()), logger);

  const result = await captureStill({
    enterpriseId,
    outputDir: values['output-dir'] ?? settings.outputDir,
    devices,
    createPeer: () => new WeriftPeerSession({ logger }),
    encoder,
    config: recordSeconds === undefined ? {} : { recordingMs: recordSeconds * 1000 },
    logger,
  });
  printWarnings(result.warnings);
  console.log(result.imagePath);
}

export async function runTimelapse(argv: string[], env: NodeJS.ProcessEnv = process.env) {
  const { values, positionals } = parseFlags(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        speedup: { type: 'string', short: 's' },
        output: { type: 'string', short: 'o' },
        overwrite: { type: 'boolean', short: 'y' },
        'crop-x': { type: 'string' },
        'crop-y': { type: 'string' },
        'start-time': { type: 'string' },
        'end-time': { type: 'string' },
        duration: { type: 'string' },
        'max-fps': { type: 'string' },
        ffmpeg: { type: 'string' },
        quiet: { type: 'boolean', short: 'q' },
      },
    }),
  );
  if (positionals.length > 1) {
    throw createError('InvalidArgument', `expected at most one input directory, got ${positionals.length}`, 'cli');
  }
  const settings = loadSettings(env);
  const inputDir = path.resolve(positionals[0] ?? DEFAULT_TIMELAPSE.inputDir);
  const ratio = parseSpeedup(values.speedup ?? DEFAULT_TIMELAPSE.speedup);
  const cropX = parseCropRange(values['crop-x'] ?? '', 'crop-x');
  const cropY = parseCropRange(values['crop-y'] ?? '', 'crop-y');
  const now = new Date();
  const interval = makeInterval(
    parseTimestamp(values['start-time'] ?? '', now),
    parseTimestamp(values['end-time'] ?? '', now),
    parseDuration(values.duration ?? ''),
    now,
  );
  const maxOutputRate = positiveNumber(values['max-fps'], 'max-fps');
  const logger = createConsoleLogger(values.quiet ?? false);

  const encoder = new FfmpegEncoder({ command: values.ffmpeg ?? settings.ffmpegPath, logger });
  await encoder.checkAvailable();

  const { outputFile } = await buildTimelapse({
    inputDir,
    outputFile: values.output ?? DEFAULT_TIMELAPSE.outputFile,
    overwrite: values.overwrite ?? false,
    ratio,
    interval,
    maxOutputRate,
    cropX,
    cropY,
    encoder,
    logger,
  });
  console.log(`Timelapse generated: ${outputFile}`);
}

// argument and time-expression errors are worth a reminder of the syntax
const wantsUsage = (err: unknown) =>
  isPipelineError(err) && (err.stage === 'cli' || err.stage === 'parse' || err.stage === 'interval');

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case 'capture':
        await runCapture(rest, env);
        return 0;
      case 'timelapse':
        await runTimelapse(rest, env);
        return 0;
      case 'help':
      case '-h':
      case '--help':
        console.log(USAGE);
        return 0;
      default:
        throw createError(
          'InvalidArgument',
          command ? `unknown command: ${command}` : 'a command is required',
          'cli',
        );
    }
  } catch (err) {
    console.error(describeError(err));
    if (wantsUsage(err)) {
      console.error(USAGE);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(describeError(err));
      process.exitCode = 1;
    },
  );
}
