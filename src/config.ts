import { z } from 'zod';

export interface CaptureSettings {
  enterpriseId: string;
  outputDir: string;
  credentialsFile: string;
  tokenFile: string;
  ffmpegPath: string;
}

export const DEFAULT_SETTINGS: CaptureSettings = {
  enterpriseId: '',
  outputDir: '.',
  credentialsFile: 'credentials.json',
  tokenFile: 'token.json',
  ffmpegPath: 'ffmpeg',
};

export const DEFAULT_TIMELAPSE = {
  speedup: '1h/1s',
  outputFile: 'timelapse.mp4',
  inputDir: '.',
};

const EnvSchema = z.object({
  SDM_ENTERPRISE_ID: z.string().min(1).optional(),
  CAMERA_OUTPUT_DIR: z.string().min(1).optional(),
  CAMERA_CREDENTIALS_FILE: z.string().min(1).optional(),
  CAMERA_TOKEN_FILE: z.string().min(1).optional(),
  FFMPEG_PATH: z.string().min(1).optional(),
});

const withoutBlanks = (env: NodeJS.ProcessEnv) =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

/** Defaults overlaid with whatever the environment sets. Flags are applied on top by the CLI. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): CaptureSettings {
  const parsed = EnvSchema.parse(withoutBlanks(env));
  return {
    ...DEFAULT_SETTINGS,
    enterpriseId: parsed.SDM_ENTERPRISE_ID ?? DEFAULT_SETTINGS.enterpriseId,
    outputDir: parsed.CAMERA_OUTPUT_DIR ?? DEFAULT_SETTINGS.outputDir,
    credentialsFile: parsed.CAMERA_CREDENTIALS_FILE ?? DEFAULT_SETTINGS.credentialsFile,
    tokenFile: parsed.CAMERA_TOKEN_FILE ?? DEFAULT_SETTINGS.tokenFile,
    ffmpegPath: parsed.FFMPEG_PATH ?? DEFAULT_SETTINGS.ffmpegPath,
  };
}
