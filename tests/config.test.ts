import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, loadSettings } from '../src/config';

describe('loadSettings', () => {
  it('falls back to defaults', () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('reads overrides from the environment', () => {
    expect(
      loadSettings({
        SDM_ENTERPRISE_ID: 'ent-1',
        CAMERA_OUTPUT_DIR: '/srv/stills',
        CAMERA_CREDENTIALS_FILE: '/etc/camera/credentials.json',
        CAMERA_TOKEN_FILE: '/var/lib/camera/token.json',
        FFMPEG_PATH: '/opt/bin/ffmpeg',
        UNRELATED: 'ignored',
      }),
    ).toEqual({
      enterpriseId: 'ent-1',
      outputDir: '/srv/stills',
      credentialsFile: '/etc/camera/credentials.json',
      tokenFile: '/var/lib/camera/token.json',
      ffmpegPath: '/opt/bin/ffmpeg',
    });
  });

  it('ignores blank variables', () => {
    expect(loadSettings({ CAMERA_OUTPUT_DIR: '', FFMPEG_PATH: '' })).toEqual(DEFAULT_SETTINGS);
  });
});
