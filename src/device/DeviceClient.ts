import { z } from 'zod';
import { createError } from '../errors';
import type { Logger } from '../logging';
import type { DeviceApi, DeviceRecord } from './types';

export const CAMERA_DEVICE_TYPE = 'sdm.devices.types.CAMERA';
export const GENERATE_WEBRTC_STREAM = 'sdm.devices.commands.CameraLiveStream.GenerateWebRtcStream';

const StreamAnswerSchema = z.object({
  answerSdp: z.string().min(1),
});

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

export class DeviceClient {
  private api: DeviceApi;
  private logger?: Logger;

  constructor(api: DeviceApi, logger?: Logger) {
    this.api = api;
    this.logger = logger;
  }

  /** First camera-class device registered to the enterprise. */
  async findCaptureDevice(enterpriseId: string): Promise<DeviceRecord> {
    if (!enterpriseId) {
      throw createError('DeviceNotFound', 'enterprise ID is required', 'device');
    }
    const devices = await this.api.listDevices(`enterprises/${enterpriseId}`).catch((err: unknown) => {
      throw createError('DeviceNotFound', `failed to list devices: ${messageOf(err)}`, 'device', err);
    });
    if (devices.length === 0) {
      throw createError('DeviceNotFound', `no devices found in enterprise ${enterpriseId}`, 'device');
    }
    const camera = devices.find((device) => device.type === CAMERA_DEVICE_TYPE);
    if (!camera) {
      throw createError('DeviceNotFound', `no camera found among ${devices.length} devices`, 'device');
    }
    this.log('Using camera', camera.name);
    return camera;
  }

  /** Sends the offer to the camera and returns its answer SDP. */
  async relaySignal(device: DeviceRecord, offerSdp: string): Promise<string> {
    const results = await this.api
      .executeCommand(device.name, GENERATE_WEBRTC_STREAM, { offerSdp })
      .catch((err: unknown) => {
        throw createError(
          'SignalRelayFailed',
          `failed to execute GenerateWebRtcStream command: ${messageOf(err)}`,
          'device',
          err,
        );
      });
    const parsed = StreamAnswerSchema.safeParse(results);
    if (!parsed.success) {
      throw createError('SignalRelayFailed', 'failed to get answer SDP: empty response', 'device');
    }
    return parsed.data.answerSdp;
  }

  private log(...args: unknown[]) {
    if (this.logger) {
      this.logger('[device]', ...args);
    }
  }
}
