import { describe, expect, it, vi } from 'vitest';
import { CAMERA_DEVICE_TYPE, DeviceClient, GENERATE_WEBRTC_STREAM } from '../src/device/DeviceClient';
import type { DeviceApi, DeviceRecord } from '../src/device/types';
import { isPipelineError } from '../src/errors';

const camera: DeviceRecord = { name: 'enterprises/ent-1/devices/cam-1', type: CAMERA_DEVICE_TYPE };
const thermostat: DeviceRecord = { name: 'enterprises/ent-1/devices/t-1', type: 'sdm.devices.types.THERMOSTAT' };

const fakeApi = (overrides: Partial<DeviceApi> = {}): DeviceApi => ({
  listDevices: vi.fn(async (_parent: string) => [thermostat, camera]),
  executeCommand: vi.fn(async (_name: string, _command: string, _params: Record<string, unknown>): Promise<unknown> => ({
    answerSdp: 'v=0 answer',
  })),
  ...overrides,
});

const failureOf = async (work: Promise<unknown>) => {
  const err = await work.then(
    () => undefined,
    (e: unknown) => e,
  );
  return isPipelineError(err) ? [err.kind, err.message] : err;
};

describe('DeviceClient.findCaptureDevice', () => {
  it('returns the first camera in the enterprise', async () => {
    const api = fakeApi();
    const client = new DeviceClient(api);

    expect(await client.findCaptureDevice('ent-1')).toEqual(camera);
    expect(api.listDevices).toHaveBeenCalledWith('enterprises/ent-1');
  });

  it('requires an enterprise id', async () => {
    expect(await failureOf(new DeviceClient(fakeApi()).findCaptureDevice(''))).toEqual([
      'DeviceNotFound',
      'enterprise ID is required',
    ]);
  });

  it('fails when the enterprise has no devices', async () => {
    const client = new DeviceClient(fakeApi({ listDevices: async () => [] }));

    expect(await failureOf(client.findCaptureDevice('ent-1'))).toEqual([
      'DeviceNotFound',
      'no devices found in enterprise ent-1',
    ]);
  });

  it('fails when no device is a camera', async () => {
    const client = new DeviceClient(fakeApi({ listDevices: async () => [thermostat] }));

    expect(await failureOf(client.findCaptureDevice('ent-1'))).toEqual([
      'DeviceNotFound',
      'no camera found among 1 devices',
    ]);
  });

  it('wraps listing errors', async () => {
    const client = new DeviceClient(
      fakeApi({
        listDevices: async () => {
          throw new Error('quota exceeded');
        },
      }),
    );

    expect(await failureOf(client.findCaptureDevice('ent-1'))).toEqual([
      'DeviceNotFound',
      'failed to list devices: quota exceeded',
    ]);
  });
});

describe('DeviceClient.relaySignal', () => {
  it('sends the offer and returns the answer', async () => {
    const api = fakeApi();

    expect(await new DeviceClient(api).relaySignal(camera, 'v=0 offer')).toBe('v=0 answer');
    expect(api.executeCommand).toHaveBeenCalledWith(camera.name, GENERATE_WEBRTC_STREAM, { offerSdp: 'v=0 offer' });
  });

  it('rejects a missing or empty answer', async () => {
    for (const results of [undefined, {}, { answerSdp: '' }]) {
      const client = new DeviceClient(fakeApi({ executeCommand: async () => results }));
      expect(await failureOf(client.relaySignal(camera, 'v=0 offer'))).toEqual([
        'SignalRelayFailed',
        'failed to get answer SDP: empty response',
      ]);
    }
  });

  it('wraps command errors', async () => {
    const client = new DeviceClient(
      fakeApi({
        executeCommand: async () => {
          throw new Error('camera offline');
        },
      }),
    );

    expect(await failureOf(client.relaySignal(camera, 'v=0 offer'))).toEqual([
      'SignalRelayFailed',
      'failed to execute GenerateWebRtcStream command: camera offline',
    ]);
  });
});
