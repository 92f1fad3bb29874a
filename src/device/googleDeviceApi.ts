import { google, type Auth } from 'googleapis';
import type { DeviceApi, DeviceRecord } from './types';

/** DeviceApi over the googleapis Smart Device Management v1 client. */
export function createGoogleDeviceApi(auth: Auth.OAuth2Client): DeviceApi {
  const sdm = google.smartdevicemanagement({ version: 'v1', auth });

  return {
    async listDevices(parent: string) {
      const response = await sdm.enterprises.devices.list({ parent });
      const devices: DeviceRecord[] = [];
      for (const device of response.data.devices ?? []) {
        if (device.name && device.type) {
          devices.push({ name: device.name, type: device.type });
        }
      }
      return devices;
    },

    async executeCommand(deviceName: string, command: string, params: Record<string, unknown>) {
      const response = await sdm.enterprises.devices.executeCommand({
        name: deviceName,
        requestBody: { command, params },
      });
      return response.data.results;
    },
  };
}
