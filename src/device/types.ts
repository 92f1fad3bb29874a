export interface DeviceRecord {
  /** Resource name, `enterprises/<id>/devices/<id>`. */
  name: string;
  type: string;
}

/** The slice of the Smart Device Management API the pipeline uses. */
export interface DeviceApi {
  listDevices(parent: string): Promise<DeviceRecord[]>;
  executeCommand(deviceName: string, command: string, params: Record<string, unknown>): Promise<unknown>;
}
