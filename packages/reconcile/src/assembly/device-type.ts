import { deviceTypeSchema, type DeviceType } from '@mac-enroll/core';

/** Location group each device category is enrolled into */
export const LOCATION_GROUP_BY_DEVICE_TYPE: Readonly<Record<DeviceType, string>> = Object.freeze({
  Laptop: '628',
  Workstation: '629',
  Mobile: '627',
});

/** Category whose group is used for unknown labels */
export const FALLBACK_DEVICE_TYPE: DeviceType = 'Laptop';

export function isDeviceType(label: string): label is DeviceType {
  return deviceTypeSchema.safeParse(label).success;
}

/**
 * Location group for a device label; unknown labels get the laptop group
 */
export function locationGroupForDeviceType(label: string): string {
  return LOCATION_GROUP_BY_DEVICE_TYPE[isDeviceType(label) ? label : FALLBACK_DEVICE_TYPE];
}
