/**
 * Device timestamp slicing
 *
 * Device times look like "2021-03-17T08:33:00" and are device-local.
 * No time zone conversion is done; the text is sliced as-is.
 */

/** Shortest device time that holds both a date and HH:MM:SS */
export const MIN_DEVICE_TIME_LENGTH = 19;

export interface DeviceDateTime {
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM:SS */
  time: string;
}

/**
 * Split a device timestamp into its date (chars 0-9) and time (chars 11-18)
 *
 * @returns null when the string is too short to hold both
 */
export function splitDeviceTime(deviceTime: string): DeviceDateTime | null {
  if (deviceTime.length < MIN_DEVICE_TIME_LENGTH) {
    return null;
  }
  return {
    date: deviceTime.slice(0, 10),
    time: deviceTime.slice(11, 19),
  };
}
