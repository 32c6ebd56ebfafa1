/**
 * Time conversion constants for OpenPGP timestamps
 * OpenPGP counts in whole seconds since the Unix epoch
 */
export const TIME = {
  /** 1 second */
  SECOND: 1,
  /** 1 minute in seconds */
  MINUTE: 60,
  /** 1 hour in seconds */
  HOUR: 60 * 60,
  /** 1 day in seconds */
  DAY: 24 * 60 * 60,
} as const;

/** Current time as Unix seconds */
export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}
