const TRACK_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Track names become file names, so they are kept to a safe alphabet. */
export function isValidTrackName(name: unknown): name is string {
  return typeof name === 'string' && TRACK_NAME_PATTERN.test(name);
}
