const TRACKED_TAG_PATTERNS = [
  /^v?[\d.]+$/,
  /^release-[\d.]+$/,
  /^4\.\d+$/,
];

export function isTrackedTag(name: string): boolean {
  return TRACKED_TAG_PATTERNS.some(pattern => pattern.test(name));
}

/** Display form of a release or tag name. Branch names are shown as-is. */
export function normalizeRefName(name: string): string {
  if (name.startsWith('v')) {
    return name.slice(1);
  }
  return name;
}
