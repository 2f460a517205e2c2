/**
 * Domain name helpers.
 *
 * All comparisons are label-wise on normalized names. Suffix string matching
 * is never used: `example.com.evil.com` is not below `example.com`, and
 * `badexample.com` is not below `example.com`.
 */

const MAX_NAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;
const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

/** Lower-case and drop a single trailing root dot. */
export function normalizeHostname(name: string): string {
  const lower = name.trim().toLowerCase();
  return lower.endsWith('.') ? lower.slice(0, -1) : lower;
}

/**
 * Whether `name` is a syntactically valid fully qualified host name: at least
 * two labels, each 1-63 characters of letters, digits and inner hyphens.
 */
export function isValidHostname(name: string): boolean {
  const normalized = normalizeHostname(name);
  if (normalized.length === 0 || normalized.length > MAX_NAME_LENGTH) return false;
  const labels = normalized.split('.');
  if (labels.length < 2) return false;
  return labels.every((label) => label.length <= MAX_LABEL_LENGTH && LABEL_PATTERN.test(label));
}

export function splitLabels(name: string): string[] {
  return normalizeHostname(name).split('.');
}

/**
 * Number of labels `name` sits below `ancestor`, or null when `name` is not
 * `ancestor` itself or one of its descendants. Both names must be valid.
 */
export function depthBelow(name: string, ancestor: string): number | null {
  const nameLabels = splitLabels(name);
  const ancestorLabels = splitLabels(ancestor);
  const extra = nameLabels.length - ancestorLabels.length;
  if (extra < 0) return null;
  for (let i = 0; i < ancestorLabels.length; i++) {
    if (nameLabels[extra + i] !== ancestorLabels[i]) return null;
  }
  return extra;
}
