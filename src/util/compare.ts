/**
 * Compares two encoded integers as unsigned byte strings.
 * Returns negative if a < b, 0 if a === b, positive if a > b.
 *
 * For encodings of the same signedness this matches the numeric order of the
 * decoded values, so it can be passed straight to `Array.prototype.sort`.
 */
export function compareEncoded(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Compares two encoded integers for byte equality.
 */
export function encodedEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
