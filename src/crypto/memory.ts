/**
 * Overwrite key material in place.
 *
 * Best effort only: the V8 heap may already hold copies made by the
 * garbage collector or by intermediate buffers, and there is no
 * deterministic destructor to hook. Callers wipe in `finally` blocks so
 * derived keys at least do not outlive the operation that needed them.
 */
export function zeroizeKey(key: Uint8Array | null | undefined): void {
  if (key && key.length > 0) {
    key.fill(0);
  }
}
