/**
 * Byte helpers (no polyfills required).
 * NEO's RPC takes storage keys and other raw byte strings as naked lowercase hex.
 */

/** Convert UTF-8 string to bytes. */
export function utf8ToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s)
}

/** Convert bytes to lowercase hex string, naked by default. */
export function bytesToHex(bytes: Uint8Array, with0x = false): string {
  const hex = [...bytes].map((b) => b.toString(16).padStart(2, '0')).join('')
  return with0x ? `0x${hex}` : hex
}

/** Hex-encode the UTF-8 bytes of a string. */
export function utf8ToHex(s: string): string {
  return bytesToHex(utf8ToBytes(s))
}

