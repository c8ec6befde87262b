/**
 * Mach-O detection by magic number.
 */

import { closeSync, openSync, readSync } from "node:fs";

// Thin 32/64-bit in both byte orders, plus universal (fat) 32/64-bit.
const MACHO_MAGICS: ReadonlySet<number> = new Set([
  0xfeedface,
  0xfeedfacf,
  0xcefaedfe,
  0xcffaedfe,
  0xcafebabe,
  0xcafebabf,
]);

export function isMachOHeader(header: Uint8Array): boolean {
  if (header.length < 4) return false;
  const view = new DataView(header.buffer, header.byteOffset, 4);
  return MACHO_MAGICS.has(view.getUint32(0, false));
}

/**
 * Reads the first four bytes of a regular file. Read errors propagate; an
 * unreadable file is never reported as "not a binary".
 */
export function isNativeBinary(path: string): boolean {
  const fd = openSync(path, "r");
  try {
    const header = new Uint8Array(4);
    const read = readSync(fd, header, 0, 4, 0);
    return isMachOHeader(header.subarray(0, read));
  } finally {
    closeSync(fd);
  }
}
