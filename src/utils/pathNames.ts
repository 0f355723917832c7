/**
 * Path component sanitizing for publisher directories and file names.
 * Unicode is kept; only characters illegal on common filesystems are replaced.
 */

import { createHash } from "crypto";

/** UTF-8 byte budget for one component; leaves room for " (n).ext" under 255 */
export const MAX_COMPONENT_BYTES = 200;

const ILLEGAL_CHARS = /[<>:"/\\|?*\u0000-\u001F\u007F]/g;
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

export interface SanitizeOptions {
  fallback: string;
  maxBytes?: number;
}

/**
 * Turns an arbitrary title or publisher name into a single valid path component.
 * Overlong names are cut and suffixed with a short hash of the original so that
 * distinct long names stay distinct.
 */
export function sanitizePathComponent(name: string, options: SanitizeOptions): string {
  const maxBytes = options.maxBytes ?? MAX_COMPONENT_BYTES;

  let n = name
    .normalize("NFC")
    .replace(/\uFFFD/g, "")
    .replace(/\u00A0/g, " ")
    .replace(ILLEGAL_CHARS, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^\.+/, "")
    .replace(/[. ]+$/, "")
    .trim();

  if (!n) {
    n = options.fallback;
  }
  if (RESERVED_NAMES.test(n)) {
    n = `_${n}`;
  }

  if (Buffer.byteLength(n) > maxBytes) {
    const hash = shortHash(name);
    const prefix = truncateToBytes(n, maxBytes - hash.length - 1).replace(/[. ]+$/, "");
    n = `${prefix}-${hash}`;
  }

  return n;
}

export function sanitizeTitle(title: string): string {
  return sanitizePathComponent(title, { fallback: "Untitled" });
}

export function sanitizePublisher(publisher: string): string {
  return sanitizePathComponent(publisher, { fallback: "Unknown Publisher" });
}

/** First 8 hex chars of the SHA-1 of the input */
export function shortHash(value: string): string {
  return createHash("sha1").update(value).digest("hex").slice(0, 8);
}

/** Cuts at a code point boundary so multi-byte characters are never split */
function truncateToBytes(value: string, maxBytes: number): string {
  let out = "";
  let bytes = 0;
  for (const ch of value) {
    const size = Buffer.byteLength(ch);
    if (bytes + size > maxBytes) break;
    out += ch;
    bytes += size;
  }
  return out;
}
