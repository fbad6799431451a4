/**
 * Utility functions for processing operations
 */

import { posix } from "path";

/**
 * Validate that a buffer looks like a valid ZIP file by checking:
 * 1. PK signature at the start
 * 2. End of Central Directory signature somewhere in the file
 */
export function isValidZipBuffer(buffer: Buffer): boolean {
  // Check minimum size (ZIP needs at least 22 bytes for EOCD)
  if (buffer.length < 22) return false;

  // Check PK signature at start
  if (buffer[0] !== 0x50 || buffer[1] !== 0x4b) return false;

  // Search in the last 65KB + 22 bytes (max comment size + EOCD size)
  const searchStart = Math.max(0, buffer.length - 65557);
  for (let i = buffer.length - 22; i >= searchStart; i--) {
    if (
      buffer[i] === 0x50 &&
      buffer[i + 1] === 0x4b &&
      buffer[i + 2] === 0x05 &&
      buffer[i + 3] === 0x06
    ) {
      return true;
    }
  }

  return false;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Resolve an href found in a container document against the document's own
 * path. Query strings and fragments are dropped.
 */
export function resolveContainerPath(fromPath: string, href: string): string {
  const bare = safeDecode(href.split("#")[0].split("?")[0]);
  return posix.normalize(posix.join(posix.dirname(fromPath), bare)).replace(/^\/+/, "");
}

/** Filesystem-safe version of a resource name (keeps word characters, dash and dot) */
export function safeFileName(name: string): string {
  const cleaned = posix.basename(name).replace(/[^\w\-.]/g, "_");
  return cleaned.replace(/^\.+/, "_") || "file";
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
