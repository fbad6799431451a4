import sharp from "sharp";
import type { CoverResult } from "../types";

const COVER_WIDTH = 600;
const COVER_HEIGHT = 900;
const COVER_QUALITY = 90;

/**
 * Validate that a buffer contains a supported image format by checking magic bytes
 */
export function isValidImageBuffer(buffer: Buffer): boolean {
  if (!buffer || buffer.length < 8) return false;

  // JPEG: FF D8 FF
  if (buffer[0] === 0xff && buffer[1] === 0xd8 && buffer[2] === 0xff) {
    return true;
  }

  // PNG: 89 50 4E 47 0D 0A 1A 0A
  if (
    buffer[0] === 0x89 &&
    buffer[1] === 0x50 &&
    buffer[2] === 0x4e &&
    buffer[3] === 0x47 &&
    buffer[4] === 0x0d &&
    buffer[5] === 0x0a &&
    buffer[6] === 0x1a &&
    buffer[7] === 0x0a
  ) {
    return true;
  }

  // GIF: 47 49 46 38
  if (buffer[0] === 0x47 && buffer[1] === 0x49 && buffer[2] === 0x46 && buffer[3] === 0x38) {
    return true;
  }

  // WebP: 52 49 46 46 ... 57 45 42 50
  if (
    buffer[0] === 0x52 &&
    buffer[1] === 0x49 &&
    buffer[2] === 0x46 &&
    buffer[3] === 0x46 &&
    buffer.length >= 12 &&
    buffer[8] === 0x57 &&
    buffer[9] === 0x45 &&
    buffer[10] === 0x42 &&
    buffer[11] === 0x50
  ) {
    return true;
  }

  return false;
}

/**
 * Normalise an embedded cover to a JPEG no larger than 600x900 and compute its
 * dominant colour for placeholders. Returns null when the image cannot be decoded.
 */
export async function processCover(buffer: Buffer): Promise<CoverResult | null> {
  if (!isValidImageBuffer(buffer)) {
    console.warn("[Import] Cover buffer is not a valid image format, skipping");
    return null;
  }

  try {
    const processed = await sharp(buffer)
      .resize(COVER_WIDTH, COVER_HEIGHT, {
        fit: "inside",
        withoutEnlargement: true,
      })
      .jpeg({ quality: COVER_QUALITY, mozjpeg: true })
      .toBuffer();

    return {
      buffer: processed,
      mimeType: "image/jpeg",
      dominantColor: (await getDominantColor(buffer)) ?? undefined,
    };
  } catch (error) {
    console.warn("[Import] Could not process cover image:", error);
    return null;
  }
}

/**
 * Extract dominant color from an image for placeholder backgrounds
 */
async function getDominantColor(buffer: Buffer): Promise<string | null> {
  try {
    const { data } = await sharp(buffer).resize(1, 1).raw().toBuffer({ resolveWithObject: true });

    const r = data[0].toString(16).padStart(2, "0");
    const g = data[1].toString(16).padStart(2, "0");
    const b = data[2].toString(16).padStart(2, "0");

    return `#${r}${g}${b}`;
  } catch {
    return null;
  }
}
