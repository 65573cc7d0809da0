import { PNG } from "pngjs";

export interface PngMetadata {
  width: number;
  height: number;
  channels: number;
  hasAlpha: boolean;
}

/**
 * Decode the whole image and report its shape. Throws when the buffer is
 * not a readable PNG, which is how page images are validated before upload.
 */
export function getPngMetadata(pngBuffer: Buffer): PngMetadata {
  const png = PNG.sync.read(pngBuffer);
  // Decoded data is always RGBA; channels come from the header colour type.
  // Palette images count as RGB (or RGBA with a transparency chunk).
  return {
    width: png.width,
    height: png.height,
    channels: (png.color ? 3 : 1) + (png.alpha ? 1 : 0),
    hasAlpha: png.alpha,
  };
}

export function decodePng(pngBuffer: Buffer): {
  data: Buffer;
  width: number;
  height: number;
} {
  const png = PNG.sync.read(pngBuffer);
  return { data: png.data, width: png.width, height: png.height };
}

/**
 * Encode an RGBA pixel buffer as PNG.
 */
export function encodePng(
  data: Buffer,
  width: number,
  height: number,
  options: { colorType?: 0 | 2 | 4 | 6 } = {}
): Buffer {
  const png = new PNG({ width, height });
  data.copy(png.data);
  return PNG.sync.write(png, { colorType: options.colorType ?? 6 });
}
