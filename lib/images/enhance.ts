import sharp from "sharp";

export interface EnhanceOptions {
  grayscale: boolean;
  contrastFactor: number;
}

/**
 * Coefficients for `out = a * in + b` such that
 * `out = midpoint + factor * (in - midpoint)`.
 */
export function contrastLevels(
  contrastFactor: number,
  midpoint: number
): { a: number; b: number } {
  return {
    a: contrastFactor,
    b: midpoint * (1 - contrastFactor),
  };
}

async function toGrayscale(png: Buffer): Promise<Buffer> {
  return sharp(png).removeAlpha().grayscale().toColourspace("b-w").png().toBuffer();
}

async function meanIntensity(grayPng: Buffer): Promise<number> {
  const { channels } = await sharp(grayPng).stats();
  return Math.round(channels[0].mean);
}

/**
 * Contrast pivot: mean luminance of the image, rounded to an integer.
 * Mostly-white scans pivot near white, so faint marks get darker.
 */
export async function contrastMidpoint(png: Buffer): Promise<number> {
  return meanIntensity(await toGrayscale(png));
}

/**
 * Grayscale (optional) then contrast. The same pivot applies to every
 * channel. Output is clamped to 0..255 by the uchar cast after the linear
 * step.
 */
export async function enhancePageImage(
  png: Buffer,
  options: EnhanceOptions
): Promise<Buffer> {
  const gray = await toGrayscale(png);
  const { a, b } = contrastLevels(options.contrastFactor, await meanIntensity(gray));
  const source = options.grayscale ? sharp(gray) : sharp(png).removeAlpha();
  return source.linear(a, b).png().toBuffer();
}
