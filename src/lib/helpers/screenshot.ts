import sharp from 'sharp';
import { logger } from '../../config/logger.js';

/**
 * Shrink and recompress a base64 screenshot.
 *
 * `scale` is an integer divisor (1 = full size, 2 = half, 4 = quarter).
 * The result is always JPEG at the given quality. On any failure the
 * original payload is returned unchanged.
 */
export async function resizeScreenshot(
  base64Image: string,
  scale: number,
  quality: number,
): Promise<string> {
  try {
    const input = Buffer.from(base64Image, 'base64');
    let image = sharp(input);

    if (scale > 1) {
      const { width, height } = await image.metadata();
      if (!width || !height) {
        throw new Error('Image has no dimensions');
      }
      image = image.resize(
        Math.max(1, Math.floor(width / scale)),
        Math.max(1, Math.floor(height / scale)),
        { fit: 'fill', kernel: 'lanczos3' },
      );
    }

    const output = await image
      .flatten({ background: '#000000' })
      .jpeg({ quality, optimizeCoding: true })
      .toBuffer();

    return output.toString('base64');
  } catch (error) {
    logger.warn({ error, scale, quality }, 'Screenshot transform failed, keeping original');
    return base64Image;
  }
}
