import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { resizeScreenshot } from './screenshot.js';

async function solidPng(width: number, height: number): Promise<string> {
  const buffer = await sharp({
    create: { width, height, channels: 4, background: { r: 255, g: 255, b: 255, alpha: 0.5 } },
  })
    .png()
    .toBuffer();
  return buffer.toString('base64');
}

describe('resizeScreenshot', () => {
  it('downscales by an integer divisor and encodes JPEG', async () => {
    const output = await resizeScreenshot(await solidPng(101, 61), 2, 70);

    const metadata = await sharp(Buffer.from(output, 'base64')).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(50);
    expect(metadata.height).toBe(30);
  });

  it('keeps the size at scale 1', async () => {
    const output = await resizeScreenshot(await solidPng(40, 20), 1, 90);

    const metadata = await sharp(Buffer.from(output, 'base64')).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(40);
    expect(metadata.height).toBe(20);
  });

  it('returns the original payload when the input is not an image', async () => {
    const notAnImage = Buffer.from('plain text').toString('base64');

    expect(await resizeScreenshot(notAnImage, 2, 70)).toBe(notAnImage);
  });
});
