import sharp from 'sharp';
import { SharpImageOptimizer } from '../../src/adapters/sharp-optimizer';

function createPng(width: number, height: number, alpha = 1): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 4, background: { r: 200, g: 40, b: 40, alpha } } })
    .png()
    .toBuffer();
}

describe('SharpImageOptimizer', () => {
  const optimizer = new SharpImageOptimizer();

  it('re-encodes to webp and shrinks the longest side', async () => {
    const input = await createPng(400, 200);

    const result = await optimizer.optimize(input, { format: 'webp', quality: 80, maxDimension: 100 });

    expect(result.format).toBe('webp');
    expect(result.width).toBe(100);
    expect(result.height).toBe(50);
    const metadata = await sharp(result.data).metadata();
    expect(metadata.format).toBe('webp');
  });

  it('never enlarges small images', async () => {
    const input = await createPng(40, 30);

    const result = await optimizer.optimize(input, { format: 'png', quality: 80, maxDimension: 1920 });

    expect(result.width).toBe(40);
    expect(result.height).toBe(30);
  });

  it('flattens transparency onto white for jpeg', async () => {
    const input = await createPng(8, 8, 0);

    const result = await optimizer.optimize(input, { format: 'jpeg', quality: 90 });

    const metadata = await sharp(result.data).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.hasAlpha).toBe(false);
    const { data } = await sharp(result.data).raw().toBuffer({ resolveWithObject: true });
    expect(data[0]).toBeGreaterThan(245);
  });

  it('resizes thumbnails to fit their box', async () => {
    const input = await createPng(400, 300);

    const result = await optimizer.resize(input, { width: 160, height: 90, format: 'webp', quality: 80 });

    expect(result.width).toBe(120);
    expect(result.height).toBe(90);
    const metadata = await sharp(result.data).metadata();
    expect(metadata.format).toBe('webp');
    expect(metadata.width).toBe(120);
  });

  it('never enlarges a thumbnail', async () => {
    const input = await createPng(64, 48);
    const result = await optimizer.resize(input, { width: 640, height: 360, format: 'png', quality: 80 });
    expect([result.width, result.height]).toEqual([64, 48]);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(optimizer.optimize(Buffer.from('not an image'), { format: 'webp', quality: 80 })).rejects.toThrow();
  });
});
