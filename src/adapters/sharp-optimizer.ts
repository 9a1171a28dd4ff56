/**
 * ImageOptimizer backed by sharp.
 *
 * Applies EXIF orientation, shrinks to fit a box (never enlarges) and
 * re-encodes. JPEG output has no alpha channel, so transparent pixels are
 * flattened onto white.
 */

import sharp from 'sharp';
import { ImageFormat } from '../config';
import { ImageOptimizer, OptimizeOptions, OptimizedImage, ResizeOptions } from '../stages/ports';

export class SharpImageOptimizer implements ImageOptimizer {
  async optimize(input: Buffer, options: OptimizeOptions): Promise<OptimizedImage> {
    let image = sharp(input).rotate();
    if (options.maxDimension) {
      image = fitInside(image, options.maxDimension, options.maxDimension);
    }
    return encode(image, options.format, options.quality);
  }

  async resize(input: Buffer, options: ResizeOptions): Promise<OptimizedImage> {
    const image = fitInside(sharp(input).rotate(), options.width, options.height);
    return encode(image, options.format, options.quality);
  }
}

function fitInside(image: sharp.Sharp, width: number, height: number): sharp.Sharp {
  return image.resize({ width, height, fit: 'inside', withoutEnlargement: true });
}

async function encode(image: sharp.Sharp, format: ImageFormat, quality: number): Promise<OptimizedImage> {
  switch (format) {
    case 'webp':
      image = image.webp({ quality, effort: 4 });
      break;
    case 'jpeg':
      image = image.flatten({ background: '#ffffff' }).jpeg({ quality, progressive: true });
      break;
    case 'png':
      image = image.png({ compressionLevel: 9 });
      break;
  }

  const { data, info } = await image.toBuffer({ resolveWithObject: true });
  return { data, format, width: info.width, height: info.height };
}
