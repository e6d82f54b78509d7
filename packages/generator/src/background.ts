import sharp from 'sharp';
import * as fs from 'fs';
import { join } from 'path';
import {
  ok,
  degraded,
  fatal,
  errorMessage,
  type BackgroundProvider,
  type FrameSize,
  type GradientPair,
  type Logger,
  type SmallImagePolicy,
  type StageResult,
} from '@horror-shorts/shared';
import { GRADIENT_PALETTE, gradientRow, pickGradient } from './palette.js';

/** Anything smaller than this is almost certainly a broken encode at full resolution. */
export const MIN_IMAGE_BYTES = 1000;

export interface BackgroundRendererOptions {
  imagesDir: string;
  size: FrameSize;
  smallImagePolicy?: SmallImagePolicy;
  textureEllipses?: number;
  palette?: readonly GradientPair[];
  random?: () => number;
}

/** Renders `background_<n>.png`: a vertical gradient picked by index, with faint dark blotches on top.
 * The gradient is written before texturing so a texture failure still leaves a usable image. */
export class BackgroundRenderer implements BackgroundProvider {
  private size: FrameSize;
  private smallImagePolicy: SmallImagePolicy;
  private textureEllipses: number;
  private palette: readonly GradientPair[];
  private random: () => number;

  constructor(
    private options: BackgroundRendererOptions,
    private logger: Logger,
  ) {
    this.size = options.size;
    this.smallImagePolicy = options.smallImagePolicy ?? 'warn';
    this.textureEllipses = options.textureEllipses ?? 100;
    this.palette = options.palette ?? GRADIENT_PALETTE;
    this.random = options.random ?? Math.random;
  }

  pathFor(index: number): string {
    return join(this.options.imagesDir, `background_${index + 1}.png`);
  }

  async render(index: number): Promise<StageResult<string>> {
    const path = this.pathFor(index);

    try {
      fs.mkdirSync(this.options.imagesDir, { recursive: true });

      const pair = pickGradient(index, this.palette);
      this.logger.debug({ index, gradient: pair.name }, 'Drawing gradient');

      const gradient = gradientPixels(pair, this.size);
      await this.rawImage(gradient).png().toFile(path);

      let textureError: string | null = null;
      try {
        await this.applyTexture(gradient, path);
      } catch (err) {
        textureError = errorMessage(err);
        this.logger.warn({ index, error: textureError }, 'Texture failed, keeping plain gradient');
      }

      const sizeBytes = fs.statSync(path).size;
      if (sizeBytes < MIN_IMAGE_BYTES) {
        if (this.smallImagePolicy === 'fail') {
          throw new Error(`Background ${path} is only ${sizeBytes} bytes`);
        }
        this.logger.warn({ path, sizeBytes }, 'Background file is suspiciously small');
      }

      this.logger.info({ index, path, sizeBytes }, 'Background created');
      return textureError ? degraded(path, `texture skipped: ${textureError}`) : ok(path);
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.error({ index, error: reason }, 'Background failed, writing black placeholder');

      try {
        await writeBlankImage(path, this.size);
      } catch (placeholderErr) {
        return fatal(placeholderErr);
      }
      return degraded(path, reason);
    }
  }

  private async applyTexture(gradient: Buffer, path: string): Promise<void> {
    if (this.textureEllipses <= 0) return;

    const svg = textureSvg(this.size, this.textureEllipses, this.random);
    await this.rawImage(gradient)
      .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
      .removeAlpha()
      .png()
      .toFile(path);
  }

  private rawImage(pixels: Buffer) {
    return sharp(pixels, {
      raw: { width: this.size.width, height: this.size.height, channels: 3 },
    });
  }
}

export function gradientPixels(pair: GradientPair, size: FrameSize): Buffer {
  const rowBytes = size.width * 3;
  const pixels = Buffer.alloc(rowBytes * size.height);

  for (let y = 0; y < size.height; y++) {
    const [r, g, b] = gradientRow(pair, y, size.height);
    const offset = y * rowBytes;
    for (let x = 0; x < size.width; x++) {
      pixels[offset + x * 3] = r;
      pixels[offset + x * 3 + 1] = g;
      pixels[offset + x * 3 + 2] = b;
    }
  }

  return pixels;
}

export function textureSvg(size: FrameSize, count: number, random: () => number): string {
  const randint = (min: number, max: number) => min + Math.floor(random() * (max - min + 1));
  const circles: string[] = [];

  for (let i = 0; i < count; i++) {
    const cx = randint(0, size.width);
    const cy = randint(0, size.height);
    const r = randint(5, 100);
    const opacity = (randint(0, 50) / 255).toFixed(3);
    circles.push(`<circle cx="${cx}" cy="${cy}" r="${r}" fill="black" fill-opacity="${opacity}"/>`);
  }

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">${circles.join('')}</svg>`;
}

export async function writeBlankImage(path: string, size: FrameSize): Promise<void> {
  await sharp({
    create: { width: size.width, height: size.height, channels: 3, background: { r: 0, g: 0, b: 0 } },
  })
    .png()
    .toFile(path);
}
