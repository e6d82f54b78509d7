import sharp from 'sharp';
import * as fs from 'fs';
import { join } from 'path';
import {
  ok,
  degraded,
  fatal,
  errorMessage,
  type FontSpec,
  type FrameProvider,
  type FrameSize,
  type Logger,
  type ResolvedFonts,
  type StageResult,
} from '@horror-shorts/shared';
import { DEFAULT_FONT_FAMILY, resolveFonts } from './fonts.js';
import { centeredLeft, layoutFrame } from './text-layout.js';
import { renderTextWithSharp, type RenderedText, type TextRenderer } from './text-renderer.js';

/** Alpha (0-255) of the black layer laid over the background for contrast. */
export const OVERLAY_ALPHA = 100;
export const ERROR_FONT_SIZE = 24;

export interface FrameComposerOptions {
  framesDir: string;
  size: FrameSize;
  fonts?: ResolvedFonts;
  renderText?: TextRenderer;
}

interface LoadedBackground {
  data: Buffer;
  problem: string | null;
}

export class FrameComposer implements FrameProvider {
  private size: FrameSize;
  private fonts: ResolvedFonts;
  private renderText: TextRenderer;

  constructor(
    private options: FrameComposerOptions,
    private logger: Logger,
  ) {
    this.size = options.size;
    this.fonts = options.fonts ?? resolveFonts();
    this.renderText = options.renderText ?? renderTextWithSharp;
    this.logger.debug({ font: this.fonts.source }, 'Frame fonts resolved');
  }

  pathFor(index: number): string {
    return join(this.options.framesDir, `frame_${index + 1}.png`);
  }

  /** One frame per quote, in quote order. A missing background is drawn as black. */
  async composeAll(backgroundPaths: (string | undefined)[], quotes: string[]): Promise<StageResult<string>[]> {
    const results: StageResult<string>[] = [];
    for (let i = 0; i < quotes.length; i++) {
      results.push(await this.compose(backgroundPaths[i], quotes[i], i));
    }
    return results;
  }

  async compose(backgroundPath: string | undefined, quote: string, index: number): Promise<StageResult<string>> {
    const path = this.pathFor(index);

    try {
      fs.mkdirSync(this.options.framesDir, { recursive: true });

      const layout = layoutFrame(quote, this.size);
      const background = await this.loadBackground(backgroundPath);

      const overlays: sharp.OverlayOptions[] = [
        {
          input: {
            create: {
              width: this.size.width,
              height: this.size.height,
              channels: 4,
              background: { r: 0, g: 0, b: 0, alpha: OVERLAY_ALPHA / 255 },
            },
          },
          top: 0,
          left: 0,
        },
      ];

      for (const line of layout.quoteLines) {
        const overlay = await this.centeredText(line.text, this.fonts.quote, line.top);
        if (overlay) overlays.push(overlay);
      }
      const title = await this.centeredText(layout.title.text, this.fonts.title, layout.title.top);
      if (title) overlays.push(title);

      await sharp(background.data).composite(overlays).removeAlpha().png().toFile(path);

      this.logger.info({ index, path, lines: layout.quoteLines.length }, 'Frame created');
      return background.problem ? degraded(path, background.problem) : ok(path);
    } catch (err) {
      return this.writeErrorFrame(path, index, err);
    }
  }

  private async loadBackground(backgroundPath: string | undefined): Promise<LoadedBackground> {
    if (!backgroundPath) {
      return { data: await this.blank().png().toBuffer(), problem: 'no background for this frame' };
    }

    try {
      const meta = await sharp(backgroundPath).metadata();
      let image = sharp(backgroundPath);
      if (meta.width !== this.size.width || meta.height !== this.size.height) {
        image = image.resize(this.size.width, this.size.height, { fit: 'fill', kernel: 'lanczos3' });
      }
      return { data: await image.removeAlpha().png().toBuffer(), problem: null };
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.warn({ backgroundPath, error: reason }, 'Background unreadable, using black');
      return { data: await this.blank().png().toBuffer(), problem: `background unavailable: ${reason}` };
    }
  }

  private async centeredText(text: string, font: FontSpec, top: number): Promise<sharp.OverlayOptions | null> {
    const rendered = await this.renderText(text, font, this.size.width);
    return this.clip(rendered, centeredLeft(this.size.width, rendered.width), top);
  }

  /** Crop a rendered line to the part that lies inside the frame. */
  private async clip(rendered: RenderedText, left: number, top: number): Promise<sharp.OverlayOptions | null> {
    const width = Math.min(rendered.width, this.size.width - left);
    const height = Math.min(rendered.height, this.size.height - top);
    if (width <= 0 || height <= 0) return null;

    if (width === rendered.width && height === rendered.height) {
      return { input: rendered.data, left, top };
    }

    const cropped = await sharp(rendered.data).extract({ left: 0, top: 0, width, height }).toBuffer();
    return { input: cropped, left, top };
  }

  private async writeErrorFrame(path: string, index: number, err: unknown): Promise<StageResult<string>> {
    const reason = errorMessage(err);
    this.logger.error({ index, error: reason }, 'Frame failed, writing error frame');

    const left = Math.floor(this.size.width / 2);
    const top = Math.floor(this.size.height / 2);
    const overlays: sharp.OverlayOptions[] = [];

    try {
      const font = { family: DEFAULT_FONT_FAMILY, size: ERROR_FONT_SIZE };
      const rendered = await this.renderText(`Error: ${reason}`, font, this.size.width - left);
      const overlay = await this.clip(rendered, left, top);
      if (overlay) overlays.push(overlay);
    } catch (textErr) {
      this.logger.warn({ index, error: errorMessage(textErr) }, 'Error text could not be drawn');
    }

    try {
      await this.blank().composite(overlays).removeAlpha().png().toFile(path);
    } catch (writeErr) {
      return fatal(writeErr);
    }
    return degraded(path, reason);
  }

  private blank() {
    return sharp({
      create: {
        width: this.size.width,
        height: this.size.height,
        channels: 3,
        background: { r: 0, g: 0, b: 0 },
      },
    });
  }
}
