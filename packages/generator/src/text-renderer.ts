import sharp from 'sharp';
import type { FontSpec } from '@horror-shorts/shared';

export interface RenderedText {
  data: Buffer;
  width: number;
  height: number;
}

/** Rasterise one line of white text. `maxWidth` bounds the output so it always fits the frame. */
export type TextRenderer = (text: string, font: FontSpec, maxWidth: number) => Promise<RenderedText>;

export function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function pangoFont(font: FontSpec): string {
  return `${font.family} ${font.size}`;
}

export const renderTextWithSharp: TextRenderer = async (text, font, maxWidth) => {
  const { data, info } = await sharp({
    text: {
      text: `<span foreground="white">${escapeMarkup(text)}</span>`,
      font: pangoFont(font),
      fontfile: font.file,
      width: maxWidth,
      // 72 dpi makes point sizes equal pixel sizes
      dpi: 72,
      rgba: true,
    },
  })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
};
