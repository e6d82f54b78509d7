import * as fs from 'fs';
import type { ResolvedFonts } from '@horror-shorts/shared';

export interface FontCandidate {
  path: string;
  family: string;
}

// Checked in order; the first file present on this machine is used for both sizes.
export const SYSTEM_FONT_CANDIDATES: readonly FontCandidate[] = [
  { path: '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf', family: 'DejaVu Sans Bold' },
  { path: '/usr/share/fonts/truetype/ubuntu/Ubuntu-B.ttf', family: 'Ubuntu Bold' },
  { path: '/Library/Fonts/Arial Bold.ttf', family: 'Arial Bold' },
  { path: '/Library/Fonts/Helvetica.ttc', family: 'Helvetica' },
  { path: 'C:\\Windows\\Fonts\\arialbd.ttf', family: 'Arial Bold' },
  { path: 'C:\\Windows\\Fonts\\segoeui.ttf', family: 'Segoe UI' },
];

export const QUOTE_FONT_SIZE = 60;
export const TITLE_FONT_SIZE = 48;
export const DEFAULT_FONT_FAMILY = 'sans';

export function resolveFonts(
  candidates: readonly FontCandidate[] = SYSTEM_FONT_CANDIDATES,
  exists: (path: string) => boolean = fs.existsSync,
): ResolvedFonts {
  const found = candidates.find((c) => exists(c.path));

  if (!found) {
    return {
      quote: { family: DEFAULT_FONT_FAMILY, size: QUOTE_FONT_SIZE },
      title: { family: DEFAULT_FONT_FAMILY, size: TITLE_FONT_SIZE },
      source: 'default',
    };
  }

  return {
    quote: { family: found.family, size: QUOTE_FONT_SIZE, file: found.path },
    title: { family: found.family, size: TITLE_FONT_SIZE, file: found.path },
    source: found.path,
  };
}
