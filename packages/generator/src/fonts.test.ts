import { describe, it, expect } from 'vitest';
import { resolveFonts, SYSTEM_FONT_CANDIDATES } from './fonts.js';

describe('resolveFonts', () => {
  it('uses the first candidate that exists at both sizes', () => {
    const present = new Set([
      '/Library/Fonts/Helvetica.ttc',
      '/usr/share/fonts/truetype/ubuntu/Ubuntu-B.ttf',
    ]);

    const fonts = resolveFonts(SYSTEM_FONT_CANDIDATES, (p) => present.has(p));

    expect(fonts.source).toBe('/usr/share/fonts/truetype/ubuntu/Ubuntu-B.ttf');
    expect(fonts.quote).toEqual({
      family: 'Ubuntu Bold',
      size: 60,
      file: '/usr/share/fonts/truetype/ubuntu/Ubuntu-B.ttf',
    });
    expect(fonts.title.size).toBe(48);
    expect(fonts.title.file).toBe(fonts.quote.file);
  });

  it('falls back to the default family without a file', () => {
    const fonts = resolveFonts(SYSTEM_FONT_CANDIDATES, () => false);

    expect(fonts.source).toBe('default');
    expect(fonts.quote).toEqual({ family: 'sans', size: 60 });
    expect(fonts.title).toEqual({ family: 'sans', size: 48 });
  });
});
