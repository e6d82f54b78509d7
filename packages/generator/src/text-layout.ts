import type { FrameSize, ParsedQuote } from '@horror-shorts/shared';

export const MAX_CHARS_PER_LINE = 25;
export const LINE_PITCH = 100;
export const QUOTE_TITLE_SEPARATOR = ' - ';
export const UNKNOWN_TITLE = 'Unknown';

/** Split `"<text>" - <Title> (<Year>)` at the first separator. */
export function parseQuote(raw: string): ParsedQuote {
  const idx = raw.indexOf(QUOTE_TITLE_SEPARATOR);
  if (idx < 0) {
    return { text: raw.trim(), title: UNKNOWN_TITLE };
  }
  const title = raw.slice(idx + QUOTE_TITLE_SEPARATOR.length).trim();
  return {
    text: raw.slice(0, idx).trim(),
    title: title || UNKNOWN_TITLE,
  };
}

/** Remove list numbering such as `1. ` or `2) ` that LLM replies tend to include. */
export function stripEnumeration(text: string): string {
  return text.replace(/^\d+[.)]\s*/, '');
}

/** Greedy word wrap. A word longer than the budget occupies a line by itself. */
export function wrapWords(text: string, maxChars = MAX_CHARS_PER_LINE): string[] {
  const lines: string[] = [];
  let current: string[] = [];

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if ([...current, word].join(' ').length <= maxChars) {
      current.push(word);
    } else if (current.length > 0) {
      lines.push(current.join(' '));
      current = [word];
    } else {
      lines.push(word);
    }
  }

  if (current.length > 0) lines.push(current.join(' '));
  return lines;
}

export interface PlacedLine {
  text: string;
  top: number;
}

export interface FrameLayout {
  quoteLines: PlacedLine[];
  title: PlacedLine;
}

/** Vertical placement of every text line; horizontal centring depends on rendered width. */
export function layoutFrame(raw: string, size: FrameSize): FrameLayout {
  const { text, title } = parseQuote(raw);
  const start = Math.floor(size.height / 4);

  const quoteLines = wrapWords(stripEnumeration(text))
    .map((line, i) => ({ text: line, top: start + i * LINE_PITCH }))
    .filter((line) => line.top < size.height);

  return {
    quoteLines,
    title: { text: `- ${title}`, top: Math.floor((size.height * 3) / 4) },
  };
}

export function centeredLeft(frameWidth: number, textWidth: number): number {
  return Math.max(0, Math.floor((frameWidth - textWidth) / 2));
}
