import * as fs from 'fs';
import { dirname } from 'path';

/** Lower-case and drop quotation marks so trivially different renderings compare equal. */
export function normalizeQuote(quote: string): string {
  return quote
    .toLowerCase()
    .replace(/["'‘’“”]/g, '')
    .trim();
}

/** Append-only record of every quote emitted by earlier runs, one raw quote per line. */
export class QuoteHistory {
  private normalized = new Set<string>();

  constructor(private filePath: string) {}

  static load(filePath: string): QuoteHistory {
    const history = new QuoteHistory(filePath);
    if (fs.existsSync(filePath)) {
      const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
      for (const line of lines) {
        if (line.trim()) history.remember(line);
      }
    }
    return history;
  }

  get size(): number {
    return this.normalized.size;
  }

  has(quote: string): boolean {
    return this.normalized.has(normalizeQuote(quote));
  }

  /** Mark a quote as used for the rest of this run without persisting it. */
  remember(quote: string): void {
    this.normalized.add(normalizeQuote(quote));
  }

  append(quotes: string[]): void {
    if (quotes.length === 0) return;
    fs.mkdirSync(dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, quotes.map((q) => `${q}\n`).join(''), 'utf-8');
    for (const quote of quotes) this.remember(quote);
  }
}
