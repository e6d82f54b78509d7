import OpenAI from 'openai';
import * as fs from 'fs';
import { join } from 'path';
import { errorMessage, type Logger, type QuoteProvider } from '@horror-shorts/shared';
import type { QuoteHistory } from './quote-history.js';

export const QUOTE_THEMES = [
  'classic horror',
  'modern horror',
  'psychological horror',
  'slasher films',
  'supernatural horror',
  'zombie films',
  'vampire movies',
  'ghost stories',
] as const;

const SYSTEM_PROMPT =
  "You are a film historian specializing in horror movies. Provide authentic, memorable quotes from horror films. Include only the quote and the movie title. Format as: 'QUOTE' - MOVIE TITLE (YEAR). Ensure each quote is unique and different from any you've provided before.";

export interface QuoteSourceOptions {
  apiKey: string;
  history: QuoteHistory;
  model?: string;
  maxAttempts?: number;
  themes?: readonly string[];
  random?: () => number;
  now?: () => Date;
}

/** LLM-backed source of horror movie quotes.
 * Requests the shortfall on every attempt and filters anything already in the history,
 * so a run may end with fewer quotes than asked for but never with a repeat. */
export class QuoteSource implements QuoteProvider {
  private client: OpenAI;
  private model: string;
  private maxAttempts: number;
  private themes: readonly string[];
  private random: () => number;
  private now: () => Date;

  constructor(
    private options: QuoteSourceOptions,
    private logger: Logger,
  ) {
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gpt-4';
    this.maxAttempts = options.maxAttempts ?? 5;
    this.themes = options.themes ?? QUOTE_THEMES;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async fetchQuotes(count: number): Promise<string[]> {
    const history = this.options.history;
    this.logger.info({ count, previouslyUsed: history.size }, 'Requesting horror movie quotes');

    const accepted: string[] = [];

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (accepted.length >= count) break;

      const remaining = count - accepted.length;
      this.logger.debug({ attempt, remaining }, 'Quote attempt');

      let lines: string[];
      try {
        lines = splitLines(await this.requestQuotes(remaining));
      } catch (err) {
        this.logger.warn({ attempt, error: errorMessage(err) }, 'Quote request failed');
        continue;
      }

      for (const quote of lines) {
        if (accepted.length >= count) break;

        if (history.has(quote)) {
          this.logger.debug({ quote: quote.slice(0, 50) }, 'Skipped duplicate quote');
          continue;
        }

        accepted.push(quote);
        history.remember(quote);
        this.logger.debug({ quote: quote.slice(0, 50) }, 'Accepted quote');
      }
    }

    if (accepted.length < count) {
      this.logger.warn(
        { received: accepted.length, requested: count },
        'Fewer unique quotes than requested',
      );
    }

    try {
      history.append(accepted);
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, 'Could not save quote history');
    }
    this.logger.info({ count: accepted.length }, 'Quotes ready');
    return accepted;
  }

  buildUserPrompt(remaining: number): string {
    const theme = this.themes[Math.floor(this.random() * this.themes.length)] ?? QUOTE_THEMES[0];
    const seed = 1 + Math.floor(this.random() * 100_000);
    const timestamp = formatSeedTimestamp(this.now());

    return `Provide ${remaining} different, authentic horror movie quotes focusing on ${theme}. Choose quotes that are impactful, memorable, and would look good on a dramatic background. Random seed: ${seed}, timestamp: ${timestamp}. Make sure these are completely different from typical horror quotes and avoid common, overused lines.`;
  }

  private async requestQuotes(remaining: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: this.buildUserPrompt(remaining) },
      ],
      temperature: 1.0,
      top_p: 0.9,
    });

    return response.choices[0]?.message.content ?? '';
  }
}

function splitLines(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Local time as YYYYMMDDHHMMSS followed by six fractional-second digits. */
export function formatSeedTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    pad(date.getMilliseconds() * 1000, 6)
  );
}

/** Write each quote to `quote_<n>.txt` and return the written paths. */
export function saveQuoteFiles(dir: string, quotes: string[]): string[] {
  fs.mkdirSync(dir, { recursive: true });
  return quotes.map((quote, i) => {
    const path = join(dir, `quote_${i + 1}.txt`);
    fs.writeFileSync(path, quote, 'utf-8');
    return path;
  });
}
