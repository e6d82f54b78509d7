import * as fs from 'fs';
import { join } from 'path';
import type { Config, Logger } from '@horror-shorts/shared';

const STALE_QUOTE_FILE = /^quote_\d+\.txt$/;

/** Creates the working directories and clears quote files left by an earlier run. */
export function prepareWorkspace(
  config: Pick<Config, 'quotesDir' | 'imagesDir' | 'framesDir' | 'outputDir' | 'audioDir'>,
  logger: Logger,
): void {
  for (const dir of [config.quotesDir, config.imagesDir, config.framesDir, config.outputDir, config.audioDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const stale = fs.readdirSync(config.quotesDir).filter((name) => STALE_QUOTE_FILE.test(name));
  for (const name of stale) {
    fs.rmSync(join(config.quotesDir, name), { force: true });
  }
  logger.debug({ removed: stale.length, quotesDir: config.quotesDir }, 'Workspace ready');
}

export function outputFileName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `horror_quotes_${stamp}.mp4`;
}
