import * as fs from 'fs';
import { extname, join } from 'path';
import type { AudioProvider, AudioSelection, Logger } from '@horror-shorts/shared';
import type { MediaProbe } from './ffmpeg.js';

export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.m4a'] as const;

export interface AudioSelectorOptions {
  audioDir: string;
  probe: MediaProbe;
  random?: () => number;
}

export interface AudioSelectRequest {
  /** File name inside the audio directory. Takes precedence over `customAudio`. */
  audioFile?: string;
  customAudio: boolean;
}

export class AudioSelector implements AudioProvider {
  private random: () => number;

  constructor(
    private options: AudioSelectorOptions,
    private logger: Logger,
  ) {
    this.random = options.random ?? Math.random;
  }

  select(request: AudioSelectRequest): AudioSelection | null {
    fs.mkdirSync(this.options.audioDir, { recursive: true });

    if (request.audioFile) {
      const path = join(this.options.audioDir, request.audioFile);
      if (!fs.existsSync(path)) {
        this.logger.warn(
          { audioFile: request.audioFile, audioDir: this.options.audioDir },
          'Specified audio file not found',
        );
        return null;
      }
      return this.validate(path);
    }

    if (!request.customAudio) return null;

    const candidates = this.listCandidates();
    if (candidates.length === 0) {
      this.logger.warn(
        { audioDir: this.options.audioDir, extensions: AUDIO_EXTENSIONS },
        'No audio files found',
      );
      return null;
    }

    const picked = candidates[Math.floor(this.random() * candidates.length)] ?? candidates[0];
    this.logger.info({ path: picked, candidates: candidates.length }, 'Selected audio file');
    return this.validate(picked);
  }

  listCandidates(): string[] {
    const extensions: readonly string[] = AUDIO_EXTENSIONS;
    return fs
      .readdirSync(this.options.audioDir, { withFileTypes: true })
      .filter((e) => e.isFile() && extensions.includes(extname(e.name).toLowerCase()))
      .map((e) => join(this.options.audioDir, e.name))
      .sort();
  }

  private validate(path: string): AudioSelection | null {
    if (!this.options.probe.isValidMedia(path)) {
      this.logger.warn({ path }, 'Audio file failed validation');
      return null;
    }
    const sizeBytes = fs.statSync(path).size;
    this.logger.info({ path, sizeBytes }, 'Audio file validated');
    return { path, sizeBytes };
  }
}
