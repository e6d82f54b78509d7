import { join } from 'path';
import { saveQuoteFiles } from '@horror-shorts/generator';
import { DEFAULT_UPLOAD_METADATA } from '@horror-shorts/publisher';
import {
  errorMessage,
  type AudioProvider,
  type AudioSelection,
  type BackgroundProvider,
  type Config,
  type FrameProvider,
  type Logger,
  type QuoteProvider,
  type StageResult,
  type UploadResult,
  type VideoArtifact,
  type VideoAssemblerPort,
  type VideoPublisher,
} from '@horror-shorts/shared';
import type { CliOptions } from './args.js';
import { outputFileName, prepareWorkspace } from './workspace.js';

export type PipelineStage = 'workspace' | 'quotes' | 'backgrounds' | 'frames' | 'audio' | 'video' | 'upload';

export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: PipelineStage,
    /** Set once a video exists on disk, so callers can point at it. */
    public videoPath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export interface PipelineDeps {
  quotes: QuoteProvider;
  backgrounds: BackgroundProvider;
  frames: FrameProvider;
  audio: AudioProvider;
  assembler: VideoAssemblerPort;
  /** Built on demand so runs without --upload never touch credentials. */
  publisher: () => VideoPublisher;
  now?: () => Date;
}

export type PipelineConfig = Pick<Config, 'quotesDir' | 'imagesDir' | 'framesDir' | 'outputDir' | 'audioDir'>;

export interface PipelineResult {
  quotes: string[];
  quoteFiles: string[];
  backgrounds: StageResult<string>[];
  frames: StageResult<string>[];
  audio: AudioSelection | null;
  video: VideoArtifact;
  upload?: UploadResult;
  /** Reasons for every degraded stage outcome, in pipeline order. */
  warnings: string[];
}

/** Runs every stage in order. Degraded outcomes are collected; fatal ones throw PipelineError. */
export async function runPipeline(
  config: PipelineConfig,
  deps: PipelineDeps,
  options: CliOptions,
  logger: Logger,
): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  const warnings: string[] = [];

  try {
    prepareWorkspace(config, logger);
  } catch (err) {
    throw new PipelineError(`Could not prepare directories: ${errorMessage(err)}`, 'workspace', undefined, {
      cause: err,
    });
  }

  // ─── Quotes ───
  const quotes = await deps.quotes.fetchQuotes(options.quotes);
  if (quotes.length === 0) {
    throw new PipelineError('No quotes were returned, nothing to render', 'quotes');
  }
  if (quotes.length < options.quotes) {
    warnings.push(`quotes: received ${quotes.length} of ${options.quotes}`);
  }
  const quoteFiles = saveQuoteFiles(config.quotesDir, quotes);

  // ─── Backgrounds ───
  const backgrounds: StageResult<string>[] = [];
  for (let i = 0; i < quotes.length; i++) {
    backgrounds.push(await deps.backgrounds.render(i));
  }
  collect(warnings, 'background', backgrounds);
  const backgroundPaths = backgrounds.map((r) => (r.kind === 'fatal' ? undefined : r.value));

  // ─── Frames ───
  const frames = await deps.frames.composeAll(backgroundPaths, quotes);
  collect(warnings, 'frame', frames);
  const framePaths = frames.flatMap((r) => (r.kind === 'fatal' ? [] : [r.value]));

  // ─── Audio ───
  const audio = deps.audio.select({ audioFile: options.audioFile, customAudio: options.customAudio });
  if (!audio && (options.audioFile || options.customAudio)) {
    warnings.push('audio: no usable track, video will be silent');
  }

  // ─── Video ───
  const assembled = deps.assembler.assemble({
    framePaths,
    outputPath: join(config.outputDir, outputFileName(now())),
    audioPath: audio?.path,
    durationPerFrame: options.duration,
  });
  if (assembled.kind === 'fatal') {
    throw new PipelineError(`Video assembly failed: ${assembled.error.message}`, 'video', undefined, {
      cause: assembled.error,
    });
  }
  if (assembled.kind === 'degraded') warnings.push(`video: ${assembled.reason}`);
  const video = assembled.value;

  const result: PipelineResult = { quotes, quoteFiles, backgrounds, frames, audio, video, warnings };

  // ─── Upload ───
  if (options.upload) {
    try {
      result.upload = await deps.publisher().upload({ videoPath: video.path, ...DEFAULT_UPLOAD_METADATA });
    } catch (err) {
      logger.error({ error: errorMessage(err), videoPath: video.path }, 'Upload failed, video kept locally');
      throw new PipelineError(`YouTube upload failed: ${errorMessage(err)}`, 'upload', video.path, { cause: err });
    }
  }

  logger.info({ videoPath: video.path, warnings: warnings.length }, 'Pipeline complete');
  return result;
}

function collect(warnings: string[], label: string, results: StageResult<string>[]): void {
  results.forEach((r, i) => {
    if (r.kind === 'degraded') warnings.push(`${label} ${i + 1}: ${r.reason}`);
    if (r.kind === 'fatal') warnings.push(`${label} ${i + 1}: ${r.error.message}`);
  });
}
