import { BackgroundRenderer, FrameComposer, QuoteHistory, QuoteSource } from '@horror-shorts/generator';
import { YouTubeCredentialStore, YouTubeUploader } from '@horror-shorts/publisher';
import { AudioSelector, MediaTools, VideoAssembler } from '@horror-shorts/video-engine';
import type { Config, Logger } from '@horror-shorts/shared';
import { PipelineError, type PipelineDeps } from './pipeline.js';

/** Wires the production stage implementations from config. */
export function createPipelineDeps(config: Config, logger: Logger): PipelineDeps {
  if (!config.openaiApiKey) {
    throw new PipelineError('OPENAI_API_KEY is not set', 'quotes');
  }

  const size = { width: config.width, height: config.height };
  const tools = new MediaTools(
    { ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath },
    logger.child({ component: 'ffmpeg' }),
  );

  return {
    quotes: new QuoteSource(
      { apiKey: config.openaiApiKey, model: config.openaiModel, history: QuoteHistory.load(config.historyFile) },
      logger.child({ stage: 'quotes' }),
    ),
    backgrounds: new BackgroundRenderer(
      { imagesDir: config.imagesDir, size, smallImagePolicy: config.smallImagePolicy },
      logger.child({ stage: 'backgrounds' }),
    ),
    frames: new FrameComposer({ framesDir: config.framesDir, size }, logger.child({ stage: 'frames' })),
    audio: new AudioSelector({ audioDir: config.audioDir, probe: tools }, logger.child({ stage: 'audio' })),
    assembler: new VideoAssembler({ tools }, logger.child({ stage: 'video' })),
    publisher: () => {
      const uploadLogger = logger.child({ stage: 'upload' });
      const auth = new YouTubeCredentialStore(
        { clientSecretFile: config.youtubeClientSecretFile, tokenFile: config.youtubeTokenFile },
        uploadLogger,
      );
      return new YouTubeUploader({ auth, dryRun: config.uploadDryRun }, uploadLogger);
    },
  };
}
