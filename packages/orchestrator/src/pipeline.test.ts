import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import { join } from 'path';
import {
  ok,
  degraded,
  fatal,
  type FrameProvider,
  type Logger,
  type StageResult,
  type VideoPublisher,
} from '@horror-shorts/shared';
import { AudioSelector, MediaTools, VideoAssembler, type CommandRunner } from '@horror-shorts/video-engine';
import { PipelineError, runPipeline, type PipelineConfig, type PipelineDeps } from './pipeline.js';
import type { CliOptions } from './args.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
} as unknown as Logger;

const OPTIONS: CliOptions = { quotes: 3, duration: 5, upload: false, customAudio: true };
const NOW = new Date(2024, 0, 5, 7, 8, 9);

/** ffmpeg stand-in that writes a placeholder at its output path. */
const fakeFfmpeg: CommandRunner = (command, args) => {
  if (command === 'ffmpeg') fs.writeFileSync(args[args.length - 1], 'mp4 data');
  return { status: 0, stdout: '', stderr: '' };
};

describe('runPipeline', () => {
  let root: string;
  let config: PipelineConfig;
  let deps: PipelineDeps;
  let composeAll: Mock<FrameProvider['composeAll']>;
  let publisher: VideoPublisher;

  beforeEach(() => {
    vi.clearAllMocks();
    root = fs.mkdtempSync(join(os.tmpdir(), 'pipeline-test-'));
    config = {
      quotesDir: join(root, 'quotes'),
      imagesDir: join(root, 'images'),
      framesDir: join(root, 'frames'),
      outputDir: join(root, 'output'),
      audioDir: join(root, 'audio'),
    };

    composeAll = vi.fn<FrameProvider['composeAll']>(async (_backgrounds, quotes) =>
      quotes.map((_q, i): StageResult<string> => {
        const path = join(config.framesDir, `frame_${i + 1}.png`);
        fs.writeFileSync(path, 'png');
        return ok(path);
      }),
    );
    publisher = {
      upload: vi.fn(async () => ({ videoId: 'yt-1', url: 'https://www.youtube.com/watch?v=yt-1', dryRun: false })),
    };

    const tools = new MediaTools({ ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe', runner: fakeFfmpeg }, mockLogger);
    deps = {
      quotes: {
        fetchQuotes: vi.fn(async (n: number) =>
          ['"Here\'s Johnny!" - The Shining', '"They\'re here." - Poltergeist', '"Be afraid." - The Fly'].slice(0, n),
        ),
      },
      backgrounds: {
        render: vi.fn(async (i: number) => ok(join(config.imagesDir, `background_${i + 1}.png`))),
      },
      frames: { composeAll },
      audio: new AudioSelector({ audioDir: config.audioDir, probe: tools }, mockLogger),
      assembler: new VideoAssembler({ tools, tmpRoot: root }, mockLogger),
      publisher: vi.fn(() => publisher),
      now: () => NOW,
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('produces a silent video when the audio directory is empty', async () => {
    const result = await runPipeline(config, deps, OPTIONS, mockLogger);

    expect(result.video).toEqual({
      path: join(config.outputDir, 'horror_quotes_20240105_070809.mp4'),
      hasAudio: false,
      sizeBytes: 8,
      frameCount: 3,
      durationSeconds: 15,
    });
    expect(result.audio).toBeNull();
    expect(result.warnings).toEqual(['audio: no usable track, video will be silent']);
    expect(result.upload).toBeUndefined();
    expect(deps.publisher).not.toHaveBeenCalled();
  });

  it('writes one quote file per quote and renders in order', async () => {
    const result = await runPipeline(config, deps, OPTIONS, mockLogger);

    expect(result.quoteFiles).toEqual([1, 2, 3].map((i) => join(config.quotesDir, `quote_${i}.txt`)));
    expect(fs.readFileSync(join(config.quotesDir, 'quote_2.txt'), 'utf-8')).toBe('"They\'re here." - Poltergeist');
    expect(deps.backgrounds.render).toHaveBeenNthCalledWith(1, 0);
    expect(deps.backgrounds.render).toHaveBeenNthCalledWith(3, 2);
    expect(composeAll).toHaveBeenCalledWith(
      [1, 2, 3].map((i) => join(config.imagesDir, `background_${i}.png`)),
      result.quotes,
    );
  });

  it('muxes the track picked from the audio directory', async () => {
    fs.mkdirSync(config.audioDir, { recursive: true });
    fs.writeFileSync(join(config.audioDir, 'drone.mp3'), 'mp3');
    const runner: CommandRunner = (command, args) => {
      if (command === 'ffmpeg') fs.writeFileSync(args[args.length - 1], 'mp4 data');
      return { status: 0, stdout: args.includes('csv=p=0') ? 'audio\n' : '', stderr: '' };
    };
    const tools = new MediaTools({ ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe', runner }, mockLogger);
    deps.audio = new AudioSelector({ audioDir: config.audioDir, probe: tools }, mockLogger);
    deps.assembler = new VideoAssembler({ tools, tmpRoot: root }, mockLogger);

    const result = await runPipeline(config, deps, OPTIONS, mockLogger);

    expect(result.audio?.path).toBe(join(config.audioDir, 'drone.mp3'));
    expect(result.video.hasAudio).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it('has no audio warning when custom audio is off', async () => {
    const result = await runPipeline(config, deps, { ...OPTIONS, customAudio: false }, mockLogger);
    expect(result.warnings).toEqual([]);
    expect(result.video.hasAudio).toBe(false);
  });

  it('clears quote files from an earlier run', async () => {
    fs.mkdirSync(config.quotesDir, { recursive: true });
    fs.writeFileSync(join(config.quotesDir, 'quote_7.txt'), 'old');

    await runPipeline(config, deps, OPTIONS, mockLogger);

    expect(fs.readdirSync(config.quotesDir).sort()).toEqual(['quote_1.txt', 'quote_2.txt', 'quote_3.txt']);
  });

  it('fails when no quotes come back', async () => {
    deps.quotes = { fetchQuotes: vi.fn(async () => []) };

    const err = await runPipeline(config, deps, OPTIONS, mockLogger).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PipelineError);
    if (err instanceof PipelineError) {
      expect(err.stage).toBe('quotes');
      expect(err.message).toBe('No quotes were returned, nothing to render');
    }
    expect(deps.backgrounds.render).not.toHaveBeenCalled();
  });

  it('continues with fewer quotes than requested', async () => {
    const result = await runPipeline(config, deps, { ...OPTIONS, quotes: 5 }, mockLogger);
    expect(result.video.frameCount).toBe(3);
    expect(result.warnings[0]).toBe('quotes: received 3 of 5');
  });

  it('passes no background for a failed render and reports degraded stages', async () => {
    deps.backgrounds.render = vi.fn(async (i: number): Promise<StageResult<string>> => {
      if (i === 1) return fatal(new Error('disk full'));
      if (i === 2) return degraded(join(config.imagesDir, 'background_3.png'), 'texture skipped: bad svg');
      return ok(join(config.imagesDir, `background_${i + 1}.png`));
    });

    const result = await runPipeline(config, deps, { ...OPTIONS, customAudio: false }, mockLogger);

    expect(composeAll.mock.calls[0][0]).toEqual([
      join(config.imagesDir, 'background_1.png'),
      undefined,
      join(config.imagesDir, 'background_3.png'),
    ]);
    expect(result.warnings).toEqual(['background 2: disk full', 'background 3: texture skipped: bad svg']);
  });

  it('fails when the video cannot be assembled', async () => {
    deps.frames = { composeAll: vi.fn(async () => [fatal<string>(new Error('write failed'))]) };

    await expect(runPipeline(config, deps, OPTIONS, mockLogger)).rejects.toThrow(
      'Video assembly failed: No frames to encode',
    );
  });

  it('uploads with the default metadata', async () => {
    const result = await runPipeline(config, deps, { ...OPTIONS, upload: true }, mockLogger);

    expect(publisher.upload).toHaveBeenCalledWith({
      videoPath: result.video.path,
      title: 'Haunting Horror Movie Quotes',
      description: 'A collection of the most spine-chilling quotes from classic horror films',
      tags: ['horror', 'movie quotes', 'scary', 'horror films', 'shorts'],
    });
    expect(result.upload?.videoId).toBe('yt-1');
  });

  it('keeps the local video path on upload failure', async () => {
    publisher.upload = vi.fn(async () => {
      throw new Error('quotaExceeded');
    });

    const err = await runPipeline(config, deps, { ...OPTIONS, upload: true }, mockLogger).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PipelineError);
    if (err instanceof PipelineError) {
      expect(err.stage).toBe('upload');
      expect(err.message).toBe('YouTube upload failed: quotaExceeded');
      expect(err.videoPath).toBe(join(config.outputDir, 'horror_quotes_20240105_070809.mp4'));
      expect(fs.existsSync(err.videoPath ?? '')).toBe(true);
    }
  });
});
