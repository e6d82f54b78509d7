import * as fs from 'fs';
import * as os from 'os';
import { dirname, join, resolve } from 'path';
import {
  ok,
  degraded,
  fatal,
  errorMessage,
  type AssembleRequest,
  type Logger,
  type StageResult,
  type VideoArtifact,
  type VideoAssemblerPort,
} from '@horror-shorts/shared';
import type { MediaTools } from './ffmpeg.js';
import { buildConcatManifest } from './manifest.js';

export const OUTPUT_FRAME_RATE = 30;

export interface VideoAssemblerOptions {
  tools: MediaTools;
  frameRate?: number;
  /** Parent of the per-run scratch directory. */
  tmpRoot?: string;
}

export function silentVideoArgs(manifestPath: string, outputPath: string, frameRate = OUTPUT_FRAME_RATE): string[] {
  return [
    '-y',
    '-f', 'concat',
    '-safe', '0',
    '-i', manifestPath,
    '-c:v', 'libx264',
    '-pix_fmt', 'yuv420p',
    '-preset', 'medium',
    '-crf', '23',
    '-r', String(frameRate),
    outputPath,
  ];
}

export function muxAudioArgs(videoPath: string, audioPath: string, outputPath: string): string[] {
  return [
    '-y',
    '-i', videoPath,
    '-i', audioPath,
    '-c:v', 'copy',
    '-c:a', 'aac',
    '-b:a', '192k',
    '-shortest',
    outputPath,
  ];
}

/** Two-pass encode: frames to a silent H.264 video, then an optional audio mux.
 * Only the first pass can fail the stage; audio problems fall back to the silent video. */
export class VideoAssembler implements VideoAssemblerPort {
  private tools: MediaTools;
  private frameRate: number;
  private tmpRoot: string;

  constructor(
    options: VideoAssemblerOptions,
    private logger: Logger,
  ) {
    this.tools = options.tools;
    this.frameRate = options.frameRate ?? OUTPUT_FRAME_RATE;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
  }

  assemble(request: AssembleRequest): StageResult<VideoArtifact> {
    const framePaths = request.framePaths.map((p) => resolve(p));
    const outputPath = resolve(request.outputPath);

    if (framePaths.length === 0) {
      return fatal(new Error('No frames to encode'));
    }

    this.logger.info(
      { frames: framePaths.length, durationPerFrame: request.durationPerFrame, outputPath },
      'Assembling video',
    );

    let tempDir: string;
    try {
      tempDir = fs.mkdtempSync(join(this.tmpRoot, 'horror-shorts-'));
      fs.mkdirSync(dirname(outputPath), { recursive: true });
    } catch (err) {
      return fatal(err);
    }

    try {
      return this.encode(framePaths, outputPath, request, tempDir);
    } finally {
      this.cleanup(tempDir);
    }
  }

  private encode(
    framePaths: string[],
    outputPath: string,
    request: AssembleRequest,
    tempDir: string,
  ): StageResult<VideoArtifact> {
    const audio = this.checkAudio(request.audioPath);
    let problem = audio.problem;

    const manifestPath = join(tempDir, 'frames.txt');
    const silentPath = join(tempDir, 'silent_video.mp4');

    try {
      fs.writeFileSync(manifestPath, buildConcatManifest(framePaths, request.durationPerFrame), 'utf-8');
      this.tools.ffmpeg(silentVideoArgs(manifestPath, silentPath, this.frameRate));
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, 'Silent video encode failed');
      return fatal(err);
    }
    this.logger.info({ silentPath }, 'Silent video created');

    let muxed = false;
    let hasAudio = false;
    if (audio.path) {
      try {
        this.tools.ffmpeg(muxAudioArgs(silentPath, audio.path, outputPath));
        muxed = true;
        hasAudio = this.tools.hasAudioStream(outputPath);
        if (hasAudio) {
          this.logger.info({ audioPath: audio.path }, 'Audio added');
        } else {
          this.logger.warn({ outputPath }, 'Muxed video has no audio stream');
        }
      } catch (err) {
        problem = `audio mux failed: ${errorMessage(err)}`;
        this.logger.warn({ error: errorMessage(err) }, 'Audio mux failed, using silent video');
      }
    }

    try {
      if (!muxed) fs.copyFileSync(silentPath, outputPath);
    } catch (err) {
      return fatal(err);
    }

    const sizeBytes = fs.existsSync(outputPath) ? fs.statSync(outputPath).size : 0;
    if (sizeBytes === 0) {
      return fatal(new Error(`Final video missing or empty: ${outputPath}`));
    }

    const artifact: VideoArtifact = {
      path: outputPath,
      hasAudio,
      sizeBytes,
      frameCount: framePaths.length,
      durationSeconds: framePaths.length * request.durationPerFrame,
    };
    this.logger.info({ ...artifact }, 'Final video created');

    return problem ? degraded(artifact, problem) : ok(artifact);
  }

  private checkAudio(audioPath: string | undefined): { path: string | null; problem: string | null } {
    if (!audioPath) {
      this.logger.info('No audio supplied, producing silent video');
      return { path: null, problem: null };
    }

    const abs = resolve(audioPath);
    if (!fs.existsSync(abs)) {
      this.logger.warn({ audioPath: abs }, 'Audio file not found');
      return { path: null, problem: `audio not found: ${abs}` };
    }
    if (!this.tools.isValidMedia(abs)) {
      return { path: null, problem: `audio failed validation: ${abs}` };
    }
    return { path: abs, problem: null };
  }

  private cleanup(tempDir: string): void {
    try {
      fs.rmSync(tempDir, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn({ tempDir, error: errorMessage(err) }, 'Could not remove temporary files');
    }
  }
}
