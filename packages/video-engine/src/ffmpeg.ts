import { spawnSync } from 'child_process';
import { errorMessage, type Logger } from '@horror-shorts/shared';

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

/** Runs an external binary to completion. Throws only when the binary cannot be started. */
export type CommandRunner = (command: string, args: string[]) => CommandResult;

export const runCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: 'utf-8', maxBuffer: 64 * 1024 * 1024 });
  if (result.error) throw result.error;
  return { status: result.status, stdout: result.stdout, stderr: result.stderr };
};

export class FfmpegError extends Error {
  constructor(
    message: string,
    public command: string,
    public status: number | null,
    public stderr: string,
  ) {
    super(message);
    this.name = 'FfmpegError';
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((a) => (/[\s'"]/.test(a) ? JSON.stringify(a) : a)).join(' ');
}

export interface MediaProbe {
  isValidMedia(path: string): boolean;
}

export interface MediaToolsOptions {
  ffmpegPath: string;
  ffprobePath: string;
  runner?: CommandRunner;
}

/** Thin synchronous wrapper over the ffmpeg and ffprobe binaries. */
export class MediaTools implements MediaProbe {
  private runner: CommandRunner;

  constructor(
    private options: MediaToolsOptions,
    private logger: Logger,
  ) {
    this.runner = options.runner ?? runCommand;
  }

  /** Run ffmpeg, throwing FfmpegError on a non-zero exit. */
  ffmpeg(args: string[]): void {
    const command = formatCommand(this.options.ffmpegPath, args);
    this.logger.debug({ command }, 'Running ffmpeg');

    let result: CommandResult;
    try {
      result = this.runner(this.options.ffmpegPath, args);
    } catch (err) {
      throw new FfmpegError(`ffmpeg could not be started: ${errorMessage(err)}`, command, null, '');
    }

    if (result.status !== 0) {
      throw new FfmpegError(
        `ffmpeg exited with status ${result.status}: ${lastLine(result.stderr)}`,
        command,
        result.status,
        result.stderr,
      );
    }
  }

  /** True when ffprobe can open the file without errors. */
  isValidMedia(path: string): boolean {
    const result = this.probe(['-v', 'error', '-i', path]);
    if (!result) return false;
    if (result.status !== 0) {
      this.logger.warn({ path, stderr: result.stderr.trim() }, 'Media validation failed');
      return false;
    }
    return true;
  }

  hasAudioStream(path: string): boolean {
    const result = this.probe([
      '-v', 'error',
      '-select_streams', 'a:0',
      '-show_entries', 'stream=codec_type',
      '-of', 'csv=p=0',
      path,
    ]);
    return result !== null && result.stdout.includes('audio');
  }

  private probe(args: string[]): CommandResult | null {
    try {
      return this.runner(this.options.ffprobePath, args);
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, 'ffprobe could not be started');
      return null;
    }
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}
