import { z } from 'zod';

export interface CliOptions {
  quotes: number;
  /** Seconds each frame stays on screen. */
  duration: number;
  upload: boolean;
  customAudio: boolean;
  audioFile?: string;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

export class ArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgsError';
  }
}

const optionsSchema = z.object({
  quotes: z.coerce.number().int().positive().default(9),
  duration: z.coerce.number().int().positive().default(10),
  upload: z.boolean(),
  customAudio: z.boolean(),
  audioFile: z.string().min(1).optional(),
});

const VALUE_FLAGS = ['--quotes', '--duration', '--audio-file'];
const SWITCHES = ['--upload', '--custom-audio', '--no-custom-audio', '--help', '-h'];

export function parseArgs(args: string[]): ParsedArgs {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ArgsError(`${arg} needs a value`);
      }
      i++;
    } else if (!SWITCHES.includes(arg)) {
      throw new ArgsError(`Unknown argument: ${arg}`);
    }
  }

  if (hasFlag(args, '--help') || hasFlag(args, '-h')) return { help: true };

  const parsed = optionsSchema.safeParse({
    quotes: getFlag(args, '--quotes'),
    duration: getFlag(args, '--duration'),
    upload: hasFlag(args, '--upload'),
    // Last of --custom-audio / --no-custom-audio wins; on by default.
    customAudio: args.lastIndexOf('--no-custom-audio') <= args.lastIndexOf('--custom-audio'),
    audioFile: getFlag(args, '--audio-file'),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${kebab(String(i.path[0]))}: ${i.message}`);
    throw new ArgsError(issues.join('\n'));
  }
  return { help: false, ...parsed.data };
}

export const HELP_TEXT = `
  horror-shorts: horror movie quote video generator

  Usage:
    npm start -- [options]

  Options:
    --quotes <n>           Number of quotes to use (default: 9)
    --duration <s>         Seconds per quote (default: 10)
    --upload               Upload to YouTube when done
    --custom-audio         Use a random track from the audio directory (default)
    --no-custom-audio      Produce a silent video
    --audio-file <name>    Specific audio file inside the audio directory
    -h, --help             Show this help
`;

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function kebab(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
