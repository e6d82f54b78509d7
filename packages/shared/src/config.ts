import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const configSchema = z.object({
  // OpenAI
  openaiApiKey: z.string().default(''),
  openaiModel: z.string().min(1).default('gpt-4'),

  // Working directories
  quotesDir: z.string().min(1).default('./quotes'),
  imagesDir: z.string().min(1).default('./images'),
  framesDir: z.string().min(1).default('./frames'),
  outputDir: z.string().min(1).default('./output'),
  audioDir: z.string().min(1).default('./audio'),
  historyFile: z.string().min(1).default('./quotes_history.txt'),

  // YouTube OAuth
  youtubeClientSecretFile: z.string().min(1).default('./client_secret.json'),
  youtubeTokenFile: z.string().min(1).default('./token.json'),
  uploadDryRun: booleanFlag.default('false'),

  // Encoder
  ffmpegPath: z.string().min(1).default('ffmpeg'),
  ffprobePath: z.string().min(1).default('ffprobe'),

  // Rendering
  width: z.coerce.number().int().positive().default(1080),
  height: z.coerce.number().int().positive().default(1920),
  smallImagePolicy: z.enum(['warn', 'fail']).default('warn'),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = Readonly<z.infer<typeof configSchema>>;

export type SmallImagePolicy = Config['smallImagePolicy'];

const PATH_KEYS = [
  'quotesDir',
  'imagesDir',
  'framesDir',
  'outputDir',
  'audioDir',
  'historyFile',
  'youtubeClientSecretFile',
  'youtubeTokenFile',
] as const;

/** Build a frozen config from an environment map. Relative paths resolve against `cwd`. */
export function parseConfig(env: NodeJS.ProcessEnv, cwd = process.cwd()): Config {
  const result = configSchema.safeParse({
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL,
    quotesDir: env.QUOTES_DIR,
    imagesDir: env.IMAGES_DIR,
    framesDir: env.FRAMES_DIR,
    outputDir: env.OUTPUT_DIR,
    audioDir: env.AUDIO_DIR,
    historyFile: env.QUOTE_HISTORY_FILE,
    youtubeClientSecretFile: env.YOUTUBE_CLIENT_SECRET_FILE,
    youtubeTokenFile: env.YOUTUBE_TOKEN_FILE,
    uploadDryRun: env.UPLOAD_DRY_RUN,
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    width: env.FRAME_WIDTH,
    height: env.FRAME_HEIGHT,
    smallImagePolicy: env.SMALL_IMAGE_POLICY,
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const invalid = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${invalid}`);
  }

  const data = { ...result.data };
  for (const key of PATH_KEYS) {
    data[key] = resolve(cwd, data[key]);
  }
  return Object.freeze(data);
}

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}
