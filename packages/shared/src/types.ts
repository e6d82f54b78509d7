// ─── Stage Results ───

/** Outcome of one pipeline stage. `degraded` carries a usable placeholder or reduced artifact. */
export type StageResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'degraded'; value: T; reason: string }
  | { kind: 'fatal'; error: Error };

export function ok<T>(value: T): StageResult<T> {
  return { kind: 'ok', value };
}

export function degraded<T>(value: T, reason: string): StageResult<T> {
  return { kind: 'degraded', value, reason };
}

export function fatal<T>(error: unknown): StageResult<T> {
  return { kind: 'fatal', error: error instanceof Error ? error : new Error(String(error)) };
}

// ─── Quotes ───

export interface ParsedQuote {
  text: string;
  title: string;
}

// ─── Rendering ───

export interface FrameSize {
  width: number;
  height: number;
}

export type Rgb = readonly [number, number, number];

export interface GradientPair {
  name: string;
  top: Rgb;
  bottom: Rgb;
}

export interface FontSpec {
  family: string;
  size: number;
  /** Font file handed to the rasteriser; absent means the built-in default family. */
  file?: string;
}

export interface ResolvedFonts {
  quote: FontSpec;
  title: FontSpec;
  source: string;
}

// ─── Audio / Video ───

export interface AudioSelection {
  path: string;
  sizeBytes: number;
}

export interface VideoArtifact {
  path: string;
  hasAudio: boolean;
  sizeBytes: number;
  frameCount: number;
  durationSeconds: number;
}

export interface AssembleRequest {
  framePaths: string[];
  outputPath: string;
  audioPath?: string;
  durationPerFrame: number;
}

// ─── Publishing ───

export interface UploadRequest {
  videoPath: string;
  title: string;
  description: string;
  tags: string[];
}

export interface UploadResult {
  videoId: string;
  url: string;
  dryRun: boolean;
}

// ─── Stage Ports ───

export interface QuoteProvider {
  fetchQuotes(count: number): Promise<string[]>;
}

export interface BackgroundProvider {
  render(index: number): Promise<StageResult<string>>;
}

export interface FrameProvider {
  composeAll(backgroundPaths: (string | undefined)[], quotes: string[]): Promise<StageResult<string>[]>;
}

export interface AudioProvider {
  select(options: { audioFile?: string; customAudio: boolean }): AudioSelection | null;
}

export interface VideoAssemblerPort {
  assemble(request: AssembleRequest): StageResult<VideoArtifact>;
}

export interface VideoPublisher {
  upload(request: UploadRequest): Promise<UploadResult>;
}
