export {
  MediaTools,
  FfmpegError,
  runCommand,
  formatCommand,
  type CommandRunner,
  type CommandResult,
  type MediaProbe,
  type MediaToolsOptions,
} from './ffmpeg.js';
export { buildConcatManifest, escapeConcatPath } from './manifest.js';
export {
  VideoAssembler,
  OUTPUT_FRAME_RATE,
  silentVideoArgs,
  muxAudioArgs,
  type VideoAssemblerOptions,
} from './assembler.js';
export { AudioSelector, AUDIO_EXTENSIONS, type AudioSelectorOptions, type AudioSelectRequest } from './audio-selector.js';
