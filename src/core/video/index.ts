export {
  FfmpegCompositor,
  buildConcatScript,
  probeDuration,
  runCommand,
  type CommandResult,
  type CommandRunner,
  type VideoCompositor,
} from './ffmpeg.js';
