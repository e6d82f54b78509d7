import chalk from 'chalk';
import Table from 'cli-table3';
import { loadConfig, createLogger, errorMessage } from '@horror-shorts/shared';
import { ArgsError, HELP_TEXT, parseArgs, type ParsedArgs } from './args.js';
import { createPipelineDeps } from './deps.js';
import { PipelineError, runPipeline, type PipelineResult } from './pipeline.js';

const print = {
  header: (text: string) => console.log('\n' + chalk.bold.red(`  ${text}`)),
  success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
  info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
  warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
  error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
  dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
};

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof ArgsError)) throw err;
    print.error(err.message);
    console.log(HELP_TEXT);
    return 1;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const config = loadConfig();
  const logger = createLogger('horror-shorts', config.logLevel);

  print.header('HORROR MOVIE QUOTE VIDEO GENERATOR');
  print.dim(`${args.quotes} quotes, ${args.duration}s each${args.upload ? ', upload enabled' : ''}`);

  try {
    const deps = createPipelineDeps(config, logger);
    const result = await runPipeline(config, deps, args, logger);
    printSummary(result);
    return 0;
  } catch (err) {
    print.error(errorMessage(err));
    if (err instanceof PipelineError && err.videoPath) {
      print.info(`Your video is still available locally at: ${err.videoPath}`);
    }
    return 1;
  }
}

function printSummary(result: PipelineResult): void {
  const count = (results: PipelineResult['frames'], kind: string) => results.filter((r) => r.kind === kind).length;

  const table = new Table({
    head: [chalk.cyan('Stage'), chalk.cyan('Result')],
    colWidths: [14, 60],
  });
  table.push(
    ['Quotes', `${result.quotes.length}`],
    ['Backgrounds', `${count(result.backgrounds, 'ok')} ok, ${count(result.backgrounds, 'degraded')} placeholder`],
    ['Frames', `${count(result.frames, 'ok')} ok, ${count(result.frames, 'degraded')} degraded`],
    ['Audio', result.audio ? result.audio.path : chalk.dim('none')],
    ['Video', `${result.video.durationSeconds}s, ${(result.video.sizeBytes / 1024 / 1024).toFixed(1)} MB`],
  );
  if (result.upload) {
    table.push(['Upload', result.upload.dryRun ? chalk.dim(`dry run (${result.upload.videoId})`) : result.upload.url]);
  }
  console.log(table.toString());

  for (const warning of result.warnings) print.warn(warning);
  if (!result.video.hasAudio) print.dim('Video has no audio track');

  print.success('Process completed successfully!');
  print.success(`Video saved to: ${result.video.path}`);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(chalk.red(`\n  ✗ Error: ${errorMessage(err)}`));
    process.exit(1);
  },
);
