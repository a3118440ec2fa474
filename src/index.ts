#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import cliProgress from 'cli-progress';
import { ConversionController } from './controller.js';
import { configureFluentFfmpeg, loadRuntimeConfig, readPositiveInt } from './config.js';
import { enableDebugLogging } from './debug.js';
import { DurationResolver } from './duration.js';
import { FfmpegEncoder } from './encoder.js';
import { openFolder } from './reveal.js';
import { ConversionError } from './errors.js';
import { INDETERMINATE, type ConversionJob, type QueueDrainedEvent } from './types.js';
import {
  formatDuration,
  isSupportedAudioFile,
  isSupportedImageFile,
  logFailure,
  logSessionSummary,
  logSuccess,
  readAudioList,
} from './utils.js';

interface CliConfig {
  readonly audioPaths: readonly string[];
  readonly listFile?: string;
  readonly coverImagePath?: string;
  readonly outputDir?: string;
  readonly concurrency?: number;
  readonly verbose: boolean;
  readonly openWhenDone: boolean;
}

/**
 * Parses incoming CLI arguments. Anything that is not a flag is taken as an audio path.
 */
const parseArgs = (argv: string[]): CliConfig => {
  const audioPaths: string[] = [];
  let listFile: string | undefined;
  let coverImagePath: string | undefined;
  let outputDir: string | undefined;
  let concurrency: number | undefined;
  let verbose = false;
  let openWhenDone = false;

  const args = [...argv];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1];
    switch (arg) {
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
      case '--cover':
      case '-i':
        if (next) {
          coverImagePath = path.resolve(process.cwd(), next);
          i += 1;
        }
        break;
      case '--output':
      case '-o':
        if (next) {
          outputDir = path.resolve(process.cwd(), next);
          i += 1;
        }
        break;
      case '--file':
      case '-f':
        if (next) {
          listFile = path.resolve(process.cwd(), next);
          i += 1;
        }
        break;
      case '--concurrency':
      case '-c':
        if (next) {
          concurrency = readPositiveInt(next, 1);
          i += 1;
        }
        break;
      case '--open':
        openWhenDone = true;
        break;
      case '--verbose':
      case '-v':
        verbose = true;
        break;
      default:
        if (arg.startsWith('--concurrency=')) {
          concurrency = readPositiveInt(arg.split('=')[1], 1);
        } else if (!arg.startsWith('-')) {
          audioPaths.push(path.resolve(process.cwd(), arg));
        }
        break;
    }
  }

  return { audioPaths, listFile, coverImagePath, outputDir, concurrency, verbose, openWhenDone };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
const printHelp = (): void => {
  console.log('\nstillframe: turn audio files into still-image MPEG videos\n');
  console.log('Usage:');
  console.log('  stillframe --cover cover.jpg a.mp3 b.wav   # Convert the given files');
  console.log('  stillframe --cover cover.jpg --file list.txt # Convert every file in a list');
  console.log('\nOptions:');
  console.log('  -i, --cover <path>       Cover image shown for the whole video');
  console.log('  -o, --output <dir>       Output folder (default ~/Desktop/stillframe-exports)');
  console.log('  -f, --file <path>        Text file with one audio path per line');
  console.log('  -c, --concurrency <n>    Parallel encodes (default 1)');
  console.log('      --open               Open the output folder when done');
  console.log('  -v, --verbose            Print encoder diagnostics');
  console.log('  -h, --help               Show this help message');
};

/**
 * Prompts for a cover image until the user gives a supported one.
 */
const promptForCover = async (): Promise<string> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    for (;;) {
      const answer = await rl.question('Path to the cover image: ');
      const normalized = answer.trim().replace(/^["']|["']$/g, '');
      if (normalized && isSupportedImageFile(normalized)) {
        return path.resolve(process.cwd(), normalized);
      }
      console.log('Please provide a .jpg, .png, .bmp, .gif, .webp or .tiff file.');
    }
  } finally {
    rl.close();
  }
};

/**
 * Truncates long names so progress bars remain readable in narrower terminals.
 */
const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

type ProgressBar = ReturnType<cliProgress.MultiBar['create']>;

/**
 * Mirrors controller events onto one progress bar per running job.
 */
const attachProgressBars = (controller: ConversionController, multiBar: cliProgress.MultiBar): void => {
  const bars = new Map<string, ProgressBar>();
  const titleOf = (job: ConversionJob): string => truncateTitle(path.basename(job.inputAudioPath));

  controller.on('status', ({ job }) => {
    if (job.status === 'running') {
      bars.set(job.id, multiBar.create(100, 0, { title: titleOf(job), eta: '--:--:--' }));
      return;
    }
    const bar = bars.get(job.id);
    if (bar) {
      if (job.status === 'completed') {
        bar.update(100, { title: titleOf(job) });
      }
      bar.stop();
      multiBar.remove(bar);
      bars.delete(job.id);
    }
    if (job.status === 'failed') {
      multiBar.log(`Failed: ${path.basename(job.inputAudioPath)} :: ${job.errorMessage ?? 'unknown error'}\n`);
    }
  });

  controller.on('progress', ({ jobId, progress, snapshot }) => {
    const bar = bars.get(jobId);
    if (!bar) {
      return;
    }
    const elapsed = formatDuration(snapshot?.elapsedMs ?? 0);
    if (progress === INDETERMINATE) {
      bar.update(0, { eta: elapsed });
      return;
    }
    bar.update(Math.floor(progress * 100), { eta: elapsed });
  });
};

/**
 * Writes completed and failed jobs to the persistent logs.
 */
const recordResults = async (jobs: readonly ConversionJob[]): Promise<void> => {
  for (const job of jobs) {
    if (job.status === 'completed' && job.outputPath) {
      await logSuccess(job.outputPath, job.inputAudioPath);
    } else if (job.status === 'failed') {
      const tail = job.logTail.length > 0 ? `\n  ${job.logTail.join('\n  ')}` : '';
      await logFailure(`${job.inputAudioPath} :: ${job.errorKind ?? 'Unexpected'} :: ${job.errorMessage ?? ''}${tail}`);
    }
  }
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
const printSummary = (result: QueueDrainedEvent): void => {
  console.log('\nConversion summary');
  console.table(
    result.jobs.map((job) => ({
      Audio: path.basename(job.inputAudioPath),
      Status: job.status,
      Duration: job.durationMs === undefined ? '' : formatDuration(job.durationMs),
      Reason: job.errorMessage ?? '',
      File: job.outputPath ?? '',
    })),
  );
  console.log(
    `Totals => processed: ${result.jobs.length}, completed: ${result.completed}, failed: ${result.failed}, cancelled: ${result.cancelled}`,
  );
};

/**
 * Collects the audio inputs from the positional arguments and the optional list file,
 * dropping files ffmpeg is not expected to read.
 */
const collectAudioPaths = async (config: CliConfig): Promise<string[]> => {
  const listed = config.listFile ? await readAudioList(config.listFile) : [];
  const candidates = [...config.audioPaths, ...listed];
  const supported: string[] = [];
  for (const candidate of candidates) {
    if (isSupportedAudioFile(candidate)) {
      supported.push(candidate);
    } else {
      console.warn(`Skipping unsupported file: ${candidate}`);
    }
  }
  return supported;
};

/**
 * Entry point that wires configuration, the controller and the terminal display.
 */
const main = async (): Promise<void> => {
  const config = parseArgs(process.argv.slice(2));
  if (config.verbose) {
    enableDebugLogging();
  }

  const runtime = loadRuntimeConfig();
  configureFluentFfmpeg(runtime);

  const audioPaths = await collectAudioPaths(config);
  if (audioPaths.length === 0) {
    console.error('No audio files to convert. Pass file paths or use --file <list.txt>.');
    process.exit(1);
  }

  const coverImagePath = config.coverImagePath ?? (await promptForCover());
  if (!isSupportedImageFile(coverImagePath)) {
    console.error(`Unsupported cover image: ${coverImagePath}`);
    process.exit(1);
  }

  const controller = new ConversionController({
    outputDir: config.outputDir ?? runtime.outputDir,
    coverImagePath,
    concurrency: config.concurrency ?? runtime.concurrency,
    encoder: new FfmpegEncoder({ ffmpegPath: runtime.ffmpegPath, cancelGraceMs: runtime.cancelGraceMs }),
    durations: new DurationResolver({ timeoutMs: runtime.probeTimeoutMs, ffprobePath: runtime.ffprobePath }),
  });
  controller.addAudioFiles(audioPaths);

  const multiBar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {eta} | {title}',
    },
    cliProgress.Presets.shades_grey,
  );
  attachProgressBars(controller, multiBar);

  const drained = new Promise<QueueDrainedEvent>((resolve) => {
    const unsubscribe = controller.on('drained', (event) => {
      unsubscribe();
      resolve(event);
    });
  });

  const onInterrupt = (): void => {
    multiBar.log('Cancelling, waiting for ffmpeg to stop...\n');
    controller.cancelAll();
  };
  process.once('SIGINT', onInterrupt);

  console.log(`Converting ${audioPaths.length} file(s) into ${controller.getOutputDir()}`);
  controller.start();
  const result = await drained;
  process.off('SIGINT', onInterrupt);

  multiBar.stop();
  process.stdout.write('\n');

  await recordResults(result.jobs);
  printSummary(result);
  await logSessionSummary(controller.getOutputDir(), {
    total: result.jobs.length,
    completed: result.completed,
    failed: result.failed,
    cancelled: result.cancelled,
  });

  if (config.openWhenDone) {
    try {
      await openFolder(controller.getOutputDir());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Could not open ${controller.getOutputDir()}: ${message}`);
    }
  }

  process.exit(result.failed > 0 ? 1 : 0);
};

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const kind = error instanceof ConversionError ? ` (${error.kind})` : '';
  console.error(`Fatal error${kind}: ${message}`);
  process.exit(1);
});
