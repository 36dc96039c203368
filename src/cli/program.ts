import { Command, InvalidArgumentError, type OutputConfiguration } from 'commander';
import { getConfig } from '../config/config.js';
import { validateDestination, validateInputFiles } from '../lib/validation.js';
import { MetadataProcessor, type ProcessedFile } from '../services/MetadataProcessor.js';
import type { UploadMode } from '../types/index.js';

type GlobalOptions = {
  concurrency?: number;
};

type TargetOptions = {
  input: string[];
  output: string;
};

type SampleOptions = TargetOptions & {
  sampleName?: string;
  analysisId?: string;
  dmeAnalysisCollection?: string;
};

type CombinedOptions = TargetOptions & {
  analysisId?: string;
};

export interface ProgramOptions {
  /** Throw CommanderError instead of exiting the process */
  exitOverride?: boolean;
  output?: OutputConfiguration;
  /** Called with the results of each successful run */
  onComplete?: (results: ProcessedFile[]) => void;
}

function parsePositiveInt(value: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return num;
}

function withTargetOptions(command: Command): Command {
  return command
    .requiredOption('-i, --input <paths...>', 'input files to describe')
    .requiredOption('-o, --output <path>', 'destination collection path in the archive');
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.output) {
    program.configureOutput(options.output);
  }

  const run = async (
    target: TargetOptions,
    mode: UploadMode,
    globals: GlobalOptions
  ): Promise<void> => {
    validateDestination(target.output);
    await validateInputFiles(target.input);

    const config = getConfig();
    const processor = new MetadataProcessor({
      ...config.processing,
      maxConcurrency: globals.concurrency ?? config.processing.maxConcurrency,
    });

    const results = await processor.processFiles(target.input, target.output, mode);
    options.onComplete?.(results);
  };

  program
    .name('archive-metadata')
    .description('Write .metadata.json descriptors for files bound for the archive')
    .option('-c, --concurrency <n>', 'files processed at once', parsePositiveInt);

  withTargetOptions(
    program.command('sample').description('describe per-sample output files')
  )
    .option('--sample-name <name>', 'sample the files belong to')
    .option('--analysis-id <id>', 'MD5 of all pipeline inputs')
    .option('--dme-analysis-collection <path>', 'analysis collection path in the archive')
    .action(async (_opts: unknown, command: Command) => {
      const opts = command.optsWithGlobals<SampleOptions & GlobalOptions>();
      await run(
        opts,
        {
          kind: 'sample',
          sampleName: opts.sampleName,
          analysisId: opts.analysisId,
          analysisCollection: opts.dmeAnalysisCollection,
        },
        opts
      );
    });

  withTargetOptions(
    program.command('combined').description('describe files combining several samples')
  )
    .option('--analysis-id <id>', 'MD5 of all pipeline inputs')
    .action(async (_opts: unknown, command: Command) => {
      const opts = command.optsWithGlobals<CombinedOptions & GlobalOptions>();
      await run(opts, { kind: 'combined', analysisId: opts.analysisId }, opts);
    });

  return program;
}
