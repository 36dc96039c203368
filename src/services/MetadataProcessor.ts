import type { ProcessingConfig, UploadMode } from '../types/index.js';
import { ProcessingStep } from '../types/index.js';
import { createInputFile } from '../models/InputFile.js';
import type { MetadataRecord } from '../models/MetadataRecord.js';
import {
  createProcessingJob,
  markStepStarted,
  markStepComplete,
  markJobComplete,
  markJobFailed,
  type ProcessingJob,
} from '../models/ProcessingJob.js';
import { RecordAssembler } from './RecordAssembler.js';
import { DescriptorWriter, getDescriptorPath } from './DescriptorWriter.js';
import { getLogger, createJobLogger } from '../lib/logger.js';

export interface ProcessedFile {
  inputPath: string;
  descriptorPath: string;
  record: MetadataRecord;
}

export class MetadataProcessor {
  private config: ProcessingConfig;
  private assembler: RecordAssembler;
  private writer: DescriptorWriter;
  private logger = getLogger();
  private activeJobs: Map<string, ProcessingJob> = new Map();

  constructor(
    config: ProcessingConfig,
    assembler?: RecordAssembler,
    writer?: DescriptorWriter
  ) {
    this.config = config;
    this.assembler = assembler ?? new RecordAssembler();
    this.writer = writer ?? new DescriptorWriter();
  }

  /**
   * Describe every input with up to maxConcurrency files in flight.
   *
   * The first failure stops new files from starting; files already in flight
   * finish and the failure is rethrown. Results follow input order.
   */
  async processFiles(
    inputPaths: string[],
    destination: string,
    mode: UploadMode
  ): Promise<ProcessedFile[]> {
    const results: ProcessedFile[] = [];
    const workerCount = Math.min(this.config.maxConcurrency, inputPaths.length);
    let nextIndex = 0;
    let failure: unknown = null;

    this.logger.info(
      { files: inputPaths.length, mode: mode.kind, destination, workers: workerCount },
      'Generating metadata'
    );

    const worker = async (): Promise<void> => {
      while (failure === null && nextIndex < inputPaths.length) {
        const index = nextIndex++;
        const inputPath = inputPaths[index];
        if (inputPath === undefined) {
          return;
        }

        try {
          results[index] = await this.processFile(inputPath, destination, mode);
        } catch (error) {
          failure ??= error;
        }
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (failure !== null) {
      throw failure;
    }

    this.logger.info({ files: results.length }, 'Metadata generation complete');
    return results;
  }

  async processFile(
    inputPath: string,
    destination: string,
    mode: UploadMode
  ): Promise<ProcessedFile> {
    const file = createInputFile(inputPath);
    const job = createProcessingJob(file);
    this.activeJobs.set(job.id, job);

    const logger = createJobLogger(job);

    try {
      logger.debug('Starting metadata generation');

      markStepStarted(job, ProcessingStep.TYPE_DETECTION);
      const nameFacts = this.assembler.classify(file);
      markStepComplete(job, ProcessingStep.TYPE_DETECTION);
      logger.debug(nameFacts, 'File type detected');

      markStepStarted(job, ProcessingStep.CHECKSUM_CALCULATION);
      const contentFacts = await this.assembler.readContentFacts(file);
      markStepComplete(job, ProcessingStep.CHECKSUM_CALCULATION);

      markStepStarted(job, ProcessingStep.RECORD_ASSEMBLY);
      const record = this.assembler.buildRecord(
        file,
        { ...nameFacts, ...contentFacts },
        destination,
        mode
      );
      markStepComplete(job, ProcessingStep.RECORD_ASSEMBLY);

      markStepStarted(job, ProcessingStep.DESCRIPTOR_WRITE);
      const descriptorPath = getDescriptorPath(file.path);
      await this.writer.write(record, descriptorPath);
      markStepComplete(job, ProcessingStep.DESCRIPTOR_WRITE);

      markJobComplete(job);
      logger.debug({ duration: Date.now() - job.startTime.getTime() }, 'Metadata generation completed');

      return { inputPath, descriptorPath, record };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const failedStep = job.currentStep;
      markJobFailed(job, err);
      logger.error({ error: err, step: failedStep }, 'Metadata generation failed');
      throw err;
    } finally {
      this.activeJobs.delete(job.id);
    }
  }

  getActiveJobsCount(): number {
    return this.activeJobs.size;
  }
}
