import { randomUUID } from 'crypto';
import { ProcessingStatus, ProcessingStep } from '../types/index.js';
import type { InputFile } from './InputFile.js';

export interface ProcessingJob {
  /** UUID for this processing job */
  id: string;

  /** The file being described */
  file: InputFile;

  status: ProcessingStatus;

  /** Steps completed so far */
  steps: ProcessingStep[];

  /** Currently executing step */
  currentStep: ProcessingStep | null;

  startTime: Date;

  /** When processing completed/failed */
  endTime: Date | null;

  error: Error | null;
}

export function createProcessingJob(file: InputFile): ProcessingJob {
  return {
    id: randomUUID(),
    file,
    status: ProcessingStatus.PENDING,
    steps: [],
    currentStep: null,
    startTime: new Date(),
    endTime: null,
    error: null,
  };
}

export function markStepStarted(job: ProcessingJob, step: ProcessingStep): void {
  job.status = ProcessingStatus.IN_PROGRESS;
  job.currentStep = step;
}

export function markStepComplete(job: ProcessingJob, step: ProcessingStep): void {
  if (job.currentStep === step) {
    job.steps.push(step);
    job.currentStep = null;
  }
}

export function markJobComplete(job: ProcessingJob): void {
  job.status = ProcessingStatus.COMPLETED;
  job.endTime = new Date();
  job.currentStep = null;
}

export function markJobFailed(job: ProcessingJob, error: Error): void {
  job.status = ProcessingStatus.FAILED;
  job.error = error;
  job.endTime = new Date();
  job.currentStep = null;
}
