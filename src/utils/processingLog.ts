import type { FailureKind } from '../models/types.js';
import type { PipelineFailure } from '../core/errors.js';
import type { RunLogger } from './logger.js';

export type ProcessingStage = 'segment' | 'batch' | 'analyze' | 'merge' | 'pipeline';

export interface ProcessingLogEntry {
  timestamp: string;
  level: 'info' | 'warn' | 'error';
  stage: ProcessingStage;
  message: string;
  kind?: FailureKind;
  batchId?: string;
  claimNumber?: number;
}

/**
 * Failures and milestones of one pipeline run, returned to the caller.
 *
 * Entries are mirrored to the run logger when one is attached.
 */
export class ProcessingLog {
  private entries: ProcessingLogEntry[] = [];

  constructor(private readonly logger?: RunLogger) {}

  info(stage: ProcessingStage, message: string, context: Partial<ProcessingLogEntry> = {}): void {
    this.push({ ...context, level: 'info', stage, message });
    this.logger?.info(message, { stage, ...context });
  }

  /**
   * Record a failure the pipeline recovered from
   */
  recovered(
    stage: ProcessingStage,
    failure: PipelineFailure,
    context: Pick<ProcessingLogEntry, 'batchId' | 'claimNumber'> = {}
  ): void {
    this.push({ ...context, level: 'warn', stage, message: failure.message, kind: failure.kind });
    this.logger?.warn(failure.message, { stage, kind: failure.kind, ...context });
  }

  warn(stage: ProcessingStage, message: string, context: Partial<ProcessingLogEntry> = {}): void {
    this.push({ ...context, level: 'warn', stage, message });
    this.logger?.warn(message, { stage, ...context });
  }

  failures(): ProcessingLogEntry[] {
    return this.entries.filter((entry) => entry.kind !== undefined);
  }

  toJSON(): ProcessingLogEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  private push(entry: Omit<ProcessingLogEntry, 'timestamp'>): void {
    this.entries.push({ timestamp: new Date().toISOString(), ...entry });
  }
}
