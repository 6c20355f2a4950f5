/**
 * Report Sink contract
 *
 * The orchestrator emits exactly one chunk event per chunk plus run start
 * and end. Sinks own all formatting; the engine only guarantees the events.
 */

import type {
  FailedOutcome,
  FetchOutcome,
  NoDataOutcome,
  NotAttemptedOutcome,
  RequestSpec,
  RunSummary,
  SuccessOutcome,
} from '../core/types.js';

export interface ReportSink {
  runStarted(spec: RequestSpec, totalChunks: number): Promise<void>;
  chunkDownloaded(outcome: SuccessOutcome): Promise<void>;
  chunkSkipped(outcome: SuccessOutcome): Promise<void>;
  chunkNoData(outcome: NoDataOutcome): Promise<void>;
  chunkFailed(outcome: FailedOutcome): Promise<void>;
  chunkNotAttempted(outcome: NotAttemptedOutcome): Promise<void>;
  runFinished(summary: RunSummary): Promise<void>;
}

/**
 * Route an outcome to the matching sink event
 */
export async function dispatchOutcome(sink: ReportSink, outcome: FetchOutcome): Promise<void> {
  switch (outcome.kind) {
    case 'success':
      return outcome.skipped ? sink.chunkSkipped(outcome) : sink.chunkDownloaded(outcome);
    case 'no-data':
      return sink.chunkNoData(outcome);
    case 'transient-failure':
    case 'fatal-failure':
      return sink.chunkFailed(outcome);
    case 'not-attempted':
      return sink.chunkNotAttempted(outcome);
  }
}

/**
 * Fan events out to several sinks, in order
 */
export class CompositeReportSink implements ReportSink {
  private readonly sinks: readonly ReportSink[];

  constructor(sinks: readonly ReportSink[]) {
    this.sinks = sinks;
  }

  async runStarted(spec: RequestSpec, totalChunks: number): Promise<void> {
    for (const sink of this.sinks) await sink.runStarted(spec, totalChunks);
  }

  async chunkDownloaded(outcome: SuccessOutcome): Promise<void> {
    for (const sink of this.sinks) await sink.chunkDownloaded(outcome);
  }

  async chunkSkipped(outcome: SuccessOutcome): Promise<void> {
    for (const sink of this.sinks) await sink.chunkSkipped(outcome);
  }

  async chunkNoData(outcome: NoDataOutcome): Promise<void> {
    for (const sink of this.sinks) await sink.chunkNoData(outcome);
  }

  async chunkFailed(outcome: FailedOutcome): Promise<void> {
    for (const sink of this.sinks) await sink.chunkFailed(outcome);
  }

  async chunkNotAttempted(outcome: NotAttemptedOutcome): Promise<void> {
    for (const sink of this.sinks) await sink.chunkNotAttempted(outcome);
  }

  async runFinished(summary: RunSummary): Promise<void> {
    for (const sink of this.sinks) await sink.runFinished(summary);
  }
}

/**
 * Sink that records every event, in arrival order
 */
export class MemoryReportSink implements ReportSink {
  readonly events: Array<{ readonly event: keyof ReportSink; readonly payload: unknown }> = [];

  async runStarted(spec: RequestSpec, totalChunks: number): Promise<void> {
    this.events.push({ event: 'runStarted', payload: { spec, totalChunks } });
  }

  async chunkDownloaded(outcome: SuccessOutcome): Promise<void> {
    this.events.push({ event: 'chunkDownloaded', payload: outcome });
  }

  async chunkSkipped(outcome: SuccessOutcome): Promise<void> {
    this.events.push({ event: 'chunkSkipped', payload: outcome });
  }

  async chunkNoData(outcome: NoDataOutcome): Promise<void> {
    this.events.push({ event: 'chunkNoData', payload: outcome });
  }

  async chunkFailed(outcome: FailedOutcome): Promise<void> {
    this.events.push({ event: 'chunkFailed', payload: outcome });
  }

  async chunkNotAttempted(outcome: NotAttemptedOutcome): Promise<void> {
    this.events.push({ event: 'chunkNotAttempted', payload: outcome });
  }

  async runFinished(summary: RunSummary): Promise<void> {
    this.events.push({ event: 'runFinished', payload: summary });
  }

  eventNames(): ReadonlyArray<keyof ReportSink> {
    return this.events.map((entry) => entry.event);
  }
}
