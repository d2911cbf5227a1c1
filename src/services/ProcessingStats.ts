export interface StatsSnapshot {
  discovered: number;
  uploaded: number;
  duplicates: number;
  archived: number;
  rejected: number;
  failed: number;
  startedAt: Date;
  lastActivityAt: Date | null;
}

export type StatsCounter = 'discovered' | 'uploaded' | 'duplicates' | 'archived' | 'rejected' | 'failed';

/**
 * Counters for the lifetime of the process. One instance is created at
 * startup and handed to the pipeline; it is read again for the final report.
 */
export class ProcessingStats {
  private counters: Record<StatsCounter, number> = {
    discovered: 0,
    uploaded: 0,
    duplicates: 0,
    archived: 0,
    rejected: 0,
    failed: 0,
  };
  private readonly startedAt: Date;
  private lastActivityAt: Date | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now();
  }

  increment(counter: StatsCounter): void {
    this.counters[counter] += 1;
    this.lastActivityAt = this.now();
  }

  snapshot(): StatsSnapshot {
    return {
      ...this.counters,
      startedAt: this.startedAt,
      lastActivityAt: this.lastActivityAt,
    };
  }

  summary(): string {
    const runtimeSeconds = (this.now().getTime() - this.startedAt.getTime()) / 1000;
    const { discovered, uploaded, duplicates, archived, rejected, failed } = this.counters;

    return `Processing stats - discovered: ${discovered}, uploaded: ${uploaded}, ` +
      `duplicates: ${duplicates}, archived: ${archived}, rejected: ${rejected}, ` +
      `failed: ${failed}, runtime: ${runtimeSeconds.toFixed(1)}s`;
  }
}
