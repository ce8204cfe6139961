import { EventEmitter } from 'node:events';
import { Mutex } from './mutex';

/**
 * Per-service liveness and traffic record.
 */
export interface HeartbeatRecord {
  serviceName: string;
  startedAt: number | null;
  lastBeatAt: number | null;
  requestCount: number;
  counters: Record<string, number>;
}

/**
 * Read-only view used by introspection.
 */
export interface ServiceStats {
  requestCount: number;
  startedAt: number | null;
  lastBeatAt: number | null;
  heartbeatAgeMs: number | null;
  counters: Record<string, number>;
}

const emptyRecord = (serviceName: string): HeartbeatRecord => ({
  serviceName,
  startedAt: null,
  lastBeatAt: null,
  requestCount: 0,
  counters: {},
});

const copyRecord = (record: HeartbeatRecord): HeartbeatRecord => ({
  ...record,
  counters: { ...record.counters },
});

/**
 * Counters and heartbeat timestamps shared by every service and the monitor.
 *
 * One coarse lock guards the whole table; every operation, reads included,
 * goes through it. Nothing is persisted: a new store starts empty.
 *
 * Events: `heartbeat` (serviceName, lastBeatAt).
 */
export class StatisticsStore extends EventEmitter {
  private readonly records = new Map<string, HeartbeatRecord>();
  private readonly lock = new Mutex();

  constructor(private readonly clock: () => number = Date.now) {
    super();
  }

  /**
   * Reset the record of a freshly launched instance.
   */
  initialize(serviceName: string): Promise<HeartbeatRecord> {
    return this.lock.runExclusive(() => {
      const record = { ...emptyRecord(serviceName), startedAt: this.clock() };
      this.records.set(serviceName, record);
      return copyRecord(record);
    });
  }

  async recordHeartbeat(serviceName: string): Promise<number> {
    const beatAt = await this.lock.runExclusive(() => {
      const record = this.recordFor(serviceName);
      record.lastBeatAt = this.clock();
      return record.lastBeatAt;
    });
    this.emit('heartbeat', serviceName, beatAt);
    return beatAt;
  }

  recordRequest(serviceName: string): Promise<number> {
    return this.lock.runExclusive(() => {
      const record = this.recordFor(serviceName);
      record.requestCount += 1;
      return record.requestCount;
    });
  }

  increment(serviceName: string, counter: string, by = 1): Promise<number> {
    return this.lock.runExclusive(() => {
      const record = this.recordFor(serviceName);
      const value = (record.counters[counter] ?? 0) + by;
      record.counters[counter] = value;
      return value;
    });
  }

  /**
   * Atomic read-modify-write. `updater` gets a copy of the current record and
   * returns the next one; no other operation on the store interleaves, even if
   * the updater awaits.
   */
  update(
    serviceName: string,
    updater: (record: HeartbeatRecord) => HeartbeatRecord | Promise<HeartbeatRecord>,
  ): Promise<HeartbeatRecord> {
    return this.lock.runExclusive(async () => {
      const next = await updater(copyRecord(this.recordFor(serviceName)));
      const stored = copyRecord({ ...next, serviceName });
      this.records.set(serviceName, stored);
      return copyRecord(stored);
    });
  }

  get(serviceName: string): Promise<HeartbeatRecord | undefined> {
    return this.lock.runExclusive(() => {
      const record = this.records.get(serviceName);
      return record ? copyRecord(record) : undefined;
    });
  }

  snapshot(): Promise<HeartbeatRecord[]> {
    return this.lock.runExclusive(() => Array.from(this.records.values(), copyRecord));
  }

  async describe(serviceName: string): Promise<ServiceStats> {
    const record = (await this.get(serviceName)) ?? emptyRecord(serviceName);
    return {
      requestCount: record.requestCount,
      startedAt: record.startedAt,
      lastBeatAt: record.lastBeatAt,
      heartbeatAgeMs: record.lastBeatAt === null ? null : this.clock() - record.lastBeatAt,
      counters: record.counters,
    };
  }

  remove(serviceName: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.records.delete(serviceName));
  }

  private recordFor(serviceName: string): HeartbeatRecord {
    let record = this.records.get(serviceName);
    if (!record) {
      record = emptyRecord(serviceName);
      this.records.set(serviceName, record);
    }
    return record;
  }
}
