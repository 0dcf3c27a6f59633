import { CACHE_STALE_AFTER } from '../config';
import { tagged } from '../logger';
import { ALL_SOURCES, PackageRecord, PackageSource } from '../types';
import type { SourceProvider } from './sources';
import { maxVersion, vercmp } from './vercmp';

const log = tagged('cache');

const copyRecord = (record: PackageRecord): PackageRecord => ({
  ...record,
  dependencies: [...record.dependencies],
  optionalDependencies: [...record.optionalDependencies],
  reverseDependencies: [...record.reverseDependencies],
  provides: [...record.provides],
  conflicts: [...record.conflicts],
  licenses: [...record.licenses],
});

const freezeRecord = (record: PackageRecord): PackageRecord => {
  const copy = copyRecord(record);
  Object.freeze(copy.dependencies);
  Object.freeze(copy.optionalDependencies);
  Object.freeze(copy.reverseDependencies);
  Object.freeze(copy.provides);
  Object.freeze(copy.conflicts);
  Object.freeze(copy.licenses);
  return Object.freeze(copy);
};

class CacheSnapshot {
  readonly records: ReadonlyMap<string, PackageRecord>;

  constructor(
    readonly source: PackageSource,
    records: PackageRecord[],
    readonly takenAt: number,
    readonly generation: number,
  ) {
    const map = new Map<string, PackageRecord>();
    for (const record of records) {
      // (name, source) is unique within a snapshot; the last one wins
      map.set(record.name, freezeRecord({ ...record, source }));
    }
    this.records = map;
    Object.freeze(this);
  }

  static empty(source: PackageSource): CacheSnapshot {
    return new CacheSnapshot(source, [], 0, 0);
  }

  get size(): number {
    return this.records.size;
  }

  get(name: string): PackageRecord | undefined {
    return this.records.get(name);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  values(): IterableIterator<PackageRecord> {
    return this.records.values();
  }
}

type SnapshotSet = Readonly<Record<PackageSource, CacheSnapshot>>;

const availableVersion = (
  snapshots: SnapshotSet,
  name: string,
): string | undefined => {
  const candidates = [
    snapshots[PackageSource.OFFICIAL].get(name)?.version,
    snapshots[PackageSource.AUR].get(name)?.version,
  ].filter((version): version is string => version !== undefined);
  return maxVersion(candidates);
};

const isOutdated = (snapshots: SnapshotSet, name: string): boolean => {
  const installed = snapshots[PackageSource.INSTALLED].get(name);
  if (!installed) {
    return false;
  }
  const available = availableVersion(snapshots, name);
  return available !== undefined && vercmp(installed.version, available) < 0;
};

const decorate = (
  snapshots: SnapshotSet,
  record: PackageRecord,
): PackageRecord => {
  const copy = copyRecord(record);
  copy.isOutdated = isOutdated(snapshots, record.name);
  if (record.source === PackageSource.INSTALLED) {
    const official = snapshots[PackageSource.OFFICIAL].get(record.name);
    if (official) {
      copy.repository = official.repository;
    } else if (snapshots[PackageSource.AUR].has(record.name)) {
      copy.repository = 'aur';
    }
  }
  return copy;
};

const currentRecord = (
  snapshots: SnapshotSet,
  name: string,
): PackageRecord | undefined =>
  snapshots[PackageSource.INSTALLED].get(name) ??
  snapshots[PackageSource.OFFICIAL].get(name) ??
  snapshots[PackageSource.AUR].get(name);

interface MergedPackage {
  name: string;
  current: PackageRecord;
  installed?: PackageRecord | undefined;
  official?: PackageRecord | undefined;
  aur?: PackageRecord | undefined;
  availableVersion?: string | undefined;
  isOutdated: boolean;
}

interface SourceStatus {
  source: PackageSource;
  generation: number;
  takenAt: number;
  size: number;
  stale: boolean;
  refreshing: boolean;
  lastError?: string | undefined;
}

interface MetadataCacheOptions {
  staleAfterMs?: number;
  now?: () => number;
}

class MetadataCache {
  private readonly current = new Map<PackageSource, CacheSnapshot>();
  private readonly inflight = new Map<PackageSource, Promise<CacheSnapshot>>();
  /** Source -> invalidation counter value at the time it was invalidated. */
  private readonly invalidated = new Map<PackageSource, number>();
  private readonly lastErrors = new Map<PackageSource, string>();
  private readonly providers: Map<PackageSource, SourceProvider>;
  private readonly staleAfterMs: number;
  private readonly now: () => number;
  private generation = 0;
  private invalidations = 0;

  constructor(
    providers: SourceProvider[],
    options: MetadataCacheOptions = {},
  ) {
    this.providers = new Map(providers.map((p) => [p.source, p]));
    this.staleAfterMs = options.staleAfterMs ?? CACHE_STALE_AFTER * 1000;
    this.now = options.now ?? Date.now;
    for (const source of ALL_SOURCES) {
      this.current.set(source, CacheSnapshot.empty(source));
    }
  }

  hasProvider(source: PackageSource): boolean {
    return this.providers.has(source);
  }

  snapshot(source: PackageSource): CacheSnapshot {
    if (this.invalidated.has(source) && !this.inflight.has(source)) {
      this.refreshInBackground(source);
    }
    return this.current.get(source) ?? CacheSnapshot.empty(source);
  }

  snapshots(): SnapshotSet {
    return {
      [PackageSource.OFFICIAL]: this.snapshot(PackageSource.OFFICIAL),
      [PackageSource.AUR]: this.snapshot(PackageSource.AUR),
      [PackageSource.INSTALLED]: this.snapshot(PackageSource.INSTALLED),
    };
  }

  get(name: string): MergedPackage | undefined {
    const snapshots = this.snapshots();
    const current = currentRecord(snapshots, name);
    if (!current) {
      return undefined;
    }
    const installed = snapshots[PackageSource.INSTALLED].get(name);
    const official = snapshots[PackageSource.OFFICIAL].get(name);
    const aur = snapshots[PackageSource.AUR].get(name);
    return {
      name,
      current: decorate(snapshots, current),
      installed: installed && decorate(snapshots, installed),
      official: official && decorate(snapshots, official),
      aur: aur && decorate(snapshots, aur),
      availableVersion: availableVersion(snapshots, name),
      isOutdated: isOutdated(snapshots, name),
    };
  }

  refresh(source: PackageSource, signal?: AbortSignal): Promise<CacheSnapshot> {
    const running = this.inflight.get(source);
    if (running) {
      return running;
    }
    const provider = this.providers.get(source);
    if (!provider) {
      // nothing to ask: publish an empty, fresh snapshot
      return Promise.resolve(this.publish(source, [], this.invalidations));
    }

    const startedAfter = this.invalidations;
    const task = (async () => {
      log.verbose(`Refreshing ${source}...`);
      const records = await provider.fetch(signal);
      const snapshot = this.publish(source, records, startedAfter);
      log.verbose(`Refreshed ${source}: ${snapshot.size} packages`);
      return snapshot;
    })()
      .catch((err: unknown) => {
        this.lastErrors.set(
          source,
          err instanceof Error ? err.message : String(err),
        );
        throw err;
      })
      .finally(() => {
        this.inflight.delete(source);
      });
    this.inflight.set(source, task);
    return task;
  }

  async discover(
    source: PackageSource,
    term: string,
    signal?: AbortSignal,
  ): Promise<CacheSnapshot> {
    const provider = this.providers.get(source);
    if (!provider?.search) {
      return this.snapshot(source);
    }
    const found = await provider.search(term, signal);
    const previous = this.snapshot(source);
    const merged = new Map<string, PackageRecord>();
    for (const record of previous.values()) {
      merged.set(record.name, record);
    }
    for (const record of found) {
      // richer records from a full refresh are kept over search stubs
      if (merged.get(record.name)?.version !== record.version) {
        merged.set(record.name, record);
      }
    }
    const snapshot = new CacheSnapshot(
      source,
      Array.from(merged.values()),
      previous.takenAt,
      ++this.generation,
    );
    this.current.set(source, snapshot);
    log.verbose(`Discovered ${found.length} ${source} packages for "${term}"`);
    return snapshot;
  }

  invalidate(source: PackageSource): void {
    log.verbose(`Invalidated ${source}`);
    this.invalidated.set(source, ++this.invalidations);
  }

  isStale(source: PackageSource): boolean {
    const snapshot = this.current.get(source);
    return (
      this.invalidated.has(source) ||
      !snapshot ||
      snapshot.generation === 0 ||
      this.now() - snapshot.takenAt > this.staleAfterMs
    );
  }

  async ensureFresh(
    source: PackageSource,
    signal?: AbortSignal,
  ): Promise<CacheSnapshot> {
    if (this.isStale(source)) {
      return this.refresh(source, signal);
    }
    return this.snapshot(source);
  }

  async refreshStale(signal?: AbortSignal): Promise<void> {
    const stale = ALL_SOURCES.filter(
      (source) => this.providers.has(source) && this.isStale(source),
    );
    const results = await Promise.allSettled(
      stale.map((source) => this.refresh(source, signal)),
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        log.warn(
          `Refresh of ${stale[index]} failed, keeping previous snapshot: ${result.reason}`,
        );
      }
    });
  }

  status(): SourceStatus[] {
    return ALL_SOURCES.map((source) => {
      const snapshot = this.current.get(source) ?? CacheSnapshot.empty(source);
      return {
        source,
        generation: snapshot.generation,
        takenAt: snapshot.takenAt,
        size: snapshot.size,
        stale: this.isStale(source),
        refreshing: this.inflight.has(source),
        lastError: this.lastErrors.get(source),
      };
    });
  }

  /**
   * Publishes a snapshot built from data fetched after invalidation number
   * `fetchedAfter`. An invalidation that arrived while the fetch was running
   * stays in place.
   */
  private publish(
    source: PackageSource,
    records: PackageRecord[],
    fetchedAfter: number,
  ): CacheSnapshot {
    const snapshot = new CacheSnapshot(
      source,
      records,
      this.now(),
      ++this.generation,
    );
    this.current.set(source, snapshot);
    if ((this.invalidated.get(source) ?? 0) <= fetchedAfter) {
      this.invalidated.delete(source);
    }
    this.lastErrors.delete(source);
    return snapshot;
  }

  private refreshInBackground(source: PackageSource): void {
    this.refresh(source).catch((err: unknown) => {
      log.warn(`Background refresh of ${source} failed: ${err}`);
    });
  }
}

export {
  CacheSnapshot,
  MetadataCache,
  availableVersion,
  isOutdated,
  decorate,
  currentRecord,
  copyRecord,
};
export type { SnapshotSet, MergedPackage, SourceStatus, MetadataCacheOptions };
