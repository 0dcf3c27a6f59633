import {
  ALL_SOURCES,
  PackageRecord,
  PackageSource,
  PackageUpdate,
  RepositorySummary,
} from '../types';
import {
  MetadataCache,
  SnapshotSet,
  availableVersion,
  currentRecord,
  decorate,
  isOutdated,
} from './metadataCache';
import { stripConstraint } from './parsers';
import { vercmp } from './vercmp';

type SortKey = 'name' | 'version' | 'size' | 'repository';

interface SearchFilters {
  repository?: string;
  installedOnly?: boolean;
  orphansOnly?: boolean;
  outdatedOnly?: boolean;
}

interface SearchOptions extends SearchFilters {
  sources?: PackageSource[];
  sort?: { by: SortKey; descending?: boolean };
  limit?: number;
}

const matchesTerm = (record: PackageRecord, term: string): boolean => {
  if (term === '') {
    return true;
  }
  const needle = term.toLowerCase();
  return (
    record.name.toLowerCase().includes(needle) ||
    record.description.toLowerCase().includes(needle)
  );
};

const matchesFilters = (
  snapshots: SnapshotSet,
  record: PackageRecord,
  filters: SearchFilters,
): boolean => {
  if (filters.repository && record.repository !== filters.repository) {
    return false;
  }
  if (
    filters.installedOnly &&
    !snapshots[PackageSource.INSTALLED].has(record.name)
  ) {
    return false;
  }
  if (
    filters.orphansOnly &&
    !snapshots[PackageSource.INSTALLED].get(record.name)?.isOrphan
  ) {
    return false;
  }
  if (filters.outdatedOnly && !record.isOutdated) {
    return false;
  }
  return true;
};

const comparators: Record<SortKey, (a: PackageRecord, b: PackageRecord) => number> = {
  name: (a, b) => a.name.localeCompare(b.name),
  version: (a, b) => vercmp(a.version, b.version),
  size: (a, b) => a.size - b.size,
  repository: (a, b) => a.repository.localeCompare(b.repository),
};

const sortRecords = (
  records: PackageRecord[],
  by: SortKey,
  descending = false,
): PackageRecord[] => {
  const direction = descending ? -1 : 1;
  return [...records].sort(
    (a, b) =>
      direction * comparators[by](a, b) ||
      a.name.localeCompare(b.name) ||
      a.source.localeCompare(b.source),
  );
};

const reverseDependencies = (snapshots: SnapshotSet, name: string): string[] => {
  const dependents = new Set<string>();
  for (const candidate of mergedNames(snapshots)) {
    const record = currentRecord(snapshots, candidate);
    if (record?.dependencies.some((dep) => stripConstraint(dep) === name)) {
      dependents.add(candidate);
    }
  }
  return Array.from(dependents).sort();
};

const mergedNames = (snapshots: SnapshotSet): Set<string> => {
  const names = new Set<string>();
  for (const source of ALL_SOURCES) {
    for (const record of snapshots[source].values()) {
      names.add(record.name);
    }
  }
  return names;
};

class QueryEngine {
  constructor(private readonly cache: MetadataCache) {}

  *search(term: string, options: SearchOptions = {}): Generator<PackageRecord> {
    const snapshots = this.cache.snapshots();
    const sources = options.sources?.length ? options.sources : ALL_SOURCES;
    const limit = options.limit ?? Infinity;
    const trimmed = term.trim();

    const matches = function* (): Generator<PackageRecord> {
      for (const source of sources) {
        for (const record of snapshots[source].values()) {
          if (!matchesTerm(record, trimmed)) {
            continue;
          }
          const view = decorate(snapshots, record);
          if (matchesFilters(snapshots, view, options)) {
            yield view;
          }
        }
      }
    };

    let produced = 0;
    const ordered = options.sort
      ? sortRecords(Array.from(matches()), options.sort.by, options.sort.descending)
      : matches();
    for (const record of ordered) {
      if (produced >= limit) {
        return;
      }
      produced++;
      yield record;
    }
  }

  details(name: string, source?: PackageSource): PackageRecord | undefined {
    const snapshots = this.cache.snapshots();
    const record = source
      ? snapshots[source].get(name)
      : currentRecord(snapshots, name);
    if (!record) {
      return undefined;
    }
    const view = decorate(snapshots, record);
    view.reverseDependencies = reverseDependencies(snapshots, name);
    return view;
  }

  reverseDependencies(name: string): string[] {
    return reverseDependencies(this.cache.snapshots(), name);
  }

  updates(): PackageUpdate[] {
    const snapshots = this.cache.snapshots();
    const updates: PackageUpdate[] = [];
    for (const installed of snapshots[PackageSource.INSTALLED].values()) {
      if (!isOutdated(snapshots, installed.name)) {
        continue;
      }
      const available = availableVersion(snapshots, installed.name);
      if (available === undefined) {
        continue;
      }
      updates.push({
        name: installed.name,
        source:
          snapshots[PackageSource.OFFICIAL].get(installed.name)?.version === available
            ? PackageSource.OFFICIAL
            : PackageSource.AUR,
        installedVersion: installed.version,
        availableVersion: available,
      });
    }
    return updates.sort((a, b) => a.name.localeCompare(b.name));
  }

  repositories(): RepositorySummary[] {
    const snapshots = this.cache.snapshots();
    const installed = snapshots[PackageSource.INSTALLED];
    const byName = new Map<string, RepositorySummary>();
    for (const record of snapshots[PackageSource.OFFICIAL].values()) {
      let summary = byName.get(record.repository);
      if (!summary) {
        summary = { name: record.repository, packages: 0, installed: 0 };
        byName.set(record.repository, summary);
      }
      summary.packages++;
      if (installed.has(record.name)) {
        summary.installed++;
      }
    }
    return Array.from(byName.values());
  }
}

export {
  QueryEngine,
  matchesTerm,
  matchesFilters,
  sortRecords,
  reverseDependencies,
};
export type { SearchOptions, SearchFilters, SortKey };
