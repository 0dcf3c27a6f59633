import axios from 'axios';
import {
  PACMAN_PATH,
  AUR_HELPER,
  AUR_RPC_URL,
  QUERY_TIMEOUT,
} from '../config';
import { ParseError } from '../errors';
import { tagged } from '../logger';
import { PackageRecord, PackageSource } from '../types';
import { captureOutput, ensureSuccess, CommandRunner } from './processRunner';
import {
  parseNameList,
  parsePackageInfo,
  parseSearchOutput,
  SearchHit,
} from './parsers';

const log = tagged('sources');

interface SourceProvider {
  readonly source: PackageSource;
  fetch(signal?: AbortSignal): Promise<PackageRecord[]>;
  search?(term: string, signal?: AbortSignal): Promise<PackageRecord[]>;
}

interface ToolPaths {
  pacman: string;
  aurHelper: string;
}

const defaultPaths: ToolPaths = {
  pacman: PACMAN_PATH,
  aurHelper: AUR_HELPER,
};

const queryOptions = (signal?: AbortSignal) => ({
  signal,
  timeoutMs: QUERY_TIMEOUT * 1000,
});

const logSkipped = (error: ParseError) => {
  log.warn(`${error.message}; block skipped`);
};

/**
 * Informational queries exit 1 with empty output when there is nothing to
 * report; that is an empty result, not a failure.
 */
const queryNames = async (
  runner: CommandRunner,
  command: string,
  args: string[],
  signal?: AbortSignal,
): Promise<string[]> => {
  const { status, stdout } = await captureOutput(
    runner,
    command,
    args,
    queryOptions(signal),
  );
  if (status.code === 1 && stdout.length === 0) {
    return [];
  }
  ensureSuccess(status);
  return parseNameList(stdout);
};

const hitToRecord = (
  hit: SearchHit,
  source: PackageSource,
  refreshedAt: number,
): PackageRecord => ({
  name: hit.name,
  version: hit.version,
  source,
  repository: hit.repository,
  description: hit.description,
  size: 0,
  dependencies: [],
  optionalDependencies: [],
  reverseDependencies: [],
  provides: [],
  conflicts: [],
  licenses: [],
  isOrphan: false,
  isOutdated: false,
  lastRefreshed: refreshedAt,
});

class OfficialSource implements SourceProvider {
  readonly source = PackageSource.OFFICIAL;

  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: ToolPaths = defaultPaths,
  ) {}

  async fetch(signal?: AbortSignal): Promise<PackageRecord[]> {
    const { status, stdout } = await captureOutput(
      this.runner,
      this.paths.pacman,
      ['-Si'],
      queryOptions(signal),
    );
    ensureSuccess(status);
    return parsePackageInfo(stdout, this.source, Date.now(), logSkipped);
  }
}

class InstalledSource implements SourceProvider {
  readonly source = PackageSource.INSTALLED;

  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: ToolPaths = defaultPaths,
  ) {}

  async fetch(signal?: AbortSignal): Promise<PackageRecord[]> {
    const { status, stdout } = await captureOutput(
      this.runner,
      this.paths.pacman,
      ['-Qi'],
      queryOptions(signal),
    );
    ensureSuccess(status);
    return parsePackageInfo(stdout, this.source, Date.now(), logSkipped);
  }
}

class AurHelperSource implements SourceProvider {
  readonly source = PackageSource.AUR;

  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: ToolPaths = defaultPaths,
  ) {}

  async fetch(signal?: AbortSignal): Promise<PackageRecord[]> {
    const foreign = await queryNames(
      this.runner,
      this.paths.pacman,
      ['-Qmq'],
      signal,
    );
    if (foreign.length === 0) {
      return [];
    }
    const { status, stdout } = await captureOutput(
      this.runner,
      this.paths.aurHelper,
      ['-Sia', ...foreign],
      queryOptions(signal),
    );
    // yay exits non-zero when some names are not in the AUR; keep what it found
    if (status.code !== 0 && stdout.length === 0) {
      ensureSuccess(status);
    }
    return parsePackageInfo(stdout, this.source, Date.now(), logSkipped);
  }

  async search(term: string, signal?: AbortSignal): Promise<PackageRecord[]> {
    const { status, stdout } = await captureOutput(
      this.runner,
      this.paths.aurHelper,
      ['-Ssa', term],
      queryOptions(signal),
    );
    if (status.code !== 0 && stdout.length === 0) {
      return [];
    }
    const refreshedAt = Date.now();
    return parseSearchOutput(stdout).map((hit) =>
      hitToRecord(hit, this.source, refreshedAt),
    );
  }
}

interface AurRpcPackage {
  Name: string;
  Version: string;
  Description?: string | null;
  URL?: string | null;
  Depends?: string[];
  OptDepends?: string[];
  Provides?: string[];
  Conflicts?: string[];
  License?: string[];
}

interface AurRpcResponse {
  type: string;
  error?: string;
  results: AurRpcPackage[];
}

const rpcToRecord = (
  pkg: AurRpcPackage,
  refreshedAt: number,
): PackageRecord => ({
  name: pkg.Name,
  version: pkg.Version,
  source: PackageSource.AUR,
  repository: 'aur',
  description: pkg.Description ?? '',
  size: 0,
  dependencies: pkg.Depends ?? [],
  optionalDependencies: (pkg.OptDepends ?? []).map(
    (dep) => dep.split(':')[0],
  ),
  reverseDependencies: [],
  provides: pkg.Provides ?? [],
  conflicts: pkg.Conflicts ?? [],
  licenses: pkg.License ?? [],
  homepage: pkg.URL ?? undefined,
  isOrphan: false,
  isOutdated: false,
  lastRefreshed: refreshedAt,
});

class AurRpcSource implements SourceProvider {
  readonly source = PackageSource.AUR;

  constructor(
    private readonly runner: CommandRunner,
    private readonly baseUrl: string = AUR_RPC_URL,
    private readonly paths: ToolPaths = defaultPaths,
  ) {}

  async fetch(signal?: AbortSignal): Promise<PackageRecord[]> {
    const foreign = await queryNames(
      this.runner,
      this.paths.pacman,
      ['-Qmq'],
      signal,
    );
    if (foreign.length === 0) {
      return [];
    }
    const params = new URLSearchParams();
    foreign.forEach((name) => params.append('arg[]', name));
    return this.request(`${this.baseUrl}/info?${params.toString()}`, signal);
  }

  async search(term: string, signal?: AbortSignal): Promise<PackageRecord[]> {
    return this.request(
      `${this.baseUrl}/search/${encodeURIComponent(term)}`,
      signal,
    );
  }

  private async request(
    url: string,
    signal?: AbortSignal,
  ): Promise<PackageRecord[]> {
    log.verbose(`Querying AUR RPC: ${url}`);
    const res = await axios.get<AurRpcResponse>(url, {
      signal,
      timeout: QUERY_TIMEOUT * 1000,
    });
    if (res.data.type === 'error' || !Array.isArray(res.data.results)) {
      throw new ParseError(
        'aur-rpc',
        res.data.error ?? 'response without results',
        JSON.stringify(res.data),
      );
    }
    const refreshedAt = Date.now();
    return res.data.results.map((pkg) => rpcToRecord(pkg, refreshedAt));
  }
}

export {
  OfficialSource,
  InstalledSource,
  AurHelperSource,
  AurRpcSource,
  queryNames,
  defaultPaths,
};
export type { SourceProvider, ToolPaths };
