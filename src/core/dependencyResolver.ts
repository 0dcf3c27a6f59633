import path from 'path';
import fse from 'fs-extra';
import { PACMAN_PATH, PACTREE_PATH, AUR_HELPER, QUERY_TIMEOUT } from '../config';
import {
  ExitError,
  OperationCancelled,
  UnresolvableConflict,
  ValidationError,
} from '../errors';
import { tagged } from '../logger';
import {
  OperationKind,
  OperationRequest,
  PackageIdentity,
  PackageSource,
  Plan,
  PlannedPackage,
} from '../types';
import {
  captureOutput,
  formatCommand,
  CapturedOutput,
  CommandRunner,
} from './processRunner';
import { isPackageName } from './commands';
import { parseInfoBlocks, parsePactree, parseUpgradeList } from './parsers';
import { queryNames } from './sources';

const log = tagged('resolver');

const PACKAGE_EXTENSIONS = [
  '.pkg.tar.zst',
  '.pkg.tar.xz',
  '.pkg.tar.gz',
  '.pkg.tar.bz2',
  '.pkg.tar',
];

const PRINT_FORMAT = ['--print', '--print-format', '%n %v'];

interface ResolverPaths {
  pacman: string;
  pactree: string;
  aurHelper: string;
}

const defaultResolverPaths: ResolverPaths = {
  pacman: PACMAN_PATH,
  pactree: PACTREE_PATH,
  aurHelper: AUR_HELPER,
};

interface DryRunReport {
  packages: PlannedPackage[];
  fatal: string[];
  resolved: string[];
  warnings: string[];
}

const CONFLICT_PATTERNS: RegExp[] = [
  /^:: (\S+) and (\S+) are in conflict/,
  /unable to satisfy dependency '([^']+)' required by (\S+)/,
  /removing (\S+) breaks dependency '([^']+)' required by (\S+)/,
  /^error: target not found: (\S+)/,
  /^error: (\S+): .*conflicting files/,
  /^error: failed to prepare transaction/,
  /^error: failed to commit transaction/,
  /installing (\S+) \(([^)]+)\) breaks dependency '([^']+)' required by (\S+)/,
];

/**
 * Reads a `--print --print-format "%n %v"` dry run. Package lines are
 * `name version`; `::` and `error:` lines describe what pacman could not
 * settle on its own.
 */
const parseDryRun = (output: CapturedOutput): DryRunReport => {
  const report: DryRunReport = {
    packages: [],
    fatal: [],
    resolved: [],
    warnings: [],
  };
  const lines = [...output.stdout, ...output.stderr].map((line) => line.trim());
  for (const line of lines) {
    if (line === '') {
      continue;
    }
    if (line.startsWith('warning:')) {
      report.warnings.push(line.replace(/^warning:\s*/, ''));
      continue;
    }
    if (/^:: Replace (\S+) with (\S+)\?/.test(line)) {
      report.resolved.push(line.replace(/^::\s*/, '').replace(/\s*\[[^\]]*\]$/, ''));
      continue;
    }
    if (CONFLICT_PATTERNS.some((pattern) => pattern.test(line))) {
      // the generic "failed to prepare" headline precedes the specific lines
      if (!/^error: failed to (prepare|commit) transaction/.test(line)) {
        report.fatal.push(line.replace(/^(::|error:)\s*/, ''));
      }
      continue;
    }
    if (line.startsWith('::') || line.startsWith('error:')) {
      continue;
    }
    const match = /^(\S+)\s+(\S+)$/.exec(line);
    if (match) {
      report.packages.push({ name: match[1], version: match[2] });
    }
  }
  return report;
};

const emptyPlan = (): Plan => ({
  toInstall: [],
  toRemove: [],
  conflicts: [],
  warnings: [],
});

const validateLocalPackage = async (filePath: string): Promise<string> => {
  if (!filePath || filePath.trim() === '') {
    throw new ValidationError('A package file path is required');
  }
  const resolved = path.resolve(filePath);
  if (!PACKAGE_EXTENSIONS.some((ext) => resolved.endsWith(ext))) {
    throw new ValidationError(
      `${path.basename(resolved)} is not a package archive (${PACKAGE_EXTENSIONS.join(', ')})`,
    );
  }
  if (!(await fse.pathExists(resolved))) {
    throw new ValidationError(`Package file does not exist: ${resolved}`);
  }
  const stats = await fse.stat(resolved);
  if (!stats.isFile()) {
    throw new ValidationError(`Not a regular file: ${resolved}`);
  }
  return resolved;
};

class DependencyResolver {
  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: ResolverPaths = defaultResolverPaths,
  ) {}

  async plan(request: OperationRequest, signal?: AbortSignal): Promise<Plan> {
    switch (request.kind) {
      case OperationKind.INSTALL:
      case OperationKind.REINSTALL:
      case OperationKind.UPDATE_SELECTED:
        return this.planSync(request.targets, signal);
      case OperationKind.REMOVE:
        return this.planRemove(request.targets, request.recursive ?? false, signal);
      case OperationKind.UPDATE_ALL:
        return this.planUpgrade(signal);
      case OperationKind.ORPHAN_CLEAN:
        return this.planOrphans(signal);
      case OperationKind.INSTALL_LOCAL_FILE:
        return this.planLocalFile(request.filePath, signal);
      case OperationKind.CACHE_CLEAN:
      case OperationKind.SYNC_DATABASES:
        return emptyPlan();
    }
  }

  async tree(
    name: string,
    options: { reverse?: boolean; sync?: boolean } = {},
    signal?: AbortSignal,
  ): Promise<string[]> {
    if (!isPackageName(name)) {
      throw new ValidationError(`Invalid package name: ${JSON.stringify(name)}`);
    }
    const args = ['-l', '-u'];
    if (options.reverse) {
      args.push('-r');
    }
    if (options.sync) {
      args.push('-s');
    }
    args.push(name);
    const { status, stdout } = await captureOutput(
      this.runner,
      this.paths.pactree,
      args,
      { signal, timeoutMs: QUERY_TIMEOUT * 1000 },
    );
    this.throwIfCancelled(status.cancelled);
    if (status.code !== 0) {
      log.verbose(`pactree found nothing for ${name} (code ${status.code})`);
      return [];
    }
    return parsePactree(stdout, name);
  }

  private async planSync(
    targets: PackageIdentity[],
    signal?: AbortSignal,
  ): Promise<Plan> {
    const plan = emptyPlan();
    const official = targets
      .filter((t) => t.source !== PackageSource.AUR)
      .map((t) => t.name);
    const aur = targets
      .filter((t) => t.source === PackageSource.AUR)
      .map((t) => t.name);

    if (official.length > 0) {
      const report = await this.dryRun(['-S', ...PRINT_FORMAT, ...official], signal);
      plan.toInstall.push(
        ...report.packages.map((pkg) => ({ ...pkg, source: PackageSource.OFFICIAL })),
      );
      plan.conflicts.push(...report.resolved);
      plan.warnings.push(...report.warnings);
    }
    if (aur.length > 0) {
      plan.toInstall.push(...(await this.planAur(aur, plan, signal)));
    }
    return plan;
  }

  private async planAur(
    names: string[],
    plan: Plan,
    signal?: AbortSignal,
  ): Promise<PlannedPackage[]> {
    if (!this.paths.aurHelper) {
      throw new UnresolvableConflict(
        names.map((name) => `AUR support is disabled; cannot install ${name}`),
      );
    }
    const output = await captureOutput(
      this.runner,
      this.paths.aurHelper,
      ['-Sia', ...names],
      { signal, timeoutMs: QUERY_TIMEOUT * 1000 },
    );
    this.throwIfCancelled(output.status.cancelled);
    const blocks = parseInfoBlocks(output.stdout);
    const found = new Map(
      blocks
        .filter((block) => block['Name']?.[0])
        .map((block) => [block['Name'][0], block]),
    );
    const missing = names.filter((name) => !found.has(name));
    if (missing.length > 0) {
      throw new UnresolvableConflict(
        missing.map((name) => `target not found in the AUR: ${name}`),
      );
    }
    return names.map((name) => {
      const block = found.get(name);
      const depends = (block?.['Depends On'] ?? [])
        .join(' ')
        .split(/\s+/)
        .filter((dep) => dep !== '' && dep !== 'None');
      if (depends.length > 0) {
        plan.warnings.push(
          `${name} is built from source; dependencies resolved at build time: ${depends.join(' ')}`,
        );
      }
      return {
        name,
        version: block?.['Version']?.[0],
        source: PackageSource.AUR,
      };
    });
  }

  private async planRemove(
    targets: PackageIdentity[],
    recursive: boolean,
    signal?: AbortSignal,
  ): Promise<Plan> {
    const plan = emptyPlan();
    const report = await this.dryRun(
      [recursive ? '-Rs' : '-R', ...PRINT_FORMAT, ...targets.map((t) => t.name)],
      signal,
    );
    plan.toRemove.push(
      ...report.packages.map((pkg) => ({ ...pkg, source: PackageSource.INSTALLED })),
    );
    plan.warnings.push(...report.warnings);
    return plan;
  }

  private async planUpgrade(signal?: AbortSignal): Promise<Plan> {
    const plan = emptyPlan();
    const report = await this.dryRun(['-Su', ...PRINT_FORMAT], signal);
    plan.toInstall.push(
      ...report.packages.map((pkg) => ({ ...pkg, source: PackageSource.OFFICIAL })),
    );
    plan.conflicts.push(...report.resolved);
    plan.warnings.push(...report.warnings);
    if (this.paths.aurHelper) {
      const aur = await this.upgradeList(this.paths.aurHelper, ['-Qua'], signal);
      plan.toInstall.push(...aur.map((pkg) => ({ ...pkg, source: PackageSource.AUR })));
    }
    plan.warnings.push(
      'Package databases are synchronized during the update; the list reflects the local databases',
    );
    return plan;
  }

  private async upgradeList(
    command: string,
    args: string[],
    signal?: AbortSignal,
  ): Promise<PlannedPackage[]> {
    const { status, stdout } = await captureOutput(this.runner, command, args, {
      signal,
      timeoutMs: QUERY_TIMEOUT * 1000,
    });
    this.throwIfCancelled(status.cancelled);
    // exit 1 with no output: nothing to upgrade
    if (status.code !== 0 && !(status.code === 1 && stdout.length === 0)) {
      throw new ExitError(formatCommand(command, args), status.code, status.tail);
    }
    return parseUpgradeList(stdout)
      .filter((line) => !line.ignored)
      .map((line) => ({ name: line.name, version: line.availableVersion }));
  }

  private async planOrphans(signal?: AbortSignal): Promise<Plan> {
    const plan = emptyPlan();
    const orphans = await queryNames(
      this.runner,
      this.paths.pacman,
      ['-Qtdq'],
      signal,
    );
    if (signal?.aborted) {
      throw new OperationCancelled();
    }
    plan.toRemove.push(
      ...orphans.map((name) => ({ name, source: PackageSource.INSTALLED })),
    );
    if (orphans.length === 0) {
      plan.warnings.push('No orphaned packages found');
    }
    return plan;
  }

  private async planLocalFile(
    filePath: string,
    signal?: AbortSignal,
  ): Promise<Plan> {
    const resolved = await validateLocalPackage(filePath);
    const plan = emptyPlan();
    plan.archive = resolved;
    const report = await this.dryRun(['-U', ...PRINT_FORMAT, resolved], signal);
    plan.toInstall.push(...report.packages);
    plan.conflicts.push(...report.resolved);
    plan.warnings.push(...report.warnings);
    return plan;
  }

  private async dryRun(args: string[], signal?: AbortSignal): Promise<DryRunReport> {
    const output = await captureOutput(this.runner, this.paths.pacman, args, {
      signal,
      timeoutMs: QUERY_TIMEOUT * 1000,
    });
    this.throwIfCancelled(output.status.cancelled);
    const report = parseDryRun(output);
    if (report.fatal.length > 0) {
      log.info(`Dry run reported conflicts: ${report.fatal.join('; ')}`);
      throw new UnresolvableConflict(report.fatal);
    }
    if (output.status.code !== 0) {
      throw new ExitError(
        formatCommand(this.paths.pacman, args),
        output.status.code,
        output.status.tail,
      );
    }
    return report;
  }

  private throwIfCancelled(cancelled: boolean): void {
    if (cancelled) {
      throw new OperationCancelled();
    }
  }
}

export {
  DependencyResolver,
  parseDryRun,
  validateLocalPackage,
  defaultResolverPaths,
  PACKAGE_EXTENSIONS,
};
export type { DryRunReport, ResolverPaths };
