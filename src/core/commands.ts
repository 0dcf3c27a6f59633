import path from 'path';
import { PACMAN_PATH, AUR_HELPER, SUDO_PATH } from '../config';
import {
  OperationKind,
  OperationRequest,
  PackageIdentity,
  PackageSource,
  Plan,
} from '../types';

type Elevation = 'none' | 'sudo' | 'helper';

interface CommandStep {
  command: string;
  args: string[];
  elevation: Elevation;
  description: string;
}

interface CommandContext {
  pacman: string;
  sudo: string;
  /** Empty when AUR support is disabled. */
  aurHelper: string;
  isRoot: boolean;
}

// pacman's package name rule; nothing that could be read as an option
const PACKAGE_NAME = /^[a-z0-9@_+][a-z0-9@._+-]*$/i;

const isPackageName = (name: string): boolean => PACKAGE_NAME.test(name);

const defaultCommandContext = (isRoot: boolean): CommandContext => ({
  pacman: PACMAN_PATH,
  sudo: SUDO_PATH,
  aurHelper: AUR_HELPER,
  isRoot,
});

const labels: Record<OperationKind, string> = {
  [OperationKind.INSTALL]: 'Install',
  [OperationKind.REMOVE]: 'Remove',
  [OperationKind.REINSTALL]: 'Reinstall',
  [OperationKind.UPDATE_ALL]: 'System update',
  [OperationKind.UPDATE_SELECTED]: 'Update',
  [OperationKind.CACHE_CLEAN]: 'Cache cleaning',
  [OperationKind.ORPHAN_CLEAN]: 'Orphan removal',
  [OperationKind.INSTALL_LOCAL_FILE]: 'Local package installation',
  [OperationKind.SYNC_DATABASES]: 'Database synchronization',
};

const describeRequest = (request: OperationRequest): string => {
  const label = labels[request.kind];
  if ('targets' in request && request.targets.length > 0) {
    return `${label} of ${request.targets.map((t) => t.name).join(', ')}`;
  }
  if (request.kind === OperationKind.INSTALL_LOCAL_FILE) {
    return `${label} of ${request.filePath}`;
  }
  return label;
};

const pacmanStep = (
  ctx: CommandContext,
  args: string[],
  description: string,
): CommandStep => {
  if (ctx.isRoot) {
    return { command: ctx.pacman, args, elevation: 'none', description };
  }
  return {
    command: ctx.sudo,
    args: ['-S', '-k', '-p', '', ctx.pacman, ...args],
    elevation: 'sudo',
    description,
  };
};

/** The helper elevates itself; `--sudoflags -S` lets it read the password from stdin. */
const helperStep = (
  ctx: CommandContext,
  args: string[],
  description: string,
): CommandStep => ({
  command: ctx.aurHelper,
  args: ctx.isRoot ? args : [...args, '--sudoflags', '-S'],
  elevation: ctx.isRoot ? 'none' : 'helper',
  description,
});

const splitBySource = (
  targets: PackageIdentity[],
): { official: string[]; aur: string[] } => ({
  official: targets
    .filter((t) => t.source !== PackageSource.AUR)
    .map((t) => t.name),
  aur: targets.filter((t) => t.source === PackageSource.AUR).map((t) => t.name),
});

const syncSteps = (
  ctx: CommandContext,
  targets: PackageIdentity[],
  verb: string,
): CommandStep[] => {
  const { official, aur } = splitBySource(targets);
  const steps: CommandStep[] = [];
  if (official.length > 0) {
    steps.push(
      pacmanStep(ctx, ['-S', '--noconfirm', ...official], `${verb} ${official.join(' ')}`),
    );
  }
  if (aur.length > 0) {
    steps.push(
      helperStep(ctx, ['-S', '--noconfirm', ...aur], `${verb} ${aur.join(' ')} from the AUR`),
    );
  }
  return steps;
};

const buildSteps = (
  request: OperationRequest,
  plan: Plan,
  ctx: CommandContext,
): CommandStep[] => {
  switch (request.kind) {
    case OperationKind.INSTALL:
      return syncSteps(ctx, request.targets, 'Installing');
    case OperationKind.REINSTALL:
      return syncSteps(ctx, request.targets, 'Reinstalling');
    case OperationKind.UPDATE_SELECTED:
      return syncSteps(ctx, request.targets, 'Updating');
    case OperationKind.REMOVE: {
      const names = request.targets.map((t) => t.name);
      return [
        pacmanStep(
          ctx,
          [request.recursive ? '-Rs' : '-R', '--noconfirm', ...names],
          `Removing ${names.join(' ')}`,
        ),
      ];
    }
    case OperationKind.UPDATE_ALL: {
      const steps = [
        pacmanStep(ctx, ['-Syu', '--noconfirm'], 'Updating official packages'),
      ];
      if (ctx.aurHelper) {
        steps.push(helperStep(ctx, ['-Sua', '--noconfirm'], 'Updating AUR packages'));
      }
      return steps;
    }
    case OperationKind.CACHE_CLEAN:
      return [pacmanStep(ctx, ['-Sc', '--noconfirm'], 'Cleaning the package cache')];
    case OperationKind.ORPHAN_CLEAN: {
      const orphans = plan.toRemove.map((pkg) => pkg.name);
      if (orphans.length === 0) {
        return [];
      }
      return [
        pacmanStep(
          ctx,
          ['-Rns', '--noconfirm', ...orphans],
          `Removing ${orphans.length} orphaned packages`,
        ),
      ];
    }
    case OperationKind.INSTALL_LOCAL_FILE: {
      const archive = plan.archive ?? path.resolve(request.filePath);
      return [
        pacmanStep(ctx, ['-U', '--noconfirm', archive], `Installing ${archive}`),
      ];
    }
    case OperationKind.SYNC_DATABASES:
      return [pacmanStep(ctx, ['-Syy'], 'Synchronizing package databases')];
  }
};

const affectedSources = (request: OperationRequest): PackageSource[] => {
  switch (request.kind) {
    case OperationKind.UPDATE_ALL:
      return [PackageSource.INSTALLED, PackageSource.OFFICIAL, PackageSource.AUR];
    case OperationKind.SYNC_DATABASES:
      return [PackageSource.OFFICIAL];
    case OperationKind.CACHE_CLEAN:
      return [];
    case OperationKind.INSTALL:
    case OperationKind.REINSTALL:
    case OperationKind.UPDATE_SELECTED:
      return request.targets.some((t) => t.source === PackageSource.AUR)
        ? [PackageSource.INSTALLED, PackageSource.AUR]
        : [PackageSource.INSTALLED];
    default:
      return [PackageSource.INSTALLED];
  }
};

export {
  buildSteps,
  affectedSources,
  describeRequest,
  defaultCommandContext,
  isPackageName,
  labels,
};
export type { CommandStep, CommandContext, Elevation };
