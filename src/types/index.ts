export enum PackageSource {
  OFFICIAL = 'official',
  AUR = 'aur',
  INSTALLED = 'installed',
}

export const ALL_SOURCES: readonly PackageSource[] = [
  PackageSource.OFFICIAL,
  PackageSource.AUR,
  PackageSource.INSTALLED,
];

export interface PackageRecord {
  name: string;
  version: string;
  source: PackageSource;
  repository: string;
  description: string;
  size: number;
  installedSize?: number | undefined;
  dependencies: string[];
  optionalDependencies: string[];
  reverseDependencies: string[];
  provides: string[];
  conflicts: string[];
  licenses: string[];
  homepage?: string | undefined;
  explicit?: boolean | undefined;
  isOrphan: boolean;
  isOutdated: boolean;
  lastRefreshed: number;
}

export type PackageIdentity = Pick<PackageRecord, 'name' | 'source'>;

export interface PackageUpdate {
  name: string;
  source: PackageSource;
  installedVersion: string;
  availableVersion: string;
}

export interface RepositorySummary {
  name: string;
  packages: number;
  installed: number;
}

export enum OperationKind {
  INSTALL = 'install',
  REMOVE = 'remove',
  REINSTALL = 'reinstall',
  UPDATE_ALL = 'update-all',
  UPDATE_SELECTED = 'update-selected',
  CACHE_CLEAN = 'cache-clean',
  ORPHAN_CLEAN = 'orphan-clean',
  INSTALL_LOCAL_FILE = 'install-local-file',
  SYNC_DATABASES = 'sync-databases',
}

export type TargetedKind =
  | OperationKind.INSTALL
  | OperationKind.REINSTALL
  | OperationKind.UPDATE_SELECTED;

export type SystemKind =
  | OperationKind.UPDATE_ALL
  | OperationKind.CACHE_CLEAN
  | OperationKind.ORPHAN_CLEAN
  | OperationKind.SYNC_DATABASES;

export type OperationRequest =
  | {
      kind: TargetedKind;
      targets: PackageIdentity[];
      requiresElevation?: boolean;
    }
  | {
      kind: OperationKind.REMOVE;
      targets: PackageIdentity[];
      recursive?: boolean;
      requiresElevation?: boolean;
    }
  | {
      kind: SystemKind;
      requiresElevation?: boolean;
    }
  | {
      kind: OperationKind.INSTALL_LOCAL_FILE;
      filePath: string;
      requiresElevation?: boolean;
    };

export interface PlannedPackage {
  name: string;
  version?: string | undefined;
  source?: PackageSource | undefined;
}

export interface Plan {
  toInstall: PlannedPackage[];
  toRemove: PlannedPackage[];
  conflicts: string[];
  warnings: string[];
  /** Absolute path of the local package file checked while planning. */
  archive?: string | undefined;
}

export enum SessionState {
  IDLE = 'idle',
  PLANNING = 'planning',
  AWAITING_CREDENTIAL = 'awaiting-credential',
  EXECUTING = 'executing',
  FINALIZING = 'finalizing',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export enum OutcomeStatus {
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export type OperationOutcome =
  | {
      status: OutcomeStatus.SUCCEEDED;
      summary: string;
      outputTail: string[];
    }
  | {
      status: OutcomeStatus.FAILED;
      summary: string;
      code: string;
      reason: string;
      outputTail: string[];
    }
  | {
      status: OutcomeStatus.CANCELLED;
      summary: string;
      code: string;
      outputTail: string[];
    };

export type OutputStream = 'stdout' | 'stderr';

export enum SessionEventType {
  STATE = 'state',
  PLAN = 'plan',
  CREDENTIAL_REQUIRED = 'credential-required',
  PROGRESS = 'progress',
  LOG = 'log',
  OUTCOME = 'outcome',
}

export type SessionEventPayload =
  | { type: SessionEventType.STATE; state: SessionState }
  | { type: SessionEventType.PLAN; plan: Plan }
  | { type: SessionEventType.CREDENTIAL_REQUIRED; prompt: string }
  | { type: SessionEventType.PROGRESS; percent?: number; message: string }
  | { type: SessionEventType.LOG; stream: OutputStream; message: string }
  | { type: SessionEventType.OUTCOME; outcome: OperationOutcome };

export type SessionEvent = SessionEventPayload & {
  sessionId: string;
  seq: number;
  at: number;
};

export interface SessionHandle {
  id: string;
}

export interface SessionInfo {
  id: string;
  request: OperationRequest;
  state: SessionState;
  startedAt: number;
  endedAt?: number | undefined;
  outcome?: OperationOutcome | undefined;
}
