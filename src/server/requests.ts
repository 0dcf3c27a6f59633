import { ValidationError } from '../errors';
import { SearchOptions, SortKey } from '../core/queryEngine';
import {
    OperationKind,
    OperationRequest,
    PackageIdentity,
    PackageSource,
} from '../types';

type SourceGuess = (name: string, kind: OperationKind) => PackageSource;

const SORT_KEYS: SortKey[] = ['name', 'version', 'size', 'repository'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const queryString = (value: unknown): string | undefined => {
    if (Array.isArray(value)) {
        return queryString(value[0]);
    }
    return typeof value === 'string' ? value : undefined;
};

const queryFlag = (value: unknown): boolean => {
    const text = queryString(value)?.toLowerCase();
    return text === '1' || text === 'true' || text === 'yes';
};

const parseSource = (value: unknown): PackageSource | undefined =>
    Object.values(PackageSource).find((source) => source === value);

const parseSourceParam = (value: unknown): PackageSource => {
    const source = parseSource(value);
    if (!source) {
        throw new ValidationError(
            `Unknown source ${String(value)}; expected one of ${Object.values(PackageSource).join(', ')}`,
        );
    }
    return source;
};

const parseSearchOptions = (query: Record<string, unknown>): SearchOptions => {
    const options: SearchOptions = {
        repository: queryString(query.repository) || undefined,
        installedOnly: queryFlag(query.installed),
        orphansOnly: queryFlag(query.orphans),
        outdatedOnly: queryFlag(query.outdated),
    };
    const sources = queryString(query.sources);
    if (sources) {
        options.sources = sources.split(',').map((s) => parseSourceParam(s.trim()));
    }
    const sort = queryString(query.sort);
    if (sort) {
        const by = SORT_KEYS.find((key) => key === sort);
        if (!by) {
            throw new ValidationError(`Cannot sort by ${sort}; expected one of ${SORT_KEYS.join(', ')}`);
        }
        options.sort = { by, descending: queryString(query.order) === 'desc' };
    }
    const limit = queryString(query.limit);
    if (limit) {
        const parsed = parseInt(limit);
        if (Number.isNaN(parsed) || parsed < 0) {
            throw new ValidationError(`Invalid limit: ${limit}`);
        }
        options.limit = parsed;
    }
    return options;
};

const parseTargets = (
    value: unknown,
    kind: OperationKind,
    guess: SourceGuess,
): PackageIdentity[] => {
    if (!Array.isArray(value) || value.length === 0) {
        throw new ValidationError('targets must be a non-empty array');
    }
    return value.map((item: unknown) => {
        if (typeof item === 'string') {
            return { name: item, source: guess(item, kind) };
        }
        if (isRecord(item) && typeof item.name === 'string') {
            return {
                name: item.name,
                source:
                    item.source === undefined
                        ? guess(item.name, kind)
                        : parseSourceParam(item.source),
            };
        }
        throw new ValidationError('Each target must be a name or { name, source }');
    });
};

const parseOperationRequest = (
    body: unknown,
    guess: SourceGuess,
): OperationRequest => {
    if (!isRecord(body)) {
        throw new ValidationError('Body must be an object.');
    }
    const kind = Object.values(OperationKind).find((k) => k === body.kind);
    if (!kind) {
        throw new ValidationError(
            `kind must be one of ${Object.values(OperationKind).join(', ')}`,
        );
    }
    const requiresElevation =
        typeof body.requiresElevation === 'boolean' ? body.requiresElevation : undefined;

    switch (kind) {
        case OperationKind.INSTALL:
        case OperationKind.REINSTALL:
        case OperationKind.UPDATE_SELECTED:
            return {
                kind,
                targets: parseTargets(body.targets, kind, guess),
                requiresElevation,
            };
        case OperationKind.REMOVE:
            return {
                kind,
                targets: parseTargets(body.targets, kind, guess),
                recursive: body.recursive === true,
                requiresElevation,
            };
        case OperationKind.INSTALL_LOCAL_FILE:
            if (typeof body.filePath !== 'string' || body.filePath === '') {
                throw new ValidationError('filePath is required.');
            }
            return { kind, filePath: body.filePath, requiresElevation };
        case OperationKind.UPDATE_ALL:
        case OperationKind.CACHE_CLEAN:
        case OperationKind.ORPHAN_CLEAN:
        case OperationKind.SYNC_DATABASES:
            return { kind, requiresElevation };
    }
};

export {
    isRecord,
    queryString,
    queryFlag,
    parseSource,
    parseSourceParam,
    parseSearchOptions,
    parseOperationRequest,
};
export type { SourceGuess };
