import { ParseError } from '../errors';
import { PackageRecord, PackageSource } from '../types';

type InfoBlock = Record<string, string[]>;

const KEY_VALUE = /^([A-Za-z][A-Za-z ]*?)\s*:\s?(.*)$/;
const CONTINUATION = /^\s+\S/;

/**
 * Parses `pacman -Si/-Qi` (and `yay -Si`) output: blocks of `Key : value`
 * lines separated by blank lines. Continuation lines (leading whitespace)
 * are appended to the previous key as separate values.
 */
const parseInfoBlocks = (lines: string[]): InfoBlock[] => {
  const blocks: InfoBlock[] = [];
  let current: InfoBlock | undefined;
  let lastKey: string | undefined;

  for (const line of lines) {
    if (line.trim() === '') {
      current = undefined;
      lastKey = undefined;
      continue;
    }
    if (CONTINUATION.test(line)) {
      if (current && lastKey) {
        current[lastKey].push(line.trim());
      }
      continue;
    }
    const match = KEY_VALUE.exec(line);
    if (!match) {
      continue;
    }
    if (!current) {
      current = {};
      blocks.push(current);
    }
    lastKey = match[1].trim();
    current[lastKey] = [match[2].trim()];
  }
  return blocks;
};

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
};

const parseSize = (text: string | undefined): number | undefined => {
  if (!text) {
    return undefined;
  }
  const match = /^([\d.]+)\s*(B|KiB|MiB|GiB|TiB)$/.exec(text.trim());
  if (!match) {
    return undefined;
  }
  return Math.round(parseFloat(match[1]) * SIZE_UNITS[match[2]]);
};

const first = (block: InfoBlock, key: string): string | undefined => {
  const values = block[key];
  return values && values[0] !== '' ? values[0] : undefined;
};

const list = (block: InfoBlock, key: string): string[] => {
  const values = block[key];
  if (!values) {
    return [];
  }
  return values
    .join('  ')
    .split(/\s+/)
    .filter((value) => value !== '' && value !== 'None');
};

const optionalList = (block: InfoBlock, key: string): string[] => {
  const values = block[key];
  if (!values) {
    return [];
  }
  return values
    .map((value) => value.split(':')[0].trim())
    .filter((value) => value !== '' && value !== 'None');
};

const stripConstraint = (dependency: string): string =>
  dependency.split(/[<>=:]/)[0];

const blockToRecord = (
  block: InfoBlock,
  source: PackageSource,
  refreshedAt: number,
): PackageRecord => {
  const name = first(block, 'Name');
  const version = first(block, 'Version');
  if (!name || !version) {
    throw new ParseError(
      source,
      'package block without Name or Version',
      Object.entries(block)
        .map(([key, values]) => `${key} : ${values.join(' ')}`)
        .join('\n'),
    );
  }
  const installedSize = parseSize(first(block, 'Installed Size'));
  const reason = first(block, 'Install Reason');
  const explicit =
    source === PackageSource.INSTALLED && reason !== undefined
      ? reason.startsWith('Explicitly')
      : undefined;
  const requiredBy = list(block, 'Required By');
  const optionalFor = list(block, 'Optional For');
  const homepage = first(block, 'URL');

  return {
    name,
    version,
    source,
    repository:
      source === PackageSource.INSTALLED
        ? 'local'
        : first(block, 'Repository') ?? source,
    description: first(block, 'Description') ?? '',
    size: parseSize(first(block, 'Download Size')) ?? installedSize ?? 0,
    installedSize,
    dependencies: list(block, 'Depends On'),
    optionalDependencies: optionalList(block, 'Optional Deps'),
    reverseDependencies: [],
    provides: list(block, 'Provides'),
    conflicts: list(block, 'Conflicts With'),
    licenses: list(block, 'Licenses'),
    homepage: homepage && homepage !== 'None' ? homepage : undefined,
    explicit,
    isOrphan:
      explicit === false && requiredBy.length === 0 && optionalFor.length === 0,
    isOutdated: false,
    lastRefreshed: refreshedAt,
  };
};

const parsePackageInfo = (
  lines: string[],
  source: PackageSource,
  refreshedAt: number = Date.now(),
  onSkip?: (error: ParseError) => void,
): PackageRecord[] => {
  const records: PackageRecord[] = [];
  for (const block of parseInfoBlocks(lines)) {
    try {
      records.push(blockToRecord(block, source, refreshedAt));
    } catch (err) {
      if (err instanceof ParseError) {
        onSkip?.(err);
        continue;
      }
      throw err;
    }
  }
  return records;
};

interface SearchHit {
  repository: string;
  name: string;
  version: string;
  description: string;
  installed: boolean;
}

const SEARCH_HEADER = /^(\S+)\/(\S+)\s+(\S+)(.*)$/;

const parseSearchOutput = (lines: string[]): SearchHit[] => {
  const hits: SearchHit[] = [];
  for (const line of lines) {
    if (line.trim() === '') {
      continue;
    }
    if (/^\s/.test(line)) {
      const last = hits[hits.length - 1];
      if (last && last.description === '') {
        last.description = line.trim();
      }
      continue;
    }
    const match = SEARCH_HEADER.exec(line);
    if (!match) {
      continue;
    }
    hits.push({
      repository: match[1],
      name: match[2],
      version: match[3],
      description: '',
      installed: /\[installed|\(Installed/i.test(match[4]),
    });
  }
  return hits;
};

interface UpgradeLine {
  name: string;
  installedVersion: string;
  availableVersion: string;
  ignored: boolean;
}

const parseUpgradeList = (lines: string[]): UpgradeLine[] =>
  lines
    .map((line) => /^(\S+)\s+(\S+)\s+->\s+(\S+)(.*)$/.exec(line.trim()))
    .filter((match): match is RegExpExecArray => match !== null)
    .map((match) => ({
      name: match[1],
      installedVersion: match[2],
      availableVersion: match[3],
      ignored: match[4].includes('[ignored]'),
    }));

const parseNameList = (lines: string[]): string[] =>
  lines.map((line) => line.trim()).filter((line) => line !== '');

const parsePactree = (lines: string[], root: string): string[] => {
  const names = parseNameList(lines).map((line) => line.split(/\s/)[0]);
  return Array.from(new Set(names.filter((name) => name !== root)));
};

export {
  parseInfoBlocks,
  parseSize,
  parsePackageInfo,
  parseSearchOutput,
  parseUpgradeList,
  parseNameList,
  parsePactree,
  stripConstraint,
};
export type { InfoBlock, SearchHit, UpgradeLine };
