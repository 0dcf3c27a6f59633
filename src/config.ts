import dotenv from 'dotenv';
dotenv.config();

const parseIntEnv = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_FILENAME = process.env.LOG_FILENAME ?? 'pacdeck.log.txt';
const HOST = process.env.HOST || '127.0.0.1';
const PORT = parseIntEnv(process.env.PORT, 8000);
const API_TOKEN = process.env.API_TOKEN || '';
const PACMAN_PATH = process.env.PACMAN_PATH || 'pacman';
const PACTREE_PATH = process.env.PACTREE_PATH || 'pactree';
const SUDO_PATH = process.env.SUDO_PATH || 'sudo';
const AUR_HELPER = process.env.AUR_HELPER ?? 'yay';
const AUR_BACKEND: 'helper' | 'rpc' =
  process.env.AUR_BACKEND?.toLowerCase() === 'rpc' ? 'rpc' : 'helper';
const AUR_RPC_URL =
  process.env.AUR_RPC_URL || 'https://aur.archlinux.org/rpc/v5';
const CACHE_STALE_AFTER = parseIntEnv(process.env.CACHE_STALE_AFTER, 1800);
const REFRESH_INTERVAL = parseIntEnv(process.env.REFRESH_INTERVAL, 300);
const QUERY_TIMEOUT = parseIntEnv(process.env.QUERY_TIMEOUT, 60);
const KILL_GRACE_PERIOD = parseIntEnv(process.env.KILL_GRACE_PERIOD, 5000);
const OPERATION_CONFLICT_POLICY: 'queue' | 'reject' =
  process.env.OPERATION_CONFLICT_POLICY?.toLowerCase() === 'reject'
    ? 'reject'
    : 'queue';
const OUTPUT_TAIL_LINES = parseIntEnv(process.env.OUTPUT_TAIL_LINES, 40);
const VERIFY_CREDENTIAL = parseIntEnv(process.env.VERIFY_CREDENTIAL, 1) === 1;
const IS_ROOT = process.getuid?.() === 0;

export {
  parseIntEnv,
  LOG_LEVEL,
  LOG_FILENAME,
  HOST,
  PORT,
  API_TOKEN,
  PACMAN_PATH,
  PACTREE_PATH,
  SUDO_PATH,
  AUR_HELPER,
  AUR_BACKEND,
  AUR_RPC_URL,
  CACHE_STALE_AFTER,
  REFRESH_INTERVAL,
  QUERY_TIMEOUT,
  KILL_GRACE_PERIOD,
  OPERATION_CONFLICT_POLICY,
  OUTPUT_TAIL_LINES,
  VERIFY_CREDENTIAL,
  IS_ROOT,
};
