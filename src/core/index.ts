import { REFRESH_INTERVAL } from '../config';
import { tagged } from '../logger';
import { MetadataCache } from './metadataCache';
import { waitSeconds } from './utils';

const log = tagged('refresh');

const refreshLoop = async (
  cache: MetadataCache,
  signal: AbortSignal,
  intervalSeconds: number = REFRESH_INTERVAL,
): Promise<void> => {
  while (!signal.aborted) {
    log.verbose('Refreshing stale sources...');
    await cache.refreshStale(signal);
    log.verbose('Going to sleep...');
    await waitSeconds(intervalSeconds, signal);
  }
  log.verbose('Refresh loop stopped');
};

export default refreshLoop;
