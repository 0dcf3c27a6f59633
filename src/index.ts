import refreshLoop from './core';
import createApp from './server';
import logger from './logger';
import { assertPacman, commandExists } from './utils';
import {
    AUR_BACKEND,
    AUR_HELPER,
    AUR_RPC_URL,
    HOST,
    IS_ROOT,
    PACMAN_PATH,
    PACTREE_PATH,
    PORT,
    VERIFY_CREDENTIAL,
} from './config';
import { ProcessRunner } from './core/processRunner';
import { CredentialBroker, sudoVerifier } from './core/credentialBroker';
import { MetadataCache } from './core/metadataCache';
import { QueryEngine } from './core/queryEngine';
import { DependencyResolver } from './core/dependencyResolver';
import { Orchestrator } from './core/orchestrator';
import { defaultCommandContext } from './core/commands';
import {
    AurHelperSource,
    AurRpcSource,
    InstalledSource,
    OfficialSource,
    SourceProvider,
} from './core/sources';

const start = async () => {
    logger.info('Starting pacdeck...');
    const runner = new ProcessRunner();
    await assertPacman(runner, PACMAN_PATH);

    const aurHelper = (await commandExists(runner, AUR_HELPER)) ? AUR_HELPER : '';
    if (!aurHelper) {
        logger.warn(`AUR helper ${AUR_HELPER || '(none)'} not available; AUR operations are disabled.`);
    }
    const paths = { pacman: PACMAN_PATH, aurHelper };

    const providers: SourceProvider[] = [
        new OfficialSource(runner, paths),
        new InstalledSource(runner, paths),
    ];
    if (AUR_BACKEND === 'rpc') {
        providers.push(new AurRpcSource(runner, AUR_RPC_URL, paths));
    } else if (aurHelper) {
        providers.push(new AurHelperSource(runner, paths));
    }

    const cache = new MetadataCache(providers);
    const broker = new CredentialBroker(
        VERIFY_CREDENTIAL && !IS_ROOT ? sudoVerifier(runner) : undefined,
    );
    const resolver = new DependencyResolver(runner, {
        pacman: PACMAN_PATH,
        pactree: PACTREE_PATH,
        aurHelper,
    });
    const orchestrator = new Orchestrator({
        runner,
        resolver,
        cache,
        broker,
        context: { ...defaultCommandContext(IS_ROOT), aurHelper },
    });
    const query = new QueryEngine(cache);

    const app = createApp({ cache, query, resolver, orchestrator, broker });
    const server = app.listen(PORT, HOST, () => {
        logger.info(`Server started on ${HOST}:${PORT}.`);
    });

    const stop = new AbortController();
    const shutdown = () => {
        logger.info('Shutting down...');
        stop.abort();
        server.close();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await refreshLoop(cache, stop.signal);
};

start().catch((err: unknown) => {
    logger.error(`Fatal: ${err instanceof Error ? err.stack : String(err)}`);
    process.exit(1);
});
