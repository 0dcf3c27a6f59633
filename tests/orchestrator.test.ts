import os from 'os';
import path from 'path';
import fse from 'fs-extra';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { CommandContext } from '../src/core/commands';
import { Credential, CredentialBroker } from '../src/core/credentialBroker';
import { DependencyResolver } from '../src/core/dependencyResolver';
import { MetadataCache, isOutdated } from '../src/core/metadataCache';
import { Orchestrator, OrchestratorOptions } from '../src/core/orchestrator';
import { ValidationError } from '../src/errors';
import {
    OperationKind,
    OperationRequest,
    OutcomeStatus,
    PackageSource,
    SessionEvent,
    SessionEventType,
    SessionState,
} from '../src/types';
import { FakeRunner, deferred } from './helpers/fakeRunner';
import { StaticProvider } from './helpers/providers';
import { installed, official } from './helpers/records';

const root: CommandContext = { pacman: 'pacman', sudo: 'sudo', aurHelper: 'yay', isRoot: true };
const user: CommandContext = { ...root, isRoot: false };
const paths = { pacman: 'pacman', pactree: 'pactree', aurHelper: 'yay' };

const install = (name: string): OperationRequest => ({
    kind: OperationKind.INSTALL,
    targets: [{ name, source: PackageSource.OFFICIAL }],
});

const setup = async (runner: FakeRunner, options: Partial<OrchestratorOptions> = {}) => {
    const providers = {
        official: new StaticProvider(PackageSource.OFFICIAL, [
            official('firefox', '128.0-1'),
            official('vlc', '3.0.21-1'),
        ]),
        installed: new StaticProvider(PackageSource.INSTALLED, [installed('firefox', '127.0-1')]),
        aur: new StaticProvider(PackageSource.AUR, []),
    };
    const cache = new MetadataCache(Object.values(providers));
    await cache.refreshStale();
    const broker = new CredentialBroker();
    let counter = 0;
    const orchestrator = new Orchestrator({
        runner,
        resolver: new DependencyResolver(runner, paths),
        cache,
        broker,
        policy: 'queue',
        context: root,
        newId: () => `op-${++counter}`,
        ...options,
    });
    return { orchestrator, cache, broker, providers };
};

const collect = async (
    orchestrator: Orchestrator,
    id: string,
    onEvent: (event: SessionEvent) => void = () => undefined,
): Promise<SessionEvent[]> => {
    const events: SessionEvent[] = [];
    for await (const event of orchestrator.subscribe(id)) {
        events.push(event);
        onEvent(event);
    }
    return events;
};

const states = (events: SessionEvent[]): SessionState[] =>
    events.flatMap((e) => (e.type === SessionEventType.STATE ? [e.state] : []));

const installRunner = () =>
    new FakeRunner()
        .when('--print', { stdout: ['firefox 128.0-1'] })
        .when('-S --noconfirm', { stdout: [':: Retrieving packages...', '(1/1) installing firefox'] });

afterEach(() => {
    vi.restoreAllMocks();
});

describe('Orchestrator', () => {
    it('runs an install through every phase and replays it to a late subscriber', async () => {
        const runner = installRunner();
        const { orchestrator, cache } = await setup(runner);
        const { id } = orchestrator.submit(install('firefox'));

        const outcome = await orchestrator.outcome(id);
        const events = await collect(orchestrator, id);

        expect(outcome).toEqual({
            status: OutcomeStatus.SUCCEEDED,
            summary: 'Install of firefox (1 to install) completed',
            outputTail: [':: Retrieving packages...', '(1/1) installing firefox'],
        });
        expect(states(events)).toEqual([
            SessionState.PLANNING,
            SessionState.EXECUTING,
            SessionState.FINALIZING,
            SessionState.SUCCEEDED,
        ]);
        expect(events.map((e) => e.seq)).toEqual(events.map((_, i) => i + 1));
        expect(events[events.length - 1].type).toBe(SessionEventType.OUTCOME);
        const percents = events.flatMap((e) =>
            e.type === SessionEventType.PROGRESS && e.percent !== undefined ? [e.percent] : [],
        );
        expect(percents).toEqual([0, 30, 95, 100]);
        expect(runner.commands()).toEqual([
            'pacman -S --print --print-format %n %v firefox',
            'pacman -S --noconfirm firefox',
        ]);
        expect(cache.isStale(PackageSource.INSTALLED)).toBe(true);
        expect(orchestrator.get(id)).toBeUndefined();
    });

    it('fails on an unresolvable conflict without touching the system or the cache', async () => {
        const runner = new FakeRunner().when('--print', {
            code: 1,
            stderr: [":: unable to satisfy dependency 'libbar>=2' required by firefox"],
        });
        const { orchestrator, cache } = await setup(runner);
        const before = cache.snapshot(PackageSource.INSTALLED);

        const { id } = orchestrator.submit(install('firefox'));
        const events = await collect(orchestrator, id);

        expect(states(events)).toEqual([SessionState.PLANNING, SessionState.FAILED]);
        expect(events[events.length - 1]).toMatchObject({
            type: SessionEventType.OUTCOME,
            outcome: {
                status: OutcomeStatus.FAILED,
                code: 'conflict',
                outputTail: ["unable to satisfy dependency 'libbar>=2' required by firefox"],
            },
        });
        expect(runner.commands()).toHaveLength(1);
        expect(cache.isStale(PackageSource.INSTALLED)).toBe(false);
        expect(cache.snapshot(PackageSource.INSTALLED)).toBe(before);
    });

    it('cancels an install whose process is running', async () => {
        const started = deferred<void>();
        const runner = new FakeRunner()
            .when('--print', { stdout: ['firefox 128.0-1'] })
            .when('-S --noconfirm', () => {
                started.resolve();
                return { hang: true };
            });
        const { orchestrator, cache } = await setup(runner);
        const { id } = orchestrator.submit(install('firefox'));

        await started.promise;
        expect(orchestrator.get(id)?.state).toBe(SessionState.EXECUTING);
        expect(orchestrator.cancel(id)).toBe(true);

        const outcome = await orchestrator.outcome(id);
        expect(outcome).toMatchObject({ status: OutcomeStatus.CANCELLED, code: 'cancelled' });
        expect(cache.get('firefox')?.installed?.version).toBe('127.0-1');
        expect(orchestrator.cancel(id)).toBe(false);
    });

    it('updates everything and clears the outdated flags', async () => {
        const runner = new FakeRunner()
            .when('pacman -Su --print', { stdout: ['firefox 128.0-1'] })
            .when('yay -Qua', { code: 1 });
        const { orchestrator, cache, providers } = await setup(runner);
        runner.when('-Syu', () => {
            providers.installed.records = [installed('firefox', '128.0-1')];
            return { stdout: ['(1/1) upgrading firefox'] };
        });
        expect(isOutdated(cache.snapshots(), 'firefox')).toBe(true);

        const { id } = orchestrator.submit({ kind: OperationKind.UPDATE_ALL });
        const outcome = await orchestrator.outcome(id);

        expect(outcome.status).toBe(OutcomeStatus.SUCCEEDED);
        expect(runner.commands().slice(2)).toEqual([
            'pacman -Syu --noconfirm',
            'yay -Sua --noconfirm',
        ]);
        for (const source of Object.values(PackageSource)) {
            expect(cache.isStale(source)).toBe(true);
            await cache.ensureFresh(source);
        }
        expect(isOutdated(cache.snapshots(), 'firefox')).toBe(false);
    });

    it('reports a failing step with the tool output', async () => {
        const runner = new FakeRunner()
            .when('--print', { stdout: ['firefox 128.0-1'] })
            .when('-S --noconfirm', {
                code: 1,
                stderr: ['error: failed to commit transaction (conflicting files)'],
            });
        const { orchestrator, cache } = await setup(runner);
        const { id } = orchestrator.submit(install('firefox'));

        expect(await orchestrator.outcome(id)).toEqual({
            status: OutcomeStatus.FAILED,
            summary: 'Install of firefox (1 to install) failed',
            code: 'exit',
            reason: 'pacman -S --noconfirm firefox exited with code 1',
            outputTail: ['error: failed to commit transaction (conflicting files)'],
        });
        expect(cache.isStale(PackageSource.INSTALLED)).toBe(true);
    });

    it('fails a local install of a missing file before launching anything', async () => {
        const runner = new FakeRunner();
        const { orchestrator } = await setup(runner);
        const { id } = orchestrator.submit({
            kind: OperationKind.INSTALL_LOCAL_FILE,
            filePath: '/nonexistent/foo-1.0-1-x86_64.pkg.tar.zst',
        });

        expect(await orchestrator.outcome(id)).toMatchObject({
            status: OutcomeStatus.FAILED,
            code: 'validation',
        });
        expect(runner.calls).toEqual([]);
    });

    it('rejects requests without targets', async () => {
        const { orchestrator } = await setup(new FakeRunner());
        expect(() => orchestrator.submit({ kind: OperationKind.INSTALL, targets: [] })).toThrow(ValidationError);
    });

    it('rejects target names that pacman would read as options', async () => {
        const runner = new FakeRunner();
        const { orchestrator } = await setup(runner);
        expect(() => orchestrator.submit(install('--hookdir=/tmp/hooks'))).toThrow(
            'Invalid package name: "--hookdir=/tmp/hooks"',
        );
        expect(() => orchestrator.submit(install('.hidden'))).toThrow(ValidationError);
        expect(orchestrator.list()).toEqual([]);
        expect(runner.calls).toEqual([]);
    });

    it('installs a local file by its resolved path', async () => {
        const workdir = await fse.mkdtemp(path.join(os.tmpdir(), 'local-install-'));
        const archive = path.join(workdir, '-evil-1.0-1-any.pkg.tar.zst');
        await fse.writeFile(archive, 'archive');
        vi.spyOn(process, 'cwd').mockReturnValue(workdir);
        const runner = new FakeRunner().when('pacman -U --print', { stdout: ['evil 1.0-1'] });
        const { orchestrator } = await setup(runner);

        const { id } = orchestrator.submit({
            kind: OperationKind.INSTALL_LOCAL_FILE,
            filePath: '-evil-1.0-1-any.pkg.tar.zst',
        });
        const outcome = await orchestrator.outcome(id);
        await fse.remove(workdir);

        expect(outcome.status).toBe(OutcomeStatus.SUCCEEDED);
        expect(runner.commands()).toEqual([
            `pacman -U --print --print-format %n %v ${archive}`,
            `pacman -U --noconfirm ${archive}`,
        ]);
    });
});

describe('Orchestrator credentials', () => {
    it('feeds the credential to the elevated step and releases it', async () => {
        const release = vi.spyOn(Credential.prototype, 'release');
        const runner = installRunner();
        const { orchestrator, broker } = await setup(runner, { context: user });
        const { id } = orchestrator.submit(install('firefox'));

        const events = await collect(orchestrator, id, (event) => {
            if (event.type === SessionEventType.CREDENTIAL_REQUIRED) {
                broker.supply(id, 'test-secret');
            }
        });

        expect(states(events)).toEqual([
            SessionState.PLANNING,
            SessionState.AWAITING_CREDENTIAL,
            SessionState.EXECUTING,
            SessionState.FINALIZING,
            SessionState.SUCCEEDED,
        ]);
        const step = runner.calls[1];
        expect(step.line).toBe('sudo -S -k -p  pacman -S --noconfirm firefox');
        expect(step.input).toBe('test-secret\n');
        const fed = step.options.input;
        expect(Buffer.isBuffer(fed) && fed.every((byte) => byte === 0)).toBe(true);
        expect(release).toHaveBeenCalled();
        expect(broker.pending()).toEqual([]);
    });

    it('treats a declined credential as a cancellation', async () => {
        const runner = installRunner();
        const { orchestrator, broker, cache } = await setup(runner, { context: user });
        const { id } = orchestrator.submit(install('firefox'));

        const events = await collect(orchestrator, id, (event) => {
            if (event.type === SessionEventType.CREDENTIAL_REQUIRED) {
                broker.deny(id);
            }
        });

        expect(events[events.length - 1]).toMatchObject({
            outcome: { status: OutcomeStatus.CANCELLED, code: 'credential-denied' },
        });
        expect(runner.commands()).toHaveLength(1);
        expect(cache.isStale(PackageSource.INSTALLED)).toBe(false);
    });

    it('cancels immediately while waiting for a credential', async () => {
        const runner = installRunner();
        const { orchestrator, broker } = await setup(runner, { context: user });
        const { id } = orchestrator.submit(install('firefox'));

        const events = await collect(orchestrator, id, (event) => {
            if (event.type === SessionEventType.CREDENTIAL_REQUIRED) {
                orchestrator.cancel(id);
            }
        });

        expect(states(events)).toEqual([
            SessionState.PLANNING,
            SessionState.AWAITING_CREDENTIAL,
            SessionState.CANCELLED,
        ]);
        expect(broker.pending()).toEqual([]);
        expect(runner.commands()).toHaveLength(1);
    });

    it('reports a rejected password as a cancellation', async () => {
        const runner = new FakeRunner()
            .when('--print', { stdout: ['firefox 128.0-1'] })
            .when('-S --noconfirm', { code: 1, stderr: ['sudo: 1 incorrect password attempt'] });
        const { orchestrator, broker } = await setup(runner, { context: user });
        const { id } = orchestrator.submit(install('firefox'));

        const events = await collect(orchestrator, id, (event) => {
            if (event.type === SessionEventType.CREDENTIAL_REQUIRED) {
                broker.supply(id, 'wrong-secret');
            }
        });
        expect(events[events.length - 1]).toMatchObject({
            outcome: { status: OutcomeStatus.CANCELLED, code: 'credential-denied' },
        });
    });
});

describe('Orchestrator serialization', () => {
    it('queues a second mutation until the first has finished', async () => {
        const gate = deferred<void>();
        const started = deferred<void>();
        let active = 0;
        let maxActive = 0;
        const runner = new FakeRunner()
            .when('--print', { stdout: ['pkg 1.0-1'] })
            .when('-S --noconfirm', async () => {
                active++;
                maxActive = Math.max(maxActive, active);
                started.resolve();
                await gate.promise;
                active--;
                return {};
            });
        const { orchestrator } = await setup(runner);

        const first = orchestrator.submit(install('firefox'));
        const second = orchestrator.submit(install('vlc'));
        await started.promise;

        expect(orchestrator.activeSession).toBe(first.id);
        expect(orchestrator.get(second.id)?.state).toBe(SessionState.IDLE);
        gate.resolve();

        const outcomes = await Promise.all([orchestrator.outcome(first), orchestrator.outcome(second)]);
        expect(outcomes.map((o) => o.status)).toEqual([OutcomeStatus.SUCCEEDED, OutcomeStatus.SUCCEEDED]);
        expect(maxActive).toBe(1);
        expect(runner.commands().filter((c) => c.includes('--noconfirm'))).toEqual([
            'pacman -S --noconfirm firefox',
            'pacman -S --noconfirm vlc',
        ]);
        const waiting = await collect(orchestrator, second.id);
        expect(waiting[0]).toMatchObject({
            type: SessionEventType.PROGRESS,
            message: `Waiting for operation ${first.id} to finish`,
        });
    });

    it('fails the second mutation with OperationInProgress in reject mode', async () => {
        const gate = deferred<void>();
        const runner = new FakeRunner()
            .when('--print', { stdout: ['pkg 1.0-1'] })
            .when('-S --noconfirm', async () => {
                await gate.promise;
                return {};
            });
        const { orchestrator } = await setup(runner, { policy: 'reject' });

        const first = orchestrator.submit(install('firefox'));
        const second = orchestrator.submit(install('vlc'));

        expect(await orchestrator.outcome(second)).toMatchObject({
            status: OutcomeStatus.FAILED,
            code: 'in-progress',
        });
        gate.resolve();
        expect((await orchestrator.outcome(first)).status).toBe(OutcomeStatus.SUCCEEDED);
    });

    it('cancels a queued session without running it', async () => {
        const gate = deferred<void>();
        const runner = new FakeRunner()
            .when('--print', { stdout: ['pkg 1.0-1'] })
            .when('-S --noconfirm', async () => {
                await gate.promise;
                return {};
            });
        const { orchestrator } = await setup(runner);

        const first = orchestrator.submit(install('firefox'));
        const second = orchestrator.submit(install('vlc'));
        orchestrator.cancel(second);

        expect((await orchestrator.outcome(second)).status).toBe(OutcomeStatus.CANCELLED);
        gate.resolve();
        await orchestrator.outcome(first);
        expect(runner.commands().some((c) => c.includes('vlc'))).toBe(false);
    });
});
