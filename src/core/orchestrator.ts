import { randomUUID } from 'crypto';
import {
    IS_ROOT,
    OPERATION_CONFLICT_POLICY,
    OUTPUT_TAIL_LINES,
} from '../config';
import {
    CredentialDenied,
    ExitError,
    NotFoundError,
    OperationCancelled,
    PackageManagerError,
    UnresolvableConflict,
    ValidationError,
} from '../errors';
import { tagged } from '../logger';
import {
    OperationKind,
    OperationOutcome,
    OperationRequest,
    OutcomeStatus,
    Plan,
    SessionEvent,
    SessionEventType,
    SessionHandle,
    SessionInfo,
    SessionState,
} from '../types';
import {
    CommandContext,
    CommandStep,
    affectedSources,
    buildSteps,
    defaultCommandContext,
    describeRequest,
    isPackageName,
} from './commands';
import { Credential, CredentialBroker } from './credentialBroker';
import { DependencyResolver } from './dependencyResolver';
import { LineClassifier } from './lineClassifier';
import { MetadataCache } from './metadataCache';
import { OperationSession } from './operationSession';
import { CommandRunner, OutputTail, formatCommand } from './processRunner';
import { WriteLock } from './writeLock';

const log = tagged('orchestrator');

type ConflictPolicy = 'queue' | 'reject';

interface OrchestratorOptions {
    runner: CommandRunner;
    resolver: DependencyResolver;
    cache: MetadataCache;
    broker: CredentialBroker;
    lock?: WriteLock;
    policy?: ConflictPolicy;
    context?: CommandContext;
    tailLines?: number;
    newId?: () => string;
}

const AUTH_FAILURE = /incorrect password attempt|Sorry, try again|no password was provided/i;

const TARGETED_KINDS = new Set<OperationKind>([
    OperationKind.INSTALL,
    OperationKind.REINSTALL,
    OperationKind.UPDATE_SELECTED,
    OperationKind.REMOVE,
]);

const validateRequest = (request: OperationRequest): void => {
    if (!Object.values(OperationKind).includes(request.kind)) {
        throw new ValidationError(`Unknown operation kind: ${request.kind}`);
    }
    if (TARGETED_KINDS.has(request.kind)) {
        if (!('targets' in request) || request.targets.length === 0) {
            throw new ValidationError(`${request.kind} needs at least one target`);
        }
        const invalid = request.targets.find((t) => !isPackageName(t.name));
        if (invalid) {
            throw new ValidationError(`Invalid package name: ${JSON.stringify(invalid.name)}`);
        }
    }
};

const summarize = (request: OperationRequest, plan: Plan | undefined): string => {
    const what = describeRequest(request);
    if (!plan) {
        return what;
    }
    const parts: string[] = [];
    if (plan.toInstall.length > 0) {
        parts.push(`${plan.toInstall.length} to install`);
    }
    if (plan.toRemove.length > 0) {
        parts.push(`${plan.toRemove.length} to remove`);
    }
    return parts.length > 0 ? `${what} (${parts.join(', ')})` : what;
};

const toOutcome = (
    err: unknown,
    summary: string,
    tail: string[],
): OperationOutcome => {
    if (err instanceof OperationCancelled || err instanceof CredentialDenied) {
        return {
            status: OutcomeStatus.CANCELLED,
            summary: `${summary}: ${err.message}`,
            code: err.code,
            outputTail: tail,
        };
    }
    if (err instanceof PackageManagerError) {
        let outputTail = tail;
        if (err instanceof ExitError && tail.length === 0) {
            outputTail = err.lastLines;
        } else if (err instanceof UnresolvableConflict && tail.length === 0) {
            outputTail = err.details;
        }
        return {
            status: OutcomeStatus.FAILED,
            summary: `${summary} failed`,
            code: err.code,
            reason: err.message,
            outputTail,
        };
    }
    return {
        status: OutcomeStatus.FAILED,
        summary: `${summary} failed`,
        code: 'internal',
        reason: err instanceof Error ? err.message : String(err),
        outputTail: tail,
    };
};

class Orchestrator {
    private readonly sessions = new Map<string, OperationSession>();
    private readonly runner: CommandRunner;
    private readonly resolver: DependencyResolver;
    private readonly cache: MetadataCache;
    private readonly broker: CredentialBroker;
    private readonly lock: WriteLock;
    private readonly policy: ConflictPolicy;
    private readonly context: CommandContext;
    private readonly tailLines: number;
    private readonly newId: () => string;

    constructor(options: OrchestratorOptions) {
        this.runner = options.runner;
        this.resolver = options.resolver;
        this.cache = options.cache;
        this.broker = options.broker;
        this.lock = options.lock ?? new WriteLock();
        this.policy = options.policy ?? OPERATION_CONFLICT_POLICY;
        this.context = options.context ?? defaultCommandContext(IS_ROOT);
        this.tailLines = options.tailLines ?? OUTPUT_TAIL_LINES;
        this.newId = options.newId ?? randomUUID;
    }

    submit(request: OperationRequest): SessionHandle {
        validateRequest(request);
        const session = new OperationSession(this.newId(), request);
        this.sessions.set(session.id, session);
        log.info(`Session ${session.id}: ${describeRequest(request)}`);
        this.execute(session).catch((err: unknown) => {
            log.error(`Session ${session.id} crashed: ${err}`);
            session.finish(toOutcome(err, describeRequest(request), []));
        });
        return { id: session.id };
    }

    /**
     * Every event of the session in order, live until the outcome. The
     * session is forgotten once a subscriber has consumed its outcome.
     */
    async *subscribe(handle: SessionHandle | string): AsyncGenerator<SessionEvent> {
        const session = this.require(handle);
        for await (const event of session.subscribe()) {
            yield event;
            if (event.type === SessionEventType.OUTCOME) {
                this.sessions.delete(session.id);
            }
        }
    }

    cancel(handle: SessionHandle | string): boolean {
        const session = this.require(handle);
        const cancelled = session.cancel();
        if (cancelled) {
            log.info(`Session ${session.id} cancellation requested`);
        }
        return cancelled;
    }

    get(handle: SessionHandle | string): SessionInfo | undefined {
        return this.sessions.get(this.idOf(handle))?.info();
    }

    list(): SessionInfo[] {
        return Array.from(this.sessions.values()).map((s) => s.info());
    }

    outcome(handle: SessionHandle | string): Promise<OperationOutcome> {
        return this.require(handle).settled();
    }

    get activeSession(): string | undefined {
        return this.lock.owner;
    }

    private idOf(handle: SessionHandle | string): string {
        return typeof handle === 'string' ? handle : handle.id;
    }

    private require(handle: SessionHandle | string): OperationSession {
        const id = this.idOf(handle);
        const session = this.sessions.get(id);
        if (!session) {
            throw new NotFoundError(`Operation ${id} not found`);
        }
        return session;
    }

    private async execute(session: OperationSession): Promise<void> {
        const { request, signal } = session;
        const tail = new OutputTail(this.tailLines);
        let credential: Credential | undefined;
        let plan: Plan | undefined;
        let executed = false;
        let locked = false;
        let outcome: OperationOutcome;

        try {
            if (this.policy === 'reject') {
                this.lock.acquireOrFail(session.id);
            } else if (!this.lock.tryAcquire(session.id)) {
                session.emit({
                    type: SessionEventType.PROGRESS,
                    message: `Waiting for operation ${this.lock.owner} to finish`,
                });
                await this.lock.acquire(session.id, signal);
            }
            locked = true;

            session.transition(SessionState.PLANNING);
            plan = await this.resolver.plan(request, signal);
            session.emit({ type: SessionEventType.PLAN, plan });
            const steps = buildSteps(request, plan, this.context);

            if (steps.length > 0 && this.needsCredential(request, steps)) {
                session.transition(SessionState.AWAITING_CREDENTIAL);
                const prompt = `Authentication is required for: ${describeRequest(request)}`;
                session.emit({ type: SessionEventType.CREDENTIAL_REQUIRED, prompt });
                credential = await this.broker.acquire(session.id, prompt, signal);
            }

            this.throwIfAborted(signal);
            session.transition(SessionState.EXECUTING);
            executed = steps.length > 0;
            await this.runSteps(session, steps, credential, tail);

            outcome = {
                status: OutcomeStatus.SUCCEEDED,
                summary: steps.length > 0
                    ? `${summarize(request, plan)} completed`
                    : `${describeRequest(request)}: nothing to do`,
                outputTail: tail.toArray(),
            };
        } catch (err) {
            outcome = toOutcome(err, summarize(request, plan), tail.toArray());
        }

        try {
            if (executed) {
                session.transition(SessionState.FINALIZING);
            }
            this.broker.release(credential);
            if (executed) {
                for (const source of affectedSources(request)) {
                    this.cache.invalidate(source);
                }
            }
        } finally {
            if (locked) {
                this.lock.release(session.id);
            }
            log.info(`Session ${session.id} ${outcome.status}: ${outcome.summary}`);
            session.finish(outcome);
        }
    }

    private needsCredential(request: OperationRequest, steps: CommandStep[]): boolean {
        if (request.requiresElevation === false) {
            return false;
        }
        return steps.some((step) => step.elevation !== 'none');
    }

    private async runSteps(
        session: OperationSession,
        steps: CommandStep[],
        credential: Credential | undefined,
        tail: OutputTail,
    ): Promise<void> {
        const { signal } = session;
        const classifier = new LineClassifier(steps.length);
        let lastElevated = -1;
        steps.forEach((step, index) => {
            if (step.elevation !== 'none') {
                lastElevated = index;
            }
        });

        for (const [index, step] of steps.entries()) {
            this.throwIfAborted(signal);
            classifier.startStep(index);
            session.emit({
                type: SessionEventType.PROGRESS,
                percent: classifier.percent,
                message: step.description,
            });
            log.verbose(`Session ${session.id} running ${formatCommand(step.command, step.args)}`);

            const elevated = step.elevation !== 'none' && credential !== undefined;
            const status = await this.runner.run(step.command, step.args, {
                input: elevated ? credential?.toInput() : undefined,
                wipeInput: true,
                signal,
                onLine: (stream, line) => {
                    tail.push(line);
                    session.emit(classifier.classify(stream, line));
                },
            });
            if (index === lastElevated) {
                this.broker.release(credential);
            }

            if (status.cancelled) {
                throw new OperationCancelled();
            }
            if (status.code !== 0) {
                if (step.elevation !== 'none' && status.tail.some((l) => AUTH_FAILURE.test(l))) {
                    throw new CredentialDenied('Authentication failed');
                }
                throw new ExitError(
                    formatCommand(step.command, step.args),
                    status.code,
                    status.tail,
                );
            }
            session.emit({
                type: SessionEventType.PROGRESS,
                percent: classifier.completeStep(),
                message: `${step.description}: done`,
            });
        }
    }

    private throwIfAborted(signal: AbortSignal): void {
        if (signal.aborted) {
            throw new OperationCancelled();
        }
    }
}

export { Orchestrator, validateRequest };
export type { OrchestratorOptions, ConflictPolicy };
