import { EventEmitter, once } from 'events';
import {
    OperationOutcome,
    OperationRequest,
    OutcomeStatus,
    SessionEvent,
    SessionEventPayload,
    SessionEventType,
    SessionInfo,
    SessionState,
} from '../types';

const TERMINAL_STATES = new Set<SessionState>([
    SessionState.SUCCEEDED,
    SessionState.FAILED,
    SessionState.CANCELLED,
]);

const terminalState: Record<OutcomeStatus, SessionState> = {
    [OutcomeStatus.SUCCEEDED]: SessionState.SUCCEEDED,
    [OutcomeStatus.FAILED]: SessionState.FAILED,
    [OutcomeStatus.CANCELLED]: SessionState.CANCELLED,
};

class OperationSession {
    readonly startedAt = Date.now();
    private readonly controller = new AbortController();
    private readonly emitter = new EventEmitter();
    private readonly log: SessionEvent[] = [];
    private currentState = SessionState.IDLE;
    private finalOutcome: OperationOutcome | undefined;
    private finishedAt: number | undefined;
    private readonly settledPromise: Promise<OperationOutcome>;
    private settle: (outcome: OperationOutcome) => void = () => undefined;

    constructor(
        readonly id: string,
        readonly request: OperationRequest,
    ) {
        this.emitter.setMaxListeners(0);
        this.settledPromise = new Promise((resolve) => {
            this.settle = resolve;
        });
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    get state(): SessionState {
        return this.currentState;
    }

    get outcome(): OperationOutcome | undefined {
        return this.finalOutcome;
    }

    get finished(): boolean {
        return TERMINAL_STATES.has(this.currentState);
    }

    settled(): Promise<OperationOutcome> {
        return this.settledPromise;
    }

    cancel(): boolean {
        if (this.finished || this.signal.aborted) {
            return false;
        }
        this.controller.abort();
        return true;
    }

    emit(payload: SessionEventPayload): SessionEvent | undefined {
        if (this.finished) {
            return undefined;
        }
        const event: SessionEvent = {
            ...payload,
            sessionId: this.id,
            seq: this.log.length + 1,
            at: Date.now(),
        };
        this.log.push(event);
        this.emitter.emit('event', event);
        return event;
    }

    transition(state: SessionState): void {
        if (this.finished || state === this.currentState) {
            return;
        }
        this.currentState = state;
        this.emit({ type: SessionEventType.STATE, state });
    }

    finish(outcome: OperationOutcome): void {
        if (this.finished) {
            return;
        }
        this.transition(terminalState[outcome.status]);
        this.finalOutcome = outcome;
        this.finishedAt = Date.now();
        const event: SessionEvent = {
            type: SessionEventType.OUTCOME,
            outcome,
            sessionId: this.id,
            seq: this.log.length + 1,
            at: this.finishedAt,
        };
        this.log.push(event);
        this.emitter.emit('event', event);
        this.settle(outcome);
    }

    events(): SessionEvent[] {
        return [...this.log];
    }

    async *subscribe(): AsyncGenerator<SessionEvent> {
        let index = 0;
        for (;;) {
            while (index < this.log.length) {
                const event = this.log[index++];
                yield event;
                if (event.type === SessionEventType.OUTCOME) {
                    return;
                }
            }
            await once(this.emitter, 'event');
        }
    }

    info(): SessionInfo {
        return {
            id: this.id,
            request: this.request,
            state: this.currentState,
            startedAt: this.startedAt,
            endedAt: this.finishedAt,
            outcome: this.finalOutcome,
        };
    }
}

export { OperationSession, TERMINAL_STATES };
