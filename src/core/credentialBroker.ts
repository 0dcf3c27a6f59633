import { EventEmitter } from 'events';
import { CredentialDenied, OperationCancelled } from '../errors';
import { SUDO_PATH } from '../config';
import { tagged } from '../logger';
import type { CommandRunner } from './processRunner';

const log = tagged('credentials');

/**
 * An elevation secret held only in memory. The bytes are zeroed by
 * `release()`; afterwards every accessor throws.
 */
class Credential {
    private secret: Buffer | null;

    constructor(secret: string | Buffer) {
        this.secret = Buffer.from(secret);
    }

    get released(): boolean {
        return this.secret === null;
    }

    toInput(): Buffer {
        if (!this.secret) {
            throw new CredentialDenied('Credential has been released');
        }
        return Buffer.concat([this.secret, Buffer.from('\n')]);
    }

    release(): void {
        if (this.secret) {
            this.secret.fill(0);
            this.secret = null;
        }
    }

    toJSON(): string {
        return '[credential]';
    }

    toString(): string {
        return '[credential]';
    }
}

interface CredentialRequest {
    sessionId: string;
    prompt: string;
    requestedAt: number;
}

type CredentialVerifier = (
    credential: Credential,
    signal?: AbortSignal,
) => Promise<boolean>;

interface PendingRequest extends CredentialRequest {
    resolve: (credential: Credential) => void;
    reject: (error: Error) => void;
}

const sudoVerifier =
    (runner: CommandRunner, sudoPath: string = SUDO_PATH): CredentialVerifier =>
    async (credential, signal) => {
        const status = await runner.run(sudoPath, ['-S', '-k', '-v', '-p', ''], {
            input: credential.toInput(),
            wipeInput: true,
            signal,
        });
        return status.code === 0 && !status.cancelled;
    };

class CredentialBroker extends EventEmitter {
    private readonly pendingRequests = new Map<string, PendingRequest>();

    constructor(private readonly verifier?: CredentialVerifier) {
        super();
    }

    acquire(
        sessionId: string,
        prompt: string,
        signal?: AbortSignal,
    ): Promise<Credential> {
        if (signal?.aborted) {
            return Promise.reject(new OperationCancelled());
        }
        if (this.pendingRequests.has(sessionId)) {
            return Promise.reject(
                new CredentialDenied(
                    `Session ${sessionId} is already waiting for a credential`,
                ),
            );
        }

        const waiting = new Promise<Credential>((resolve, reject) => {
            const onAbort = () => {
                if (this.pendingRequests.delete(sessionId)) {
                    log.verbose(`Credential request of ${sessionId} cancelled`);
                    reject(new OperationCancelled());
                }
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            const request: PendingRequest = {
                sessionId,
                prompt,
                requestedAt: Date.now(),
                resolve: (credential) => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(credential);
                },
                reject: (error) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(error);
                },
            };
            this.pendingRequests.set(sessionId, request);
        });

        log.verbose(`Session ${sessionId} is waiting for a credential`);
        this.emit('request', { sessionId, prompt, requestedAt: Date.now() });

        return waiting.then((credential) => this.verify(credential, signal));
    }

    supply(sessionId: string, secret: string | Buffer): boolean {
        const request = this.pendingRequests.get(sessionId);
        if (!request) {
            return false;
        }
        this.pendingRequests.delete(sessionId);
        request.resolve(new Credential(secret));
        return true;
    }

    deny(sessionId: string): boolean {
        const request = this.pendingRequests.get(sessionId);
        if (!request) {
            return false;
        }
        this.pendingRequests.delete(sessionId);
        log.info(`Credential request of ${sessionId} was declined`);
        request.reject(new CredentialDenied());
        return true;
    }

    pending(): CredentialRequest[] {
        return Array.from(this.pendingRequests.values()).map(
            ({ sessionId, prompt, requestedAt }) => ({
                sessionId,
                prompt,
                requestedAt,
            }),
        );
    }

    release(credential: Credential | undefined): void {
        credential?.release();
    }

    private async verify(
        credential: Credential,
        signal?: AbortSignal,
    ): Promise<Credential> {
        if (!this.verifier) {
            return credential;
        }
        let accepted = false;
        try {
            accepted = await this.verifier(credential, signal);
        } catch (err) {
            credential.release();
            throw err;
        }
        if (signal?.aborted) {
            credential.release();
            throw new OperationCancelled();
        }
        if (!accepted) {
            credential.release();
            log.warn('Authentication failed');
            throw new CredentialDenied('Authentication failed');
        }
        return credential;
    }
}

export { Credential, CredentialBroker, sudoVerifier };
export type { CredentialRequest, CredentialVerifier };
