import { spawn } from 'child_process';
import { StringDecoder } from 'string_decoder';
import { LaunchError, ExitError } from '../errors';
import { KILL_GRACE_PERIOD, OUTPUT_TAIL_LINES } from '../config';
import { tagged } from '../logger';
import type { OutputStream } from '../types';

const log = tagged('runner');

interface RunOptions {
    input?: Buffer | string;
    wipeInput?: boolean;
    onLine?: (stream: OutputStream, text: string) => void;
    signal?: AbortSignal;
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

interface ExitStatus {
    command: string;
    args: string[];
    code: number | null;
    signal: NodeJS.Signals | null;
    cancelled: boolean;
    timedOut: boolean;
    tail: string[];
}

interface CommandRunner {
    run(
        command: string,
        args?: string[],
        options?: RunOptions,
    ): Promise<ExitStatus>;
}

/** Splits a byte stream into lines on `\n`, `\r\n` or a bare `\r`. */
class LineSplitter {
    private readonly decoder = new StringDecoder('utf8');
    private pending = '';

    push(chunk: Buffer | string): string[] {
        this.pending +=
            typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
        const parts = this.pending.split(/\r\n|\n|\r/);
        this.pending = parts.pop() ?? '';
        return parts;
    }

    flush(): string[] {
        const rest = this.pending + this.decoder.end();
        this.pending = '';
        return rest === '' ? [] : [rest];
    }
}

class OutputTail {
    private readonly lines: string[] = [];

    constructor(private readonly size: number = OUTPUT_TAIL_LINES) {}

    push(line: string): void {
        this.lines.push(line);
        if (this.lines.length > this.size) {
            this.lines.shift();
        }
    }

    toArray(): string[] {
        return [...this.lines];
    }
}

const formatCommand = (command: string, args: string[]): string =>
    [command, ...args].join(' ');

class ProcessRunner implements CommandRunner {
    constructor(
        private readonly graceMs: number = KILL_GRACE_PERIOD,
        private readonly tailSize: number = OUTPUT_TAIL_LINES,
    ) {}

    run(
        command: string,
        args: string[] = [],
        options: RunOptions = {},
    ): Promise<ExitStatus> {
        const printable = formatCommand(command, args);
        const tail = new OutputTail(this.tailSize);

        if (options.signal?.aborted) {
            return Promise.resolve({
                command,
                args,
                code: null,
                signal: null,
                cancelled: true,
                timedOut: false,
                tail: [],
            });
        }

        return new Promise((resolve, reject) => {
            log.verbose(`Running: ${printable}`);
            const child = spawn(command, args, {
                cwd: options.cwd,
                env: { ...process.env, LC_ALL: 'C', ...options.env },
                stdio: ['pipe', 'pipe', 'pipe'],
            });

            let settled = false;
            let cancelled = false;
            let timedOut = false;
            let killTimer: NodeJS.Timeout | undefined;
            let timeoutTimer: NodeJS.Timeout | undefined;

            const terminate = () => {
                if (killTimer) {
                    return;
                }
                child.kill('SIGTERM');
                killTimer = setTimeout(() => {
                    log.warn(`Forcing termination of: ${printable}`);
                    child.kill('SIGKILL');
                }, this.graceMs);
            };

            const onAbort = () => {
                cancelled = true;
                log.verbose(`Cancelling: ${printable}`);
                terminate();
            };
            options.signal?.addEventListener('abort', onAbort, { once: true });

            if (options.timeoutMs) {
                timeoutTimer = setTimeout(() => {
                    timedOut = true;
                    log.warn(`Timed out after ${options.timeoutMs}ms: ${printable}`);
                    terminate();
                }, options.timeoutMs);
            }

            const cleanup = () => {
                options.signal?.removeEventListener('abort', onAbort);
                if (killTimer) {
                    clearTimeout(killTimer);
                }
                if (timeoutTimer) {
                    clearTimeout(timeoutTimer);
                }
            };

            const emit = (stream: OutputStream, line: string) => {
                tail.push(line);
                log.debug(`${stream}: ${line}`);
                options.onLine?.(stream, line);
            };

            const splitters: Record<OutputStream, LineSplitter> = {
                stdout: new LineSplitter(),
                stderr: new LineSplitter(),
            };
            child.stdout?.on('data', (chunk: Buffer) => {
                splitters.stdout
                    .push(chunk)
                    .forEach((line) => emit('stdout', line));
            });
            child.stderr?.on('data', (chunk: Buffer) => {
                splitters.stderr
                    .push(chunk)
                    .forEach((line) => emit('stderr', line));
            });

            child.on('error', (error: Error) => {
                if (settled) {
                    return;
                }
                settled = true;
                cleanup();
                reject(new LaunchError(command, error));
            });

            child.on(
                'close',
                (code: number | null, signal: NodeJS.Signals | null) => {
                    if (settled) {
                        return;
                    }
                    settled = true;
                    cleanup();
                    splitters.stdout.flush().forEach((line) => emit('stdout', line));
                    splitters.stderr.flush().forEach((line) => emit('stderr', line));
                    log.verbose(
                        `Finished (code ${code}, signal ${signal}): ${printable}`,
                    );
                    resolve({
                        command,
                        args,
                        code,
                        signal,
                        cancelled,
                        timedOut,
                        tail: tail.toArray(),
                    });
                },
            );

            const stdin = child.stdin;
            if (stdin) {
                // a child that exits before reading its input closes the pipe
                stdin.on('error', (error: Error) => {
                    log.debug(`stdin closed early: ${error.message}`);
                });
                const input = options.input;
                if (input !== undefined) {
                    stdin.write(input, () => {
                        if (options.wipeInput && Buffer.isBuffer(input)) {
                            input.fill(0);
                        }
                    });
                }
                stdin.end();
            }
        });
    }
}

const ensureSuccess = (status: ExitStatus): ExitStatus => {
    if (status.code !== 0) {
        throw new ExitError(
            formatCommand(status.command, status.args),
            status.code,
            status.tail,
        );
    }
    return status;
};

interface CapturedOutput {
    status: ExitStatus;
    stdout: string[];
    stderr: string[];
}

const captureOutput = async (
    runner: CommandRunner,
    command: string,
    args: string[] = [],
    options: Omit<RunOptions, 'onLine'> = {},
): Promise<CapturedOutput> => {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const status = await runner.run(command, args, {
        ...options,
        onLine: (stream, text) => {
            (stream === 'stdout' ? stdout : stderr).push(text);
        },
    });
    return { status, stdout, stderr };
};

export {
    ProcessRunner,
    LineSplitter,
    OutputTail,
    ensureSuccess,
    captureOutput,
    formatCommand,
};
export type { CommandRunner, RunOptions, ExitStatus, CapturedOutput };
