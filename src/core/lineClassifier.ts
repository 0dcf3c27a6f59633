import { OutputStream, SessionEventPayload, SessionEventType } from '../types';

interface Phase {
    pattern: RegExp;
    percent: number;
}

// pacman transaction phases in the order they are printed
const PHASES: Phase[] = [
    { pattern: /resolving dependencies|synchronizing package databases/i, percent: 10 },
    { pattern: /looking for conflicting packages|starting full system upgrade/i, percent: 15 },
    { pattern: /retrieving packages|downloading/i, percent: 30 },
    { pattern: /checking keys in keyring|checking keyring/i, percent: 50 },
    { pattern: /checking package integrity/i, percent: 55 },
    { pattern: /loading package files/i, percent: 60 },
    { pattern: /checking for file conflicts/i, percent: 65 },
    { pattern: /checking available disk space/i, percent: 70 },
    { pattern: /processing package changes/i, percent: 75 },
    { pattern: /running post-transaction hooks/i, percent: 95 },
];

const COUNTER = /^\(\s*(\d+)\/(\d+)\)\s+(\S+)\s*(.*)$/;
const TRANSACTION_VERBS = new Set([
    'installing',
    'upgrading',
    'reinstalling',
    'downgrading',
    'removing',
]);

const CHANGES_START = 75;
const CHANGES_SPAN = 20;

const phasePercent = (line: string): number | undefined => {
    const counter = COUNTER.exec(line);
    if (counter && TRANSACTION_VERBS.has(counter[3].toLowerCase())) {
        const index = parseInt(counter[1]);
        const total = parseInt(counter[2]);
        if (total > 0) {
            return CHANGES_START + Math.floor((CHANGES_SPAN * index) / total);
        }
    }
    const text = counter ? counter[4] || counter[3] : line;
    return PHASES.find((phase) => phase.pattern.test(text) || phase.pattern.test(line))
        ?.percent;
};

class LineClassifier {
    private stepIndex = 0;
    private lastPercent = 0;

    constructor(private readonly totalSteps: number = 1) {}

    startStep(index: number): void {
        this.stepIndex = index;
    }

    get percent(): number {
        return this.lastPercent;
    }

    classify(stream: OutputStream, line: string): SessionEventPayload {
        const text = line.trim();
        const local = stream === 'stdout' ? phasePercent(text) : undefined;
        if (local !== undefined) {
            return {
                type: SessionEventType.PROGRESS,
                percent: this.advance(local),
                message: text,
            };
        }
        // AUR helper and makepkg stage markers
        if (/^(==>|:: )/.test(text)) {
            return {
                type: SessionEventType.PROGRESS,
                message: text.replace(/^(==>|::)\s*/, ''),
            };
        }
        return { type: SessionEventType.LOG, stream, message: line };
    }

    completeStep(): number {
        return this.advance(100);
    }

    private advance(local: number): number {
        const steps = Math.max(this.totalSteps, 1);
        const overall = Math.floor((this.stepIndex * 100 + local) / steps);
        this.lastPercent = Math.max(this.lastPercent, Math.min(overall, 100));
        return this.lastPercent;
    }
}

export { LineClassifier, phasePercent };
