import { rootLogger, type Logger } from './log';

export class InvariantViolation extends Error {
    readonly context?: Record<string, unknown>;

    constructor(message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'InvariantViolation';
        this.context = context;
    }
}

type ImportMetaWithEnv = ImportMeta & { env?: { DEV?: boolean } };

const resolveDebugBuild = (): boolean => {
    try {
        return typeof import.meta !== 'undefined' && Boolean((import.meta as ImportMetaWithEnv).env?.DEV);
    } catch {
        return false;
    }
};

export interface InvariantReporter {
    /** Throws in strict mode; logs and returns false otherwise so callers can clamp or no-op. */
    readonly report: (message: string, context?: Record<string, unknown>) => false;
    readonly strict: boolean;
}

export interface InvariantReporterOptions {
    readonly strict?: boolean;
    readonly logger?: Logger;
}

export const createInvariantReporter = (options: InvariantReporterOptions = {}): InvariantReporter => {
    const strict = options.strict ?? resolveDebugBuild();
    const logger = options.logger ?? rootLogger.child('invariant');

    const report: InvariantReporter['report'] = (message, context) => {
        if (strict) {
            throw new InvariantViolation(message, context);
        }
        logger.warn(message, context);
        return false;
    };

    return { report, strict };
};
