export class StepwiseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StepwiseError';
    }
}

export class ConfigError extends StepwiseError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

export class PipelineStateError extends StepwiseError {
    constructor(message: string) {
        super(message);
        this.name = 'PipelineStateError';
    }
}

export class LockTimeoutError extends StepwiseError {
    constructor(resource: string, timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms waiting for the ${resource} lock.`);
        this.name = 'LockTimeoutError';
    }
}

/**
 * Render an unknown thrown value as a log-friendly message.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
