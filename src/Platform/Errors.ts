/**
 * Platform Error Taxonomy
 * Failures of the environment around the kernel: storage and model
 * transport. Kernel rule violations stay KernelErrors.
 */

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata: Record<string, unknown> = {}) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when the environment/platform fails (e.g. storage unreadable).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, underlying?: unknown) {
        super(message, 'INFRASTRUCTURE_FAILURE', { underlying: underlying instanceof Error ? underlying.message : underlying });
    }
}

/**
 * Thrown when a model provider cannot be reached or answers with an error.
 */
export class GenerationServiceError extends PlatformError {
    constructor(message: string, public readonly status?: number, details: Record<string, unknown> = {}) {
        super(message, 'GENERATION_FAILURE', { status, ...details });
    }
}

export class ConfigurationError extends PlatformError {
    constructor(message: string, variable?: string) {
        super(message, 'CONFIGURATION_INVALID', { variable });
    }
}
