import { z } from 'zod';
import { LogLevel, parseLogLevel } from './kernel-core/L0/Logger.js';
import type { AuthorityThresholds } from './kernel-core/L4/Authority.js';
import { DEFAULT_OPENROUTER_BASE_URL } from './infrastructure/generation/OpenRouterGenerationService.js';
import { ConfigurationError } from './Platform/Errors.js';

const optionalText = z.preprocess(v => (typeof v === 'string' && v.trim() === '' ? undefined : v), z.string().trim().optional());
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    DATABASE_PATH: z.string().min(1).default('regency.db'),
    OPENROUTER_API_KEY: optionalText,
    OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_OPENROUTER_BASE_URL),
    ADVISOR_MODEL: optionalText,
    ORCHESTRATOR_MODEL: optionalText,
    MAJOR_DELTA_THRESHOLD: z.coerce.number().nonnegative().default(100),
    MAJOR_ORDER_DAYS: positiveInt(30),
    MAX_ADVANCE_DAYS: positiveInt(30),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface AppConfig {
    port: number;
    databasePath: string;
    openRouter?: {
        apiKey: string;
        baseUrl: string;
        advisorModel?: string;
        orchestratorModel?: string;
    };
    thresholds: AuthorityThresholds;
    logLevel: LogLevel;
}

/** Reads configuration from the environment; invalid values fail at startup. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const variable = issue?.path.join('.');
        throw new ConfigurationError(`Invalid configuration: ${variable ?? 'env'}: ${issue?.message ?? 'invalid'}`, variable);
    }
    const e = parsed.data;

    const config: AppConfig = {
        port: e.PORT,
        databasePath: e.DATABASE_PATH,
        thresholds: {
            majorDeltaThreshold: e.MAJOR_DELTA_THRESHOLD,
            majorOrderDays: e.MAJOR_ORDER_DAYS,
            maxAdvanceDays: e.MAX_ADVANCE_DAYS
        },
        logLevel: parseLogLevel(e.LOG_LEVEL)
    };
    if (e.OPENROUTER_API_KEY) {
        config.openRouter = {
            apiKey: e.OPENROUTER_API_KEY,
            baseUrl: e.OPENROUTER_BASE_URL,
            advisorModel: e.ADVISOR_MODEL,
            orchestratorModel: e.ORCHESTRATOR_MODEL
        };
    }
    return config;
}
