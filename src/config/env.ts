import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

loadDotenv();

const booleanString = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),
    DATABASE_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
    DATABASE_CONNECTION_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
    DATABASE_LOGGING: booleanString.default('false'),

    REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
    EVAL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    EVAL_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),
    EVAL_CONCURRENCY: z.coerce.number().int().positive().default(1),

    OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
    LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),

    JOB_REQUIREMENTS_PATH: z.string().min(1).default('config/job-requirements.json'),
    SKILLS_VOCABULARY_PATH: z.string().min(1).default('config/skills-vocabulary.json')
});

export interface DatabaseConfig {
    url: string;
    poolSize: number;
    idleTimeoutMs: number;
    connectionTimeoutMs: number;
    logging: boolean;
}

export interface AppConfig {
    nodeEnv: 'development' | 'production' | 'test';
    port: number;
    logLevel: string;
    database: DatabaseConfig;
    redisUrl: string;
    evaluationQueue: {
        maxAttempts: number;
        backoffMs: number;
        concurrency: number;
    };
    openai: {
        apiKey: string;
        model: string;
        temperature: number;
        maxTokens: number;
    };
    catalogs: {
        jobRequirementsPath: string;
        skillsVocabularyPath: string;
    };
}

function configurationError(issues: z.ZodIssue[]): ConfigurationError {
    const keys = issues.map(issue => issue.path.join('.'));
    return new ConfigurationError(
        `Invalid environment configuration: ${issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')}`,
        { configKey: keys[0], details: { keys } }
    );
}

const databaseEnvSchema = envSchema.pick({
    DATABASE_URL: true,
    DATABASE_POOL_SIZE: true,
    DATABASE_IDLE_TIMEOUT_MS: true,
    DATABASE_CONNECTION_TIMEOUT_MS: true,
    DATABASE_LOGGING: true
});

/**
 * Only the database settings, for tooling that needs nothing else (migrations).
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    const parsed = databaseEnvSchema.safeParse(env);
    if (!parsed.success) {
        throw configurationError(parsed.error.issues);
    }
    return {
        url: parsed.data.DATABASE_URL,
        poolSize: parsed.data.DATABASE_POOL_SIZE,
        idleTimeoutMs: parsed.data.DATABASE_IDLE_TIMEOUT_MS,
        connectionTimeoutMs: parsed.data.DATABASE_CONNECTION_TIMEOUT_MS,
        logging: parsed.data.DATABASE_LOGGING
    };
}

/**
 * Read and validate the process environment.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        throw configurationError(parsed.error.issues);
    }

    const values = parsed.data;

    return {
        nodeEnv: values.NODE_ENV,
        port: values.PORT,
        logLevel: values.LOG_LEVEL,
        database: {
            url: values.DATABASE_URL,
            poolSize: values.DATABASE_POOL_SIZE,
            idleTimeoutMs: values.DATABASE_IDLE_TIMEOUT_MS,
            connectionTimeoutMs: values.DATABASE_CONNECTION_TIMEOUT_MS,
            logging: values.DATABASE_LOGGING
        },
        redisUrl: values.REDIS_URL,
        evaluationQueue: {
            maxAttempts: values.EVAL_MAX_ATTEMPTS,
            backoffMs: values.EVAL_BACKOFF_MS,
            concurrency: values.EVAL_CONCURRENCY
        },
        openai: {
            apiKey: values.OPENAI_API_KEY,
            model: values.LLM_MODEL,
            temperature: values.LLM_TEMPERATURE,
            maxTokens: values.LLM_MAX_TOKENS
        },
        catalogs: {
            jobRequirementsPath: values.JOB_REQUIREMENTS_PATH,
            skillsVocabularyPath: values.SKILLS_VOCABULARY_PATH
        }
    };
}
