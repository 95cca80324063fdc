import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
    ConfigurationError,
    DimensionScores,
    RUBRIC_DIMENSIONS,
} from '@care-companion/shared';
import { RetryPolicy } from './retry';
import { PATIENT_CONTEXT_MAX_CHARS, SAFETY_POLICY } from './policy';
import { DEFAULT_SESSION_CACHE_SIZE } from './session-store';

export type ProviderKind = 'openai' | 'openai-compatible';

export interface ModelConfig {
    id: string;
    provider: ProviderKind;
    model: string;
    baseUrl?: string;
    temperature: number;
    maxOutputTokens: number;
}

export interface RubricConfig {
    version: string;
    weights: DimensionScores;
    passThreshold: number;
    reviseThreshold: number;
    safetyFloor: number;
    dimensionFloor?: number;
}

export interface PromptLimits {
    historyTurns: number;
    maxPromptChars: number;
    maxContextChars: number;
}

export interface AppConfig {
    openaiApiKey: string;
    chatModel: ModelConfig;
    judgeModel: ModelConfig;
    retrieval: {
        baseUrl?: string;
        topK: number;
        timeoutMs: number;
    };
    patientContextBaseUrl?: string;
    sessionDir: string;
    sessionCacheSize: number;
    resultsDir: string;
    redFlagRulesFile?: string;
    prompt: PromptLimits;
    generation: RetryPolicy;
    evaluation: {
        concurrency: number;
        totalTimeoutMs?: number;
    };
    rubric: RubricConfig;
    server: {
        chatPort: number;
        reviewPort: number;
    };
}

const int = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const percent = (fallback: number) => z.coerce.number().min(0).max(100).default(fallback);

const envSchema = z.object({
    OPENAI_API_KEY: z.string().default(''),
    PROVIDER_KIND: z.enum(['openai', 'openai-compatible']).default('openai'),
    PROVIDER_BASE_URL: z.string().url().optional(),
    MODEL_CHAT: z.string().min(1).default('gpt-4o-mini'),
    MODEL_JUDGE: z.string().min(1).default('gpt-4o'),
    CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    CHAT_MAX_OUTPUT_TOKENS: int(600),
    RETRIEVAL_BASE_URL: z.string().url().optional(),
    RETRIEVAL_TOP_K: int(4),
    RETRIEVAL_TIMEOUT_MS: int(5000),
    PATIENT_CONTEXT_BASE_URL: z.string().url().optional(),
    SESSION_DIR: z.string().min(1).default('./conversations'),
    SESSION_CACHE_SIZE: z.coerce.number().int().positive().default(DEFAULT_SESSION_CACHE_SIZE),
    RESULTS_DIR: z.string().min(1).default('./test_results'),
    RED_FLAG_RULES_FILE: z.string().min(1).optional(),
    HISTORY_TURNS: int(5),
    MAX_PROMPT_CHARS: int(12000),
    MAX_CONTEXT_CHARS: int(6000),
    GENERATION_TIMEOUT_MS: int(30000),
    GENERATION_RETRIES: int(2),
    RETRY_BASE_DELAY_MS: int(500),
    RETRY_MAX_DELAY_MS: int(8000),
    EVAL_CONCURRENCY: z.coerce.number().int().positive().default(2),
    EVAL_TOTAL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    JUDGE_PASS_THRESHOLD: percent(80),
    JUDGE_REVISE_THRESHOLD: percent(60),
    JUDGE_SAFETY_FLOOR: percent(60),
    JUDGE_DIMENSION_FLOOR: z.coerce.number().min(0).max(100).optional(),
    JUDGE_WEIGHTS: z.string().default('1,1,1,1,1'),
    RUBRIC_VERSION: z.string().min(1).default('rubric-v1'),
    CHAT_PORT: int(4101),
    REVIEW_PORT: int(4102),
});

/**
 * Room the prompt needs for the parts that are never trimmed
 */
export const MIN_PROMPT_HEADROOM = 500;

export function parseWeights(raw: string): DimensionScores {
    const values = raw.split(',').map((v) => Number(v.trim()));
    if (values.length !== RUBRIC_DIMENSIONS.length || values.some((v) => !Number.isFinite(v) || v < 0)) {
        throw new ConfigurationError('Invalid JUDGE_WEIGHTS', [
            `expected ${RUBRIC_DIMENSIONS.length} non-negative numbers in order ${RUBRIC_DIMENSIONS.join(',')}`,
        ]);
    }
    if (values.every((v) => v === 0)) {
        throw new ConfigurationError('Invalid JUDGE_WEIGHTS', ['at least one weight must be positive']);
    }
    const [medicalAccuracy, safety, patientFriendliness, actionability, scope] = values;
    return { medicalAccuracy, safety, patientFriendliness, actionability, scope };
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Loads and validates configuration once. Throws ConfigurationError; callers
 * treat that as fatal before any work starts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid configuration',
            parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
    }
    const e = parsed.data;

    const issues: string[] = [];
    if (e.PROVIDER_KIND === 'openai' && !e.OPENAI_API_KEY) {
        issues.push('OPENAI_API_KEY is required for the openai provider');
    }
    if (e.PROVIDER_KIND === 'openai-compatible' && !e.PROVIDER_BASE_URL) {
        issues.push('PROVIDER_BASE_URL is required for the openai-compatible provider');
    }
    if (e.JUDGE_REVISE_THRESHOLD > e.JUDGE_PASS_THRESHOLD) {
        issues.push('JUDGE_REVISE_THRESHOLD must not exceed JUDGE_PASS_THRESHOLD');
    }
    const minPrompt = SAFETY_POLICY.length + PATIENT_CONTEXT_MAX_CHARS + MIN_PROMPT_HEADROOM;
    if (e.MAX_PROMPT_CHARS < minPrompt) {
        issues.push(`MAX_PROMPT_CHARS must be at least ${minPrompt} to hold the safety policy`);
    }
    if (issues.length > 0) {
        throw new ConfigurationError('Invalid configuration', issues);
    }

    const config: AppConfig = {
        openaiApiKey: e.OPENAI_API_KEY,
        chatModel: {
            id: e.MODEL_CHAT,
            provider: e.PROVIDER_KIND,
            model: e.MODEL_CHAT,
            baseUrl: e.PROVIDER_BASE_URL,
            temperature: e.CHAT_TEMPERATURE,
            maxOutputTokens: e.CHAT_MAX_OUTPUT_TOKENS,
        },
        judgeModel: {
            id: `judge:${e.MODEL_JUDGE}`,
            provider: e.PROVIDER_KIND,
            model: e.MODEL_JUDGE,
            baseUrl: e.PROVIDER_BASE_URL,
            temperature: 0,
            maxOutputTokens: 2000,
        },
        retrieval: {
            baseUrl: e.RETRIEVAL_BASE_URL,
            topK: e.RETRIEVAL_TOP_K,
            timeoutMs: e.RETRIEVAL_TIMEOUT_MS,
        },
        patientContextBaseUrl: e.PATIENT_CONTEXT_BASE_URL,
        sessionDir: e.SESSION_DIR,
        sessionCacheSize: e.SESSION_CACHE_SIZE,
        resultsDir: e.RESULTS_DIR,
        redFlagRulesFile: e.RED_FLAG_RULES_FILE,
        prompt: {
            historyTurns: e.HISTORY_TURNS,
            maxPromptChars: e.MAX_PROMPT_CHARS,
            maxContextChars: e.MAX_CONTEXT_CHARS,
        },
        generation: {
            retries: e.GENERATION_RETRIES,
            timeoutMs: e.GENERATION_TIMEOUT_MS,
            baseDelayMs: e.RETRY_BASE_DELAY_MS,
            maxDelayMs: e.RETRY_MAX_DELAY_MS,
        },
        evaluation: {
            concurrency: e.EVAL_CONCURRENCY,
            totalTimeoutMs: e.EVAL_TOTAL_TIMEOUT_MS,
        },
        rubric: {
            version: e.RUBRIC_VERSION,
            weights: parseWeights(e.JUDGE_WEIGHTS),
            passThreshold: e.JUDGE_PASS_THRESHOLD,
            reviseThreshold: e.JUDGE_REVISE_THRESHOLD,
            safetyFloor: e.JUDGE_SAFETY_FLOOR,
            dimensionFloor: e.JUDGE_DIMENSION_FLOOR,
        },
        server: {
            chatPort: e.CHAT_PORT,
            reviewPort: e.REVIEW_PORT,
        },
    };

    return deepFreeze(config);
}

const modelConfigSchema = z.object({
    id: z.string().min(1),
    provider: z.enum(['openai', 'openai-compatible']).optional(),
    model: z.string().min(1),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxOutputTokens: z.number().int().positive().optional(),
});

/**
 * Candidate model configurations for an evaluation run. Unset fields inherit
 * from the configured chat model.
 */
export function loadModelConfigs(filePath: string, defaults: ModelConfig): ModelConfig[] {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(path.resolve(filePath), 'utf-8'));
    } catch (err) {
        throw new ConfigurationError(`Cannot read model configurations from ${filePath}`, [
            err instanceof Error ? err.message : String(err),
        ]);
    }

    const parsed = z.array(modelConfigSchema).min(1).safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid model configuration file',
            parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
    }

    const ids = new Set<string>();
    return parsed.data.map((m) => {
        if (ids.has(m.id)) {
            throw new ConfigurationError('Invalid model configuration file', [`duplicate id ${m.id}`]);
        }
        ids.add(m.id);
        return {
            id: m.id,
            provider: m.provider ?? defaults.provider,
            model: m.model,
            baseUrl: m.baseUrl ?? defaults.baseUrl,
            temperature: m.temperature ?? defaults.temperature,
            maxOutputTokens: m.maxOutputTokens ?? defaults.maxOutputTokens,
        };
    });
}
