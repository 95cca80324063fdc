import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@care-companion/shared';
import { loadConfig, loadModelConfigs, parseWeights } from './config';

const issuesOf = (fn: () => unknown): string[] => {
    try {
        fn();
    } catch (err) {
        if (err instanceof ConfigurationError) return err.issues;
        throw err;
    }
    throw new Error('expected a ConfigurationError');
};

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });
        expect(config.chatModel).toEqual({
            id: 'gpt-4o-mini',
            provider: 'openai',
            model: 'gpt-4o-mini',
            baseUrl: undefined,
            temperature: 0.3,
            maxOutputTokens: 600,
        });
        expect(config.judgeModel.id).toBe('judge:gpt-4o');
        expect(config.judgeModel.temperature).toBe(0);
        expect(config.prompt).toEqual({ historyTurns: 5, maxPromptChars: 12000, maxContextChars: 6000 });
        expect(config.generation).toEqual({ retries: 2, timeoutMs: 30000, baseDelayMs: 500, maxDelayMs: 8000 });
        expect(config.rubric).toMatchObject({ version: 'rubric-v1', passThreshold: 80, reviseThreshold: 60, safetyFloor: 60 });
        expect(config.retrieval.baseUrl).toBeUndefined();
        expect(config.server).toEqual({ chatPort: 4101, reviewPort: 4102 });
    });

    it('coerces numeric variables', () => {
        const config = loadConfig({
            OPENAI_API_KEY: 'test-secret',
            RETRIEVAL_BASE_URL: 'http://localhost:9000',
            HISTORY_TURNS: '3',
            EVAL_CONCURRENCY: '4',
            EVAL_TOTAL_TIMEOUT_MS: '60000',
            JUDGE_DIMENSION_FLOOR: '40',
        });
        expect(config.prompt.historyTurns).toBe(3);
        expect(config.evaluation).toEqual({ concurrency: 4, totalTimeoutMs: 60000 });
        expect(config.rubric.dimensionFloor).toBe(40);
        expect(config.retrieval.baseUrl).toBe('http://localhost:9000');
    });

    it('reads the session cache size and a rule file override', () => {
        const defaults = loadConfig({ OPENAI_API_KEY: 'test-secret' });
        expect(defaults.sessionCacheSize).toBe(500);
        expect(defaults.redFlagRulesFile).toBeUndefined();

        const config = loadConfig({
            OPENAI_API_KEY: 'test-secret',
            SESSION_CACHE_SIZE: '20',
            RED_FLAG_RULES_FILE: './clinic-rules.json',
        });
        expect(config.sessionCacheSize).toBe(20);
        expect(config.redFlagRulesFile).toBe('./clinic-rules.json');
        expect(issuesOf(() => loadConfig({ OPENAI_API_KEY: 'test-secret', SESSION_CACHE_SIZE: '0' }))).toHaveLength(1);
    });

    it('returns a frozen object', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.rubric.weights)).toBe(true);
    });

    it('requires an api key for the openai provider', () => {
        expect(issuesOf(() => loadConfig({}))).toEqual(['OPENAI_API_KEY is required for the openai provider']);
    });

    it('requires a base url for an openai-compatible provider', () => {
        expect(issuesOf(() => loadConfig({ PROVIDER_KIND: 'openai-compatible' }))).toEqual([
            'PROVIDER_BASE_URL is required for the openai-compatible provider',
        ]);
        expect(
            loadConfig({ PROVIDER_KIND: 'openai-compatible', PROVIDER_BASE_URL: 'http://localhost:8080/v1' }).chatModel.baseUrl,
        ).toBe('http://localhost:8080/v1');
    });

    it('rejects inconsistent thresholds', () => {
        expect(
            issuesOf(() =>
                loadConfig({ OPENAI_API_KEY: 'test-secret', JUDGE_PASS_THRESHOLD: '70', JUDGE_REVISE_THRESHOLD: '75' }),
            ),
        ).toEqual(['JUDGE_REVISE_THRESHOLD must not exceed JUDGE_PASS_THRESHOLD']);
    });

    it('rejects a prompt ceiling too small for the safety policy', () => {
        const [issue] = issuesOf(() => loadConfig({ OPENAI_API_KEY: 'test-secret', MAX_PROMPT_CHARS: '1000' }));
        expect(issue).toMatch(/^MAX_PROMPT_CHARS must be at least \d+ to hold the safety policy$/);
    });

    it('names the offending variable on a type error', () => {
        const issues = issuesOf(() => loadConfig({ OPENAI_API_KEY: 'test-secret', RETRIEVAL_BASE_URL: 'not a url' }));
        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('RETRIEVAL_BASE_URL:')).toBe(true);
    });
});

describe('parseWeights', () => {
    it('reads five weights in dimension order', () => {
        expect(parseWeights('2, 3, 1, 1, 0.5')).toEqual({
            medicalAccuracy: 2,
            safety: 3,
            patientFriendliness: 1,
            actionability: 1,
            scope: 0.5,
        });
    });

    it('rejects the wrong count, negatives and all zeros', () => {
        expect(() => parseWeights('1,1,1')).toThrow(ConfigurationError);
        expect(() => parseWeights('1,1,1,1,-1')).toThrow(ConfigurationError);
        expect(() => parseWeights('0,0,0,0,0')).toThrow('at least one weight must be positive');
    });
});

describe('loadModelConfigs', () => {
    const defaults = loadConfig({ OPENAI_API_KEY: 'test-secret' }).chatModel;

    const writeTemp = (content: string): string => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'care-models-'));
        const file = path.join(dir, 'models.json');
        fs.writeFileSync(file, content, 'utf-8');
        return file;
    };

    it('fills unset fields from the chat model', () => {
        const file = writeTemp(
            JSON.stringify([
                { id: 'mini', model: 'gpt-4o-mini' },
                { id: 'local', model: 'llama3', provider: 'openai-compatible', baseUrl: 'http://localhost:11434/v1', temperature: 0 },
            ]),
        );
        expect(loadModelConfigs(file, defaults)).toEqual([
            { id: 'mini', provider: 'openai', model: 'gpt-4o-mini', baseUrl: undefined, temperature: 0.3, maxOutputTokens: 600 },
            {
                id: 'local',
                provider: 'openai-compatible',
                model: 'llama3',
                baseUrl: 'http://localhost:11434/v1',
                temperature: 0,
                maxOutputTokens: 600,
            },
        ]);
    });

    it('rejects duplicate ids', () => {
        const file = writeTemp(JSON.stringify([{ id: 'a', model: 'x' }, { id: 'a', model: 'y' }]));
        expect(issuesOf(() => loadModelConfigs(file, defaults))).toEqual(['duplicate id a']);
    });

    it('rejects an empty list and unreadable files', () => {
        expect(() => loadModelConfigs(writeTemp('[]'), defaults)).toThrow(ConfigurationError);
        expect(() => loadModelConfigs(writeTemp('{ nope'), defaults)).toThrow(ConfigurationError);
    });
});
