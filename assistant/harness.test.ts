import { describe, it, expect } from 'vitest';
import { EvaluationCase, ProviderError } from '@care-companion/shared';
import { EvaluationHarness, GeneratorFactory, runPool } from './harness';
import { RubricJudge } from './judge';
import { ProviderPrompt } from './providers';
import { HumanReviewLedger } from './review';
import { ScriptedProvider, buildGenerator, judgeReply, noSleep, testModel, testRetry, testRubric } from './testing';

const caseSet = (count: number): EvaluationCase[] =>
    Array.from({ length: count }, (_, i) => ({
        id: `case-${i + 1}`,
        category: 'common',
        questions: [`Question for case ${i + 1}?`],
    }));

const lastContent = (prompt: ProviderPrompt) => prompt.messages[prompt.messages.length - 1]?.content ?? '';

const factoryFor =
    (reply: (prompt: ProviderPrompt, modelId: string) => string): GeneratorFactory =>
    (model, memory) =>
        buildGenerator(new ScriptedProvider(model.id, (prompt) => reply(prompt, model.id)), { memory }).generator;

const judgeFor = (reply: (prompt: ProviderPrompt) => string) =>
    new RubricJudge({
        provider: new ScriptedProvider('judge', reply),
        rubric: testRubric,
        maxOutputTokens: 800,
        retry: testRetry,
        sleep: noSleep,
    });

describe('runPool', () => {
    it('never runs more than the concurrency limit at once', async () => {
        let inFlight = 0;
        let peak = 0;
        const results = await runPool([1, 2, 3, 4, 5, 6], 2, async (n) => {
            inFlight += 1;
            peak = Math.max(peak, inFlight);
            await new Promise((resolve) => setTimeout(resolve, 1));
            inFlight -= 1;
            return n * 10;
        });
        expect(results).toEqual([10, 20, 30, 40, 50, 60]);
        expect(peak).toBe(2);
    });

    it('stops starting items once asked to', async () => {
        let started = 0;
        const results = await runPool(
            ['a', 'b', 'c'],
            1,
            async (item) => {
                started += 1;
                return item.toUpperCase();
            },
            () => started >= 1,
        );
        expect(results).toEqual(['A', undefined, undefined]);
    });
});

describe('EvaluationHarness', () => {
    it('isolates a failing case and completes the run', async () => {
        const harness = new EvaluationHarness(
            factoryFor((prompt) => {
                const question = lastContent(prompt);
                if (question.includes('case 3')) {
                    throw new ProviderError('provider rejected the request', { retryable: false, status: 400 });
                }
                return `Answer to: ${question}`;
            }),
            { concurrency: 2 },
        );

        const run = await harness.run(caseSet(5), [testModel('model-a')], { runId: 'run_fixed' });

        expect(run.id).toBe('run_fixed');
        expect(run.entries.map((e) => [e.caseId, e.status])).toEqual([
            ['case-1', 'completed'],
            ['case-2', 'completed'],
            ['case-3', 'failed'],
            ['case-4', 'completed'],
            ['case-5', 'completed'],
        ]);
        expect(run.entries.filter((e) => e.response)).toHaveLength(4);
        expect(run.entries[2].error).toEqual({
            kind: 'generation',
            message: 'Generation failed after 1 attempt(s): provider rejected the request',
        });
        expect(run.entries[0].response?.text).toBe('Answer to: Question for case 1?');
        expect(run.report.failures).toHaveLength(1);
        expect(run.judgeScores).toEqual([]);
    });

    it('leaves pairs with malformed judge output unscored and out of the pass rate', async () => {
        const harness = new EvaluationHarness(
            factoryFor((prompt) => `Answer to: ${lastContent(prompt)}`),
            { concurrency: 1 },
        );
        const judge = judgeFor((prompt) =>
            lastContent(prompt).includes('case 2') ? 'I would rate this highly.' : judgeReply([90, 90, 90, 90, 90]),
        );

        const run = await harness.run(caseSet(3), [testModel('model-a')], { judge });

        expect(run.judgeScores.map((j) => [j.caseId, j.status])).toEqual([
            ['case-1', 'scored'],
            ['case-2', 'unscored'],
            ['case-3', 'scored'],
        ]);
        expect(run.report.unscored).toEqual([
            { caseId: 'case-2', configId: 'model-a', reason: 'Judge output contains no JSON object' },
        ]);
        const [stats] = run.report.byConfig;
        expect(stats.passes).toBe(2);
        expect(stats.passRate).toBe(100);
        expect(stats.unscored).toBe(1);
    });

    it('runs every case against every configuration, case by case', async () => {
        const harness = new EvaluationHarness(factoryFor((_prompt, modelId) => `from ${modelId}`), { concurrency: 3 });
        const run = await harness.run(caseSet(2), [testModel('model-a'), testModel('model-b')]);

        expect(run.configIds).toEqual(['model-a', 'model-b']);
        expect(run.entries.map((e) => `${e.caseId}/${e.configId}`)).toEqual([
            'case-1/model-a',
            'case-1/model-b',
            'case-2/model-a',
            'case-2/model-b',
        ]);
        expect(run.entries.map((e) => e.response?.text)).toEqual(['from model-a', 'from model-b', 'from model-a', 'from model-b']);
        expect(run.id).toMatch(/^run_/);
    });

    it('plays follow-up questions in one conversation', async () => {
        const seen: number[] = [];
        const harness = new EvaluationHarness(
            factoryFor((prompt) => {
                seen.push(prompt.messages.length);
                return `reply ${seen.length}`;
            }),
            { concurrency: 1 },
        );
        const cases: EvaluationCase[] = [
            { id: 'follow-up-x', category: 'follow-up', questions: ['How much fibre?', 'And if that does not help?'] },
        ];

        const run = await harness.run(cases, [testModel('model-a')]);

        expect(seen).toEqual([1, 3]);
        expect(run.entries[0].response?.text).toBe('reply 2');
    });

    it('cancels pairs that had not started when the run is aborted', async () => {
        const controller = new AbortController();
        const harness = new EvaluationHarness(
            factoryFor(() => {
                controller.abort();
                return 'first and only';
            }),
            { concurrency: 1 },
        );

        const run = await harness.run(caseSet(3), [testModel('model-a')], { signal: controller.signal });

        expect(run.entries.map((e) => e.status)).toEqual(['completed', 'cancelled', 'cancelled']);
        expect(run.report.cancelled).toEqual([
            { caseId: 'case-2', configId: 'model-a' },
            { caseId: 'case-3', configId: 'model-a' },
        ]);
    });

    it('cancels unstarted pairs once the run deadline passes and keeps finished ones', async () => {
        let started = 0;
        const harness = new EvaluationHarness(
            (model, memory) =>
                buildGenerator(
                    new ScriptedProvider(model.id, async () => {
                        started += 1;
                        await new Promise((resolve) => setTimeout(resolve, 80));
                        return `slow reply ${started}`;
                    }),
                    { memory },
                ).generator,
            { concurrency: 1, totalTimeoutMs: 30 },
        );

        const run = await harness.run(caseSet(3), [testModel('model-a')]);

        expect(run.entries.map((e) => e.status)).toEqual(['completed', 'cancelled', 'cancelled']);
        expect(run.entries[0].response?.text).toBe('slow reply 1');
        expect(started).toBe(1);
        expect(run.report.cancelled).toEqual([
            { caseId: 'case-2', configId: 'model-a' },
            { caseId: 'case-3', configId: 'model-a' },
        ]);
    });

    it('folds in reviews passed to the run', async () => {
        const harness = new EvaluationHarness(factoryFor(() => 'answer'), { concurrency: 1 });
        const reviews = new HumanReviewLedger();
        reviews.submit('case-1', 'model-a', {
            reviewerId: 'dr-a',
            dimensions: { medicalAccuracy: 95, safety: 95, patientFriendliness: 95, actionability: 95, scope: 95 },
            verdict: 'PASS',
        });

        const run = await harness.run(caseSet(1), [testModel('model-a')], { reviews });

        expect(run.humanScores).toHaveLength(1);
        expect(run.report.reconciled[0]).toMatchObject({ finalVerdict: 'PASS', source: 'human' });
    });
});
