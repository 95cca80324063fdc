import { nanoid } from 'nanoid';
import {
    EvaluationCase,
    JudgeScore,
    ModelResponse,
    PairResult,
    RetrievedChunk,
    Severity,
    TestRun,
    createLogger,
    errorMessage,
    isCareError,
} from '@care-companion/shared';
import { ModelConfig } from './config';
import { ResponseGenerator } from './generator';
import { RubricJudge } from './judge';
import { buildReport } from './report';
import { HumanReviewLedger } from './review';
import { compareSeverity } from './red-flags';
import { ConversationMemory, InMemorySessionRepository } from './session-store';

const log = createLogger('harness');

/**
 * Builds the generator for one model configuration around a pair's private memory
 */
export type GeneratorFactory = (model: ModelConfig, memory: ConversationMemory) => ResponseGenerator;

export interface RunOptions {
    concurrency?: number;
    totalTimeoutMs?: number;
    signal?: AbortSignal;
    judge?: RubricJudge | null;
    reviews?: HumanReviewLedger;
    runId?: string;
    now?: () => Date;
}

interface Pair {
    testCase: EvaluationCase;
    model: ModelConfig;
}

interface PairOutcome {
    entry: PairResult;
    judgement?: JudgeScore;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Once
 * `shouldStop` turns true no new item starts; items never started stay undefined.
 */
export async function runPool<T, R>(
    items: T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>,
    shouldStop: () => boolean = () => false,
): Promise<Array<R | undefined>> {
    const results = Array.from({ length: items.length }, (): R | undefined => undefined);
    let next = 0;
    const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
        while (next < items.length && !shouldStop()) {
            const index = next;
            next += 1;
            results[index] = await worker(items[index], index);
        }
    });
    await Promise.all(lanes);
    return results;
}

/**
 * Replays a case set against candidate model configurations and collects
 * responses, judge scores and the aggregate report.
 */
export class EvaluationHarness {
    constructor(
        private readonly createGenerator: GeneratorFactory,
        private readonly defaults: { concurrency: number; totalTimeoutMs?: number },
    ) {}

    private async runPair(runId: string, pair: Pair, options: RunOptions): Promise<PairOutcome> {
        const { testCase, model } = pair;
        const base = { caseId: testCase.id, configId: model.id, category: testCase.category };
        const memory = new ConversationMemory(new InMemorySessionRepository());
        const generator = this.createGenerator(model, memory);
        const sessionId = `${runId}:${testCase.id}:${model.id}`;

        let response: ModelResponse;
        try {
            let latencyMs = 0;
            let redFlag = false;
            let severity: Severity | undefined;
            let degraded = false;
            let answer = '';
            let chunks: RetrievedChunk[] = [];

            for (const question of testCase.questions) {
                const outcome = await generator.respond({ sessionId, text: question });
                if (outcome.generationError) {
                    log.warn({ caseId: testCase.id, configId: model.id, err: outcome.generationError.message }, 'Pair failed');
                    return {
                        entry: {
                            ...base,
                            status: 'failed',
                            error: { kind: outcome.generationError.kind, message: outcome.generationError.message },
                        },
                    };
                }
                latencyMs += outcome.latencyMs;
                redFlag = redFlag || outcome.redFlag;
                if (outcome.severity && (!severity || compareSeverity(outcome.severity, severity) > 0)) {
                    severity = outcome.severity;
                }
                degraded = degraded || outcome.degraded.retrieval;
                answer = outcome.answer;
                chunks = outcome.chunks;
            }

            response = {
                caseId: testCase.id,
                configId: model.id,
                text: answer,
                chunks,
                latencyMs,
                redFlag,
                severity,
                degraded,
            };
        } catch (err) {
            log.error({ caseId: testCase.id, configId: model.id, err: errorMessage(err) }, 'Pair threw');
            return {
                entry: {
                    ...base,
                    status: 'failed',
                    error: { kind: isCareError(err) ? err.kind : 'unexpected', message: errorMessage(err) },
                },
            };
        }

        const entry: PairResult = { ...base, status: 'completed', response };
        if (!options.judge) {
            return { entry };
        }
        return { entry, judgement: await options.judge.evaluate(testCase, response) };
    }

    async run(cases: EvaluationCase[], models: ModelConfig[], options: RunOptions = {}): Promise<TestRun> {
        const now = options.now ?? (() => new Date());
        const runId = options.runId ?? `run_${nanoid(10)}`;
        const startedAt = now();
        const concurrency = options.concurrency ?? this.defaults.concurrency;
        const totalTimeoutMs = options.totalTimeoutMs ?? this.defaults.totalTimeoutMs;
        const deadline = totalTimeoutMs !== undefined ? Date.now() + totalTimeoutMs : undefined;

        const pairs: Pair[] = [];
        for (const testCase of cases) {
            for (const model of models) {
                pairs.push({ testCase, model });
            }
        }
        log.info({ runId, cases: cases.length, models: models.map((m) => m.id), concurrency }, 'Run started');

        const stop: { reason: 'cancelled' | 'timeout' | null } = { reason: null };
        const shouldStop = () => {
            if (stop.reason) return true;
            if (options.signal?.aborted) stop.reason = 'cancelled';
            else if (deadline !== undefined && Date.now() >= deadline) stop.reason = 'timeout';
            return stop.reason !== null;
        };

        const outcomes = await runPool(pairs, concurrency, (pair) => this.runPair(runId, pair, options), shouldStop);
        if (stop.reason) {
            log.warn({ runId, reason: stop.reason }, 'Run stopped early, remaining pairs cancelled');
        }

        const entries: PairResult[] = [];
        const judgeScores: JudgeScore[] = [];
        outcomes.forEach((outcome, index) => {
            if (outcome) {
                entries.push(outcome.entry);
                if (outcome.judgement) judgeScores.push(outcome.judgement);
                return;
            }
            const { testCase, model } = pairs[index];
            entries.push({ caseId: testCase.id, configId: model.id, category: testCase.category, status: 'cancelled' });
        });

        const ledger = options.reviews ?? new HumanReviewLedger();
        const report = buildReport({
            cases,
            configIds: models.map((m) => m.id),
            entries,
            judgeScores,
            reconciled: ledger.reconcile(judgeScores),
            now,
        });

        log.info(
            {
                runId,
                completed: entries.filter((e) => e.status === 'completed').length,
                failed: report.failures.length,
                cancelled: report.cancelled.length,
                unscored: report.unscored.length,
            },
            'Run finished',
        );

        return {
            id: runId,
            started_at: startedAt.toISOString(),
            completed_at: now().toISOString(),
            configIds: models.map((m) => m.id),
            cases,
            entries,
            judgeScores,
            humanScores: ledger.all(),
            report,
        };
    }
}
