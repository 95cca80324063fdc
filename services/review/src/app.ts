import Fastify from 'fastify';
import { ZodError, z } from 'zod';
import {
    ApiResponse,
    CaseCategory,
    HumanScore,
    ReconciledVerdict,
    TestRun,
    TestRunReport,
    errorMessage,
    httpStatusFor,
    rootLogger,
} from '@care-companion/shared';
import {
    FailureAnalysis,
    HumanReviewLedger,
    ImprovementPlan,
    TestRunRepository,
    analyzeFailures,
    applyReviews,
    buildImprovementPlan,
    pairKey,
    reviewInputSchema,
} from '@care-companion/assistant';

export interface ReviewAppDeps {
    runs: TestRunRepository;
    now?: () => Date;
}

const reviewBodySchema = reviewInputSchema.extend({
    caseId: z.string().min(1),
    configId: z.string().min(1),
});

export interface PendingItem {
    caseId: string;
    configId: string;
    category: CaseCategory;
    questions: string[];
    answer: string;
    judgeVerdict: string | null;
}

export interface SubmittedReview {
    review: HumanScore;
    reconciled: ReconciledVerdict | null;
}

/**
 * HTTP surface for human review of saved evaluation runs
 */
export function buildReviewApp(deps: ReviewAppDeps) {
    const app = Fastify({ logger: rootLogger.child({ module: 'review-service' }) });
    const now = deps.now ?? (() => new Date());
    const locks: Map<string, Promise<void>> = new Map();

    // submissions to one run are applied one at a time
    const withRunLock = <T>(runId: string, task: () => Promise<T>): Promise<T> => {
        const previous = locks.get(runId) ?? Promise.resolve();
        const run = previous.then(task);
        const tail = run.then(
            () => undefined,
            () => undefined,
        );
        locks.set(runId, tail);
        void tail.then(() => {
            if (locks.get(runId) === tail) locks.delete(runId);
        });
        return run;
    };

    const notFound = <T = unknown>(runId: string): ApiResponse<T> => ({ success: false, error: `Run ${runId} not found` });

    app.setErrorHandler((error: Error, request, reply) => {
        if (error instanceof ZodError) {
            const response: ApiResponse = {
                success: false,
                error: error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
            };
            return reply.code(400).send(response);
        }
        const status = httpStatusFor(error);
        if (status >= 500) {
            request.log.error({ err: errorMessage(error) }, 'Request failed');
        }
        const response: ApiResponse = {
            success: false,
            error: status >= 500 ? 'Internal error' : errorMessage(error),
        };
        return reply.code(status).send(response);
    });

    /**
     * GET /runs - Saved run ids
     */
    app.get('/runs', async (request, reply) => {
        const response: ApiResponse<string[]> = { success: true, data: await deps.runs.list() };
        return reply.send(response);
    });

    /**
     * GET /runs/:runId/report - Aggregate report and failure analysis
     */
    app.get<{ Params: { runId: string } }>('/runs/:runId/report', async (request, reply) => {
        const run = await deps.runs.load(request.params.runId);
        if (!run) {
            return reply.code(404).send(notFound(request.params.runId));
        }
        const response: ApiResponse<{ report: TestRunReport; analysis: FailureAnalysis }> = {
            success: true,
            data: {
                report: run.report,
                analysis: analyzeFailures(run.report, run.judgeScores, run.entries),
            },
        };
        return reply.send(response);
    });

    /**
     * GET /runs/:runId/plan - Improvement plan with failed cases and recommendations
     */
    app.get<{ Params: { runId: string } }>('/runs/:runId/plan', async (request, reply) => {
        const run = await deps.runs.load(request.params.runId);
        if (!run) {
            return reply.code(404).send(notFound(request.params.runId));
        }
        const response: ApiResponse<ImprovementPlan> = { success: true, data: buildImprovementPlan(run, undefined, now) };
        return reply.send(response);
    });

    /**
     * GET /runs/:runId/pending - Completed pairs without a human review
     */
    app.get<{ Params: { runId: string } }>('/runs/:runId/pending', async (request, reply) => {
        const run = await deps.runs.load(request.params.runId);
        if (!run) {
            return reply.code(404).send(notFound(request.params.runId));
        }
        const caseById = new Map(run.cases.map((c) => [c.id, c]));
        const judgeByKey = new Map(run.judgeScores.map((j) => [pairKey(j.caseId, j.configId), j]));

        const pending = new HumanReviewLedger(run.humanScores).pending(run.entries).map((entry): PendingItem => {
            const judgement = judgeByKey.get(pairKey(entry.caseId, entry.configId));
            return {
                caseId: entry.caseId,
                configId: entry.configId,
                category: entry.category,
                questions: caseById.get(entry.caseId)?.questions ?? [],
                answer: entry.response?.text ?? '',
                judgeVerdict: judgement ? (judgement.status === 'scored' ? judgement.verdict : 'UNSCORED') : null,
            };
        });
        const response: ApiResponse<PendingItem[]> = { success: true, data: pending };
        return reply.send(response);
    });

    /**
     * POST /runs/:runId/reviews - Record a human review and recompute the report
     */
    app.post<{ Params: { runId: string }; Body: unknown }>('/runs/:runId/reviews', async (request, reply) => {
        const { runId } = request.params;
        const body = reviewBodySchema.parse(request.body);

        const result = await withRunLock(runId, async (): Promise<{ status: number; response: ApiResponse<SubmittedReview> }> => {
            const run: TestRun | null = await deps.runs.load(runId);
            if (!run) {
                return { status: 404, response: notFound<SubmittedReview>(runId) };
            }
            const entry = run.entries.find((e) => e.caseId === body.caseId && e.configId === body.configId);
            if (!entry) {
                return {
                    status: 404,
                    response: { success: false, error: `No pair ${body.caseId} / ${body.configId} in run ${runId}` },
                };
            }
            if (entry.status !== 'completed') {
                return {
                    status: 409,
                    response: { success: false, error: `Pair ${body.caseId} / ${body.configId} has no response to review` },
                };
            }

            const ledger = new HumanReviewLedger(run.humanScores, now);
            const review = ledger.submit(body.caseId, body.configId, {
                reviewerId: body.reviewerId,
                dimensions: body.dimensions,
                verdict: body.verdict,
                notes: body.notes,
            });
            const updated = applyReviews(run, ledger, now);
            await deps.runs.save(updated);

            const reconciled =
                updated.report.reconciled.find((r) => r.caseId === body.caseId && r.configId === body.configId) ?? null;
            return { status: 201, response: { success: true, data: { review, reconciled } } };
        });

        return reply.code(result.status).send(result.response);
    });

    app.get('/health', async () => {
        return { status: 'ok', service: 'review' };
    });

    return app;
}
