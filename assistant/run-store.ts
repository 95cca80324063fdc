import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CASE_CATEGORIES, PersistenceError, TestRun, createLogger, errorMessage } from '@care-companion/shared';
import { ImprovementPlan } from './report';

const log = createLogger('run-store');

export interface TestRunRepository {
    save(run: TestRun): Promise<void>;
    load(id: string): Promise<TestRun | null>;
    list(): Promise<string[]>;
}

const severity = z.enum(['high', 'medium', 'low']);
const verdict = z.enum(['PASS', 'REVISE', 'FAIL']);
const dimensions = z.object({
    medicalAccuracy: z.number(),
    safety: z.number(),
    patientFriendliness: z.number(),
    actionability: z.number(),
    scope: z.number(),
});
const pairRef = { caseId: z.string(), configId: z.string() };

const chunkSchema = z.object({ sourceId: z.string(), text: z.string(), score: z.number() });

const caseSchema = z.object({
    id: z.string(),
    category: z.enum(CASE_CATEGORIES),
    questions: z.array(z.string()),
    referenceNotes: z.string().optional(),
    expectedElements: z.array(z.string()).optional(),
    expectedRedFlags: z.array(z.string()).optional(),
});

const entrySchema = z.object({
    ...pairRef,
    category: z.enum(CASE_CATEGORIES),
    status: z.enum(['completed', 'failed', 'cancelled']),
    response: z
        .object({
            ...pairRef,
            text: z.string(),
            chunks: z.array(chunkSchema),
            latencyMs: z.number(),
            redFlag: z.boolean(),
            severity: severity.optional(),
            degraded: z.boolean(),
        })
        .optional(),
    error: z.object({ kind: z.string(), message: z.string() }).optional(),
});

const judgeScoreSchema = z.discriminatedUnion('status', [
    z.object({
        status: z.literal('scored'),
        ...pairRef,
        rubricVersion: z.string(),
        dimensions,
        overallPercentage: z.number(),
        verdict,
        rationale: z.string(),
        issues: z
            .object({
                medicalAccuracy: z.array(z.string()),
                safety: z.array(z.string()),
                patientFriendliness: z.array(z.string()),
                actionability: z.array(z.string()),
                scope: z.array(z.string()),
            })
            .partial(),
    }),
    z.object({
        status: z.literal('unscored'),
        ...pairRef,
        rubricVersion: z.string(),
        reason: z.string(),
        rawOutput: z.string().optional(),
    }),
]);

const humanScoreSchema = z.object({
    ...pairRef,
    reviewerId: z.string(),
    dimensions,
    notes: z.string(),
    verdict,
    submittedAt: z.string(),
    sequence: z.number(),
});

const reconciledSchema = z.object({
    ...pairRef,
    judgeVerdict: z.enum(['PASS', 'REVISE', 'FAIL', 'UNSCORED']).nullable(),
    humanVerdict: verdict.nullable(),
    finalVerdict: z.enum(['PASS', 'REVISE', 'FAIL', 'UNSCORED']),
    source: z.enum(['human', 'judge', 'none']),
    reviewCount: z.number(),
    discrepancy: z.enum(['overestimate', 'underestimate']).nullable(),
});

const reportSchema = z.object({
    generated_at: z.string(),
    byConfig: z.array(
        z.object({
            configId: z.string(),
            total: z.number(),
            completed: z.number(),
            failed: z.number(),
            cancelled: z.number(),
            scored: z.number(),
            unscored: z.number(),
            passes: z.number(),
            revisions: z.number(),
            failures: z.number(),
            passRate: z.number(),
            averageScore: z.number(),
            dimensionAverages: dimensions,
            scoreDistribution: z.record(z.number()),
        }),
    ),
    byCategory: z.array(
        z.object({
            configId: z.string(),
            category: z.enum(CASE_CATEGORIES),
            evaluated: z.number(),
            passes: z.number(),
            passRate: z.number(),
        }),
    ),
    redFlagsMissed: z.array(z.object(pairRef)),
    unscored: z.array(z.object({ ...pairRef, reason: z.string() })),
    failures: z.array(z.object({ ...pairRef, kind: z.string(), message: z.string() })),
    cancelled: z.array(z.object(pairRef)),
    discrepancies: z.array(reconciledSchema),
    judgeOverestimates: z.number(),
    reconciled: z.array(reconciledSchema),
});

export const testRunSchema = z.object({
    id: z.string(),
    started_at: z.string(),
    completed_at: z.string(),
    configIds: z.array(z.string()),
    cases: z.array(caseSchema),
    entries: z.array(entrySchema),
    judgeScores: z.array(judgeScoreSchema),
    humanScores: z.array(humanScoreSchema),
    report: reportSchema,
});

/**
 * One JSON document per run id under the results directory
 */
export class FileTestRunRepository implements TestRunRepository {
    constructor(private readonly dir: string) {}

    private fileFor(id: string): string {
        return path.join(this.dir, `${encodeURIComponent(id)}.json`);
    }

    async save(run: TestRun): Promise<void> {
        const target = this.fileFor(run.id);
        const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
        try {
            await fs.mkdir(this.dir, { recursive: true });
            await fs.writeFile(temp, JSON.stringify(run, null, 2), 'utf-8');
            await fs.rename(temp, target);
            log.info({ runId: run.id, file: target }, 'Test run saved');
        } catch (err) {
            await fs.rm(temp, { force: true }).catch((cleanupErr: unknown) => {
                log.warn({ runId: run.id, err: errorMessage(cleanupErr) }, 'Could not remove temp file');
            });
            throw new PersistenceError(`Cannot write test run ${run.id}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async load(id: string): Promise<TestRun | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.fileFor(id), 'utf-8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
            throw new PersistenceError(`Cannot read test run ${id}: ${errorMessage(err)}`, { cause: err });
        }
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            throw new PersistenceError(`Test run ${id} is not valid JSON: ${errorMessage(err)}`, { cause: err });
        }
        const parsed = testRunSchema.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new PersistenceError(`Test run ${id} is malformed at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? ''}`);
        }
        return parsed.data;
    }

    async list(): Promise<string[]> {
        let names: string[];
        try {
            names = await fs.readdir(this.dir);
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
            throw new PersistenceError(`Cannot list test runs: ${errorMessage(err)}`, { cause: err });
        }
        return names
            .filter((n) => n.endsWith('.json'))
            .map((n) => decodeURIComponent(n.slice(0, -'.json'.length)))
            .sort();
    }
}

/**
 * Writes an improvement plan as pretty-printed JSON, creating the directory if needed
 */
export async function writeImprovementPlan(filePath: string, plan: ImprovementPlan): Promise<void> {
    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, JSON.stringify(plan, null, 2), 'utf-8');
        log.info({ runId: plan.runId, file: filePath }, 'Improvement plan written');
    } catch (err) {
        throw new PersistenceError(`Cannot write improvement plan to ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
}

export class InMemoryTestRunRepository implements TestRunRepository {
    private runs: Map<string, TestRun> = new Map();

    async save(run: TestRun): Promise<void> {
        this.runs.set(run.id, structuredClone(run));
    }

    async load(id: string): Promise<TestRun | null> {
        const run = this.runs.get(id);
        return run ? structuredClone(run) : null;
    }

    async list(): Promise<string[]> {
        return Array.from(this.runs.keys()).sort();
    }
}
