import fs from 'fs';
import { z } from 'zod';
import { CASE_CATEGORIES, ConfigurationError, EvaluationCase } from '@care-companion/shared';
import curatedCaseFile from './data/evaluation-cases.json';

const caseSchema = z.object({
    id: z.string().min(1),
    category: z.enum(CASE_CATEGORIES),
    questions: z.array(z.string().trim().min(1)).min(1),
    referenceNotes: z.string().optional(),
    expectedElements: z.array(z.string()).optional(),
    expectedRedFlags: z.array(z.string()).optional(),
});

const caseFileSchema = z.object({
    version: z.string().optional(),
    cases: z.array(caseSchema),
});

export function parseEvaluationCases(raw: unknown, source = 'cases'): EvaluationCase[] {
    const parsed = caseFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid evaluation cases in ${source}`,
            parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
    }
    return parsed.data.cases;
}

/**
 * The curated case set shipped with the assistant
 */
export function curatedCases(): EvaluationCase[] {
    return parseEvaluationCases(curatedCaseFile, 'curated case set');
}

/**
 * Loads one or more case files. Without paths the curated set is used.
 * Case ids must be unique across every file.
 */
export function loadEvaluationCases(paths: string[] = []): EvaluationCase[] {
    const cases: EvaluationCase[] = [];
    if (paths.length === 0) {
        cases.push(...curatedCases());
    }
    for (const filePath of paths) {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (err) {
            throw new ConfigurationError(`Cannot read evaluation cases from ${filePath}`, [
                err instanceof Error ? err.message : String(err),
            ]);
        }
        cases.push(...parseEvaluationCases(raw, filePath));
    }

    const seen = new Set<string>();
    for (const c of cases) {
        if (seen.has(c.id)) {
            throw new ConfigurationError('Invalid evaluation cases', [`duplicate case id ${c.id}`]);
        }
        seen.add(c.id);
    }
    return cases;
}
