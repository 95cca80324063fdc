import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
    CASE_CATEGORIES,
    CaseCategory,
    ConfigurationError,
    EvaluationCase,
    PersistenceError,
    createLogger,
    errorMessage,
} from '@care-companion/shared';
import { parseEvaluationCases } from './cases';
import keywordFile from './data/category-keywords.json';
import { RedFlagDetector } from './red-flags';

const log = createLogger('authoring');

const keywordRulesSchema = z.array(
    z.object({
        category: z.enum(CASE_CATEGORIES),
        keywords: z.array(z.string().min(1)).min(1),
    }),
);

export type CategoryKeywordRule = z.infer<typeof keywordRulesSchema>[number];

/**
 * Keyword rules in precedence order; the first rule with a hit wins
 */
export const CATEGORY_KEYWORDS: ReadonlyArray<CategoryKeywordRule> = keywordRulesSchema.parse(keywordFile);

/**
 * Best-guess category for a new question. Anything the red-flag rules catch is
 * a red-flag case; otherwise keywords decide, falling back to common.
 */
export function autoCategorize(
    text: string,
    detector: RedFlagDetector,
    rules: ReadonlyArray<CategoryKeywordRule> = CATEGORY_KEYWORDS,
): CaseCategory {
    if (detector.detectAll(text).length > 0) return 'red-flag';
    const lower = text.toLowerCase();
    const hit = rules.find((rule) => rule.keywords.some((k) => lower.includes(k)));
    return hit ? hit.category : 'common';
}

export interface CaseFile {
    version: string;
    cases: EvaluationCase[];
}

/**
 * Hand-written evaluation cases, saved in the format loadEvaluationCases reads
 */
export class CaseCollection {
    private cases: EvaluationCase[];

    constructor(
        private readonly detector: RedFlagDetector,
        cases: EvaluationCase[] = [],
        private readonly prefix = 'manual',
    ) {
        this.cases = [...cases];
    }

    /**
     * Opens a case file, or starts an empty collection when it does not exist yet
     */
    static async open(filePath: string, detector: RedFlagDetector, prefix?: string): Promise<CaseCollection> {
        let raw: string;
        try {
            raw = await fs.readFile(filePath, 'utf-8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
                return new CaseCollection(detector, [], prefix);
            }
            throw new PersistenceError(`Cannot read case file ${filePath}: ${errorMessage(err)}`, { cause: err });
        }
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            throw new ConfigurationError(`Cannot read evaluation cases from ${filePath}`, [errorMessage(err)]);
        }
        return new CaseCollection(detector, parseEvaluationCases(json, filePath), prefix);
    }

    get size(): number {
        return this.cases.length;
    }

    list(): EvaluationCase[] {
        return this.cases.map((c) => ({ ...c, questions: [...c.questions] }));
    }

    private nextId(): string {
        const pattern = new RegExp(`^${this.prefix}-(\\d+)$`);
        let highest = 0;
        for (const c of this.cases) {
            const found = pattern.exec(c.id);
            if (found) highest = Math.max(highest, Number(found[1]));
        }
        return `${this.prefix}-${String(highest + 1).padStart(3, '0')}`;
    }

    add(question: string, category?: CaseCategory): EvaluationCase {
        const text = question.trim();
        if (!text) {
            throw new RangeError('Question text is empty');
        }
        const ruleIds = this.detector.detectAll(text).map((m) => m.ruleId);
        const testCase: EvaluationCase = {
            id: this.nextId(),
            category: category ?? autoCategorize(text, this.detector),
            questions: [text],
            ...(ruleIds.length > 0 ? { expectedRedFlags: ruleIds } : {}),
        };
        this.cases.push(testCase);
        return testCase;
    }

    /**
     * One question per line. Blank lines and lines starting with # are skipped.
     */
    addBatch(text: string): EvaluationCase[] {
        return text
            .split(/\r?\n/)
            .map((line) => line.trim())
            .filter((line) => line && !line.startsWith('#'))
            .map((line) => this.add(line));
    }

    remove(id: string): boolean {
        const before = this.cases.length;
        this.cases = this.cases.filter((c) => c.id !== id);
        return this.cases.length < before;
    }

    countsByCategory(): Record<CaseCategory, number> {
        const counts: Record<CaseCategory, number> = {
            common: 0,
            'red-flag': 0,
            'edge-case': 0,
            'emotional-support': 0,
            'follow-up': 0,
            myth: 0,
            'pregnancy-safety': 0,
        };
        for (const c of this.cases) counts[c.category] += 1;
        return counts;
    }

    toFile(): CaseFile {
        return { version: this.prefix, cases: this.list() };
    }

    async save(filePath: string): Promise<void> {
        const temp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
        try {
            await fs.mkdir(path.dirname(filePath), { recursive: true });
            await fs.writeFile(temp, JSON.stringify(this.toFile(), null, 2), 'utf-8');
            await fs.rename(temp, filePath);
            log.info({ file: filePath, cases: this.cases.length }, 'Case file saved');
        } catch (err) {
            await fs.rm(temp, { force: true }).catch((cleanupErr: unknown) => {
                log.warn({ file: filePath, err: errorMessage(cleanupErr) }, 'Could not remove temp file');
            });
            throw new PersistenceError(`Cannot write case file ${filePath}: ${errorMessage(err)}`, { cause: err });
        }
    }
}
