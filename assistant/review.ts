import { z } from 'zod';
import {
    HumanScore,
    JudgeScore,
    PairResult,
    ReconciledVerdict,
    Verdict,
    createLogger,
} from '@care-companion/shared';

const log = createLogger('review');

const VERDICT_RANK: Record<Verdict, number> = { PASS: 3, REVISE: 2, FAIL: 1 };

const score = z.number().min(0).max(100);

export const reviewInputSchema = z.object({
    reviewerId: z.string().trim().min(1),
    dimensions: z.object({
        medicalAccuracy: score,
        safety: score,
        patientFriendliness: score,
        actionability: score,
        scope: score,
    }),
    verdict: z.enum(['PASS', 'REVISE', 'FAIL']),
    notes: z.string().default(''),
});

export type ReviewInput = z.input<typeof reviewInputSchema>;

export const pairKey = (caseId: string, configId: string) => `${caseId}::${configId}`;

/**
 * Every human review for a run. Nothing is overwritten: reviews are kept in
 * submission order and the most recent one for a pair is authoritative.
 */
export class HumanReviewLedger {
    private reviews: HumanScore[];

    constructor(
        initial: HumanScore[] = [],
        private readonly now: () => Date = () => new Date(),
    ) {
        this.reviews = [...initial].sort((a, b) => a.sequence - b.sequence);
    }

    private nextSequence(): number {
        return this.reviews.reduce((max, r) => Math.max(max, r.sequence), 0) + 1;
    }

    /**
     * Validates and appends a review. Throws ZodError for invalid input.
     */
    submit(caseId: string, configId: string, input: ReviewInput): HumanScore {
        const review = reviewInputSchema.parse(input);
        const stored: HumanScore = {
            caseId,
            configId,
            reviewerId: review.reviewerId,
            dimensions: review.dimensions,
            notes: review.notes,
            verdict: review.verdict,
            submittedAt: this.now().toISOString(),
            sequence: this.nextSequence(),
        };
        this.reviews.push(stored);
        log.info({ caseId, configId, reviewerId: stored.reviewerId, verdict: stored.verdict }, 'Review recorded');
        return stored;
    }

    all(): HumanScore[] {
        return [...this.reviews];
    }

    reviewsFor(caseId: string, configId: string): HumanScore[] {
        return this.reviews.filter((r) => r.caseId === caseId && r.configId === configId);
    }

    latest(caseId: string, configId: string): HumanScore | null {
        const reviews = this.reviewsFor(caseId, configId);
        return reviews.length > 0 ? reviews[reviews.length - 1] : null;
    }

    /**
     * Final verdict per pair: the most recent human verdict when one exists,
     * otherwise the judge's. Judge and human disagreements carry a direction.
     */
    reconcile(judgeScores: JudgeScore[]): ReconciledVerdict[] {
        const keys: Array<{ caseId: string; configId: string }> = [];
        const seen = new Set<string>();
        const judgeByKey = new Map<string, JudgeScore>();

        const track = (caseId: string, configId: string) => {
            const key = pairKey(caseId, configId);
            if (!seen.has(key)) {
                seen.add(key);
                keys.push({ caseId, configId });
            }
            return key;
        };

        for (const judgement of judgeScores) {
            judgeByKey.set(track(judgement.caseId, judgement.configId), judgement);
        }
        for (const review of this.reviews) {
            track(review.caseId, review.configId);
        }

        return keys.map(({ caseId, configId }): ReconciledVerdict => {
            const judgement = judgeByKey.get(pairKey(caseId, configId));
            const judgeVerdict = judgement ? (judgement.status === 'scored' ? judgement.verdict : 'UNSCORED') : null;
            const reviews = this.reviewsFor(caseId, configId);
            const human = reviews.length > 0 ? reviews[reviews.length - 1] : null;

            let discrepancy: ReconciledVerdict['discrepancy'] = null;
            if (human && judgeVerdict && judgeVerdict !== 'UNSCORED' && judgeVerdict !== human.verdict) {
                discrepancy = VERDICT_RANK[judgeVerdict] > VERDICT_RANK[human.verdict] ? 'overestimate' : 'underestimate';
            }

            return {
                caseId,
                configId,
                judgeVerdict,
                humanVerdict: human ? human.verdict : null,
                finalVerdict: human ? human.verdict : judgeVerdict ?? 'UNSCORED',
                source: human ? 'human' : judgeVerdict && judgeVerdict !== 'UNSCORED' ? 'judge' : 'none',
                reviewCount: reviews.length,
                discrepancy,
            };
        });
    }

    /**
     * Completed pairs nobody has reviewed yet
     */
    pending(entries: PairResult[]): PairResult[] {
        return entries.filter((e) => e.status === 'completed' && this.reviewsFor(e.caseId, e.configId).length === 0);
    }
}
