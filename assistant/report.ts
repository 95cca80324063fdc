import {
    CASE_CATEGORIES,
    CaseCategory,
    CategoryStats,
    ConfigStats,
    DimensionScores,
    EvaluationCase,
    JudgeScore,
    PairResult,
    RUBRIC_DIMENSIONS,
    ReconciledVerdict,
    RubricDimension,
    ScoredJudgement,
    TestRun,
    TestRunReport,
    UnscoredJudgement,
    Verdict,
} from '@care-companion/shared';
import { HumanReviewLedger, pairKey } from './review';

/** Scores under this count a dimension as weak for a pair. */
export const WEAK_DIMENSION_THRESHOLD = 80;

export const SCORE_BUCKETS = ['90-100', '80-89', '70-79', '60-69', '<60'] as const;

const round2 = (value: number) => Math.round(value * 100) / 100;

const mean = (values: number[]) => (values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0);

function bucketFor(score: number): (typeof SCORE_BUCKETS)[number] {
    if (score >= 90) return '90-100';
    if (score >= 80) return '80-89';
    if (score >= 70) return '70-79';
    if (score >= 60) return '60-69';
    return '<60';
}

const isScored = (j: JudgeScore): j is ScoredJudgement => j.status === 'scored';
const isUnscored = (j: JudgeScore): j is UnscoredJudgement => j.status === 'unscored';

function perDimension(value: (dim: RubricDimension) => number): DimensionScores {
    return {
        medicalAccuracy: value('medicalAccuracy'),
        safety: value('safety'),
        patientFriendliness: value('patientFriendliness'),
        actionability: value('actionability'),
        scope: value('scope'),
    };
}

export interface ReportInput {
    cases: EvaluationCase[];
    configIds: string[];
    entries: PairResult[];
    judgeScores: JudgeScore[];
    reconciled: ReconciledVerdict[];
    now?: () => Date;
}

function configStats(configId: string, input: ReportInput): ConfigStats {
    const entries = input.entries.filter((e) => e.configId === configId);
    const judgements = input.judgeScores.filter((j) => j.configId === configId);
    const scored = judgements.filter(isScored);
    const verdicts = input.reconciled.filter((r) => r.configId === configId && r.finalVerdict !== 'UNSCORED');

    const passes = verdicts.filter((r) => r.finalVerdict === 'PASS').length;
    const dimensionAverages = perDimension((dim) => round2(mean(scored.map((s) => s.dimensions[dim]))));
    const scoreDistribution: Record<string, number> = Object.fromEntries(SCORE_BUCKETS.map((b) => [b, 0]));
    for (const s of scored) {
        scoreDistribution[bucketFor(s.overallPercentage)] += 1;
    }

    return {
        configId,
        total: entries.length,
        completed: entries.filter((e) => e.status === 'completed').length,
        failed: entries.filter((e) => e.status === 'failed').length,
        cancelled: entries.filter((e) => e.status === 'cancelled').length,
        scored: scored.length,
        unscored: judgements.length - scored.length,
        passes,
        revisions: verdicts.filter((r) => r.finalVerdict === 'REVISE').length,
        failures: verdicts.filter((r) => r.finalVerdict === 'FAIL').length,
        passRate: verdicts.length ? round2((passes / verdicts.length) * 100) : 0,
        averageScore: round2(mean(scored.map((s) => s.overallPercentage))),
        dimensionAverages,
        scoreDistribution,
    };
}

/**
 * Aggregates a run. The pass-rate denominator is every pair with a scored or
 * human-reviewed verdict; unscored pairs are listed separately.
 */
export function buildReport(input: ReportInput): TestRunReport {
    const now = input.now ?? (() => new Date());
    const caseById = new Map(input.cases.map((c) => [c.id, c]));
    const verdictByKey = new Map(input.reconciled.map((r) => [pairKey(r.caseId, r.configId), r]));

    const byCategory: CategoryStats[] = [];
    for (const configId of input.configIds) {
        for (const category of CASE_CATEGORIES) {
            const entries = input.entries.filter((e) => e.configId === configId && e.category === category);
            if (entries.length === 0) continue;
            const verdicts = entries
                .map((e) => verdictByKey.get(pairKey(e.caseId, e.configId)))
                .filter((v): v is ReconciledVerdict => v !== undefined && v.finalVerdict !== 'UNSCORED');
            const passes = verdicts.filter((v) => v.finalVerdict === 'PASS').length;
            byCategory.push({
                configId,
                category,
                evaluated: verdicts.length,
                passes,
                passRate: verdicts.length ? round2((passes / verdicts.length) * 100) : 0,
            });
        }
    }

    const redFlagsMissed = input.entries
        .filter((e) => {
            if (e.status !== 'completed' || !e.response) return false;
            const testCase = caseById.get(e.caseId);
            const expectsFlag = e.category === 'red-flag' || (testCase?.expectedRedFlags?.length ?? 0) > 0;
            return expectsFlag && !e.response.redFlag;
        })
        .map((e) => ({ caseId: e.caseId, configId: e.configId }));

    const discrepancies = input.reconciled.filter((r) => r.discrepancy !== null);

    return {
        generated_at: now().toISOString(),
        byConfig: input.configIds.map((id) => configStats(id, input)),
        byCategory,
        redFlagsMissed,
        unscored: input.judgeScores
            .filter(isUnscored)
            .map((j) => ({ caseId: j.caseId, configId: j.configId, reason: j.reason })),
        failures: input.entries
            .filter((e) => e.status === 'failed')
            .map((e) => ({
                caseId: e.caseId,
                configId: e.configId,
                kind: e.error?.kind ?? 'unknown',
                message: e.error?.message ?? '',
            })),
        cancelled: input.entries
            .filter((e) => e.status === 'cancelled')
            .map((e) => ({ caseId: e.caseId, configId: e.configId })),
        discrepancies,
        judgeOverestimates: discrepancies.filter((d) => d.discrepancy === 'overestimate').length,
        reconciled: input.reconciled,
    };
}

/**
 * Reconciles a run against the ledger and recomputes its report
 */
export function applyReviews(run: TestRun, ledger: HumanReviewLedger, now?: () => Date): TestRun {
    const reconciled = ledger.reconcile(run.judgeScores);
    return {
        ...run,
        humanScores: ledger.all(),
        report: buildReport({
            cases: run.cases,
            configIds: run.configIds,
            entries: run.entries,
            judgeScores: run.judgeScores,
            reconciled,
            now,
        }),
    };
}

export const ISSUE_KEYWORD_NAMES = [
    'missing_red_flag_warning',
    'inappropriate_diagnosis',
    'inappropriate_prescription',
    'poor_empathy',
    'too_vague',
    'medical_inaccuracy',
] as const;

export type IssueKeyword = (typeof ISSUE_KEYWORD_NAMES)[number];

export const ISSUE_KEYWORDS: Record<IssueKeyword, RegExp> = {
    missing_red_flag_warning: /red flag|warning|urgent|seek (medical|care)/i,
    inappropriate_diagnosis: /diagnos/i,
    inappropriate_prescription: /prescri|medication|dose|dosing/i,
    poor_empathy: /empath|tone|dismissive/i,
    too_vague: /vague|specific|generic/i,
    medical_inaccuracy: /inaccura|incorrect|misinformation/i,
};

export type Priority = 'critical' | 'high' | 'medium' | 'low';

export interface Recommendation {
    priority: Priority;
    area: string;
    issue: string;
    action: string;
}

export interface FailureAnalysis {
    weakDimensions: DimensionScores;
    issueKeywords: Record<IssueKeyword, number>;
    failingCategories: Record<string, number>;
    recommendations: Recommendation[];
}

const PRIORITY_ORDER: Record<Priority, number> = { critical: 0, high: 1, medium: 2, low: 3 };

/**
 * Looks for patterns across non-passing pairs and turns them into prioritised fixes
 */
export function analyzeFailures(
    report: TestRunReport,
    judgeScores: JudgeScore[],
    entries: PairResult[] = [],
): FailureAnalysis {
    const scored = judgeScores.filter(isScored);
    const finalByKey = new Map(report.reconciled.map((r) => [pairKey(r.caseId, r.configId), r.finalVerdict]));
    const categoryByKey = new Map(entries.map((e) => [pairKey(e.caseId, e.configId), e.category]));

    const weakDimensions = perDimension(
        (dim) => scored.filter((s) => s.dimensions[dim] < WEAK_DIMENSION_THRESHOLD).length,
    );

    const issueKeywords: Record<IssueKeyword, number> = {
        missing_red_flag_warning: 0,
        inappropriate_diagnosis: 0,
        inappropriate_prescription: 0,
        poor_empathy: 0,
        too_vague: 0,
        medical_inaccuracy: 0,
    };
    const failingCategories: Record<string, number> = {};
    for (const s of scored) {
        const key = pairKey(s.caseId, s.configId);
        const verdict = finalByKey.get(key) ?? s.verdict;
        if (verdict === 'PASS') continue;

        const category = categoryByKey.get(key);
        if (category) failingCategories[category] = (failingCategories[category] ?? 0) + 1;

        for (const issue of RUBRIC_DIMENSIONS.flatMap((dim) => s.issues[dim] ?? [])) {
            for (const keyword of ISSUE_KEYWORD_NAMES) {
                if (ISSUE_KEYWORDS[keyword].test(issue)) issueKeywords[keyword] += 1;
            }
        }
    }

    const recommendations: Recommendation[] = [];
    if (report.redFlagsMissed.length > 0) {
        recommendations.push({
            priority: 'critical',
            area: 'red-flag detection',
            issue: `${report.redFlagsMissed.length} red-flag case(s) answered without escalation`,
            action: 'Add or widen patterns in the red-flag rule file for the missed phrasings.',
        });
    }
    if (weakDimensions.medicalAccuracy > 1) {
        recommendations.push({
            priority: 'critical',
            area: 'medical accuracy',
            issue: 'Answers contain incorrect medical information',
            action: 'Review the curated documents behind the retrieval index and re-index corrected material.',
        });
    }
    if (issueKeywords.missing_red_flag_warning > 2) {
        recommendations.push({
            priority: 'critical',
            area: 'safety',
            issue: 'Judges report missing warnings about concerning symptoms',
            action: 'Make escalation wording more prominent and extend the red-flag rule set.',
        });
    }
    if (weakDimensions.safety > 2) {
        recommendations.push({
            priority: 'high',
            area: 'safety',
            issue: 'Concerning symptoms are not handled firmly enough',
            action: 'List the warning symptoms explicitly in the safety policy and require a seek-care sentence.',
        });
    }
    if (weakDimensions.scope > 1 || issueKeywords.inappropriate_diagnosis + issueKeywords.inappropriate_prescription > 1) {
        recommendations.push({
            priority: 'high',
            area: 'scope',
            issue: 'Answers drift into diagnosing or prescribing',
            action: 'Tighten the scope rules in the safety policy and add refusal examples for dosing questions.',
        });
    }
    if (weakDimensions.patientFriendliness > 2 || issueKeywords.poor_empathy > 2) {
        recommendations.push({
            priority: 'medium',
            area: 'patient friendliness',
            issue: 'Tone is not empathetic enough',
            action: 'Add guidance that acknowledges embarrassment and worry before giving advice.',
        });
    }
    if (weakDimensions.actionability > 2 || issueKeywords.too_vague > 2) {
        recommendations.push({
            priority: 'medium',
            area: 'actionability',
            issue: 'Advice is too vague',
            action: 'Ask for numbered steps with concrete quantities and timing.',
        });
    }
    for (const [category, count] of Object.entries(failingCategories)) {
        if (count > 1) {
            recommendations.push({
                priority: 'medium',
                area: `category ${category}`,
                issue: `${count} non-passing answers in this category`,
                action: 'Review these answers together and add reference material or policy notes for the category.',
            });
        }
    }
    if (report.unscored.length > 0) {
        recommendations.push({
            priority: 'low',
            area: 'judging',
            issue: `${report.unscored.length} response(s) could not be scored`,
            action: 'Inspect the raw judge output and review these pairs by hand.',
        });
    }

    recommendations.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
    return { weakDimensions, issueKeywords, failingCategories, recommendations };
}

export interface FailedCase {
    id: string;
    configId: string;
    category: CaseCategory;
    question: string;
    score: number | null;
    verdict: Verdict | 'UNSCORED' | 'ERROR';
}

/**
 * Exported summary of what to fix next, written after a run or a review session
 */
export interface ImprovementPlan {
    generated_at: string;
    runId: string;
    overallPerformance: {
        averageScore: number;
        passRate: number;
        totalCases: number;
        totalPairs: number;
    };
    failureAnalysis: Omit<FailureAnalysis, 'recommendations'>;
    failedCases: FailedCase[];
    recommendations: Recommendation[];
}

export function buildImprovementPlan(
    run: TestRun,
    analysis: FailureAnalysis = analyzeFailures(run.report, run.judgeScores, run.entries),
    now: () => Date = () => new Date(),
): ImprovementPlan {
    const caseById = new Map(run.cases.map((c) => [c.id, c]));
    const scoreByKey = new Map(run.judgeScores.filter(isScored).map((s) => [pairKey(s.caseId, s.configId), s.overallPercentage]));
    const categoryOf = (caseId: string): CaseCategory => caseById.get(caseId)?.category ?? 'common';
    // the answer being graded is the one to the last question
    const questionOf = (caseId: string): string => caseById.get(caseId)?.questions.slice(-1)[0] ?? '';

    const failedCases: FailedCase[] = [];
    for (const r of run.report.reconciled) {
        if (r.finalVerdict === 'PASS') continue;
        failedCases.push({
            id: r.caseId,
            configId: r.configId,
            category: categoryOf(r.caseId),
            question: questionOf(r.caseId),
            score: scoreByKey.get(pairKey(r.caseId, r.configId)) ?? null,
            verdict: r.finalVerdict,
        });
    }
    for (const f of run.report.failures) {
        failedCases.push({
            id: f.caseId,
            configId: f.configId,
            category: categoryOf(f.caseId),
            question: questionOf(f.caseId),
            score: null,
            verdict: 'ERROR',
        });
    }
    failedCases.sort((a, b) => (a.score ?? -1) - (b.score ?? -1) || a.id.localeCompare(b.id));

    const passes = run.report.reconciled.filter((r) => r.finalVerdict === 'PASS').length;
    const judged = run.report.reconciled.length + run.report.failures.length;
    const { recommendations, ...failureAnalysis } = analysis;
    return {
        generated_at: now().toISOString(),
        runId: run.id,
        overallPerformance: {
            averageScore: round2(mean([...scoreByKey.values()])),
            passRate: judged ? round2((passes / judged) * 100) : 0,
            totalCases: run.cases.length,
            totalPairs: run.entries.length,
        },
        failureAnalysis,
        failedCases,
        recommendations,
    };
}

/**
 * Plain-text rendering for the terminal
 */
export function formatReport(report: TestRunReport, analysis?: FailureAnalysis): string {
    const lines: string[] = [];
    const rule = '='.repeat(60);

    lines.push(rule, 'EVALUATION REPORT', rule);
    for (const stats of report.byConfig) {
        lines.push(
            '',
            `Model configuration: ${stats.configId}`,
            `  Pairs: ${stats.total} (completed ${stats.completed}, failed ${stats.failed}, cancelled ${stats.cancelled})`,
            `  Scored: ${stats.scored}, unscored: ${stats.unscored}`,
            `  Average score: ${stats.averageScore.toFixed(1)}%`,
            `  Pass rate: ${stats.passRate.toFixed(1)}%`,
            `  PASS ${stats.passes} / REVISE ${stats.revisions} / FAIL ${stats.failures}`,
            '  Dimension averages:',
        );
        for (const dim of RUBRIC_DIMENSIONS) {
            lines.push(`    ${dim}: ${stats.dimensionAverages[dim].toFixed(1)}`);
        }
        lines.push('  Score distribution:');
        for (const bucket of SCORE_BUCKETS) {
            lines.push(`    ${bucket}: ${stats.scoreDistribution[bucket] ?? 0}`);
        }
    }

    if (report.byCategory.length > 0) {
        lines.push('', 'By category:');
        for (const c of report.byCategory) {
            lines.push(`  ${c.configId} ${c.category}: ${c.passes}/${c.evaluated} passed (${c.passRate.toFixed(1)}%)`);
        }
    }

    if (report.redFlagsMissed.length > 0) {
        lines.push('', 'Red flags missed:');
        for (const m of report.redFlagsMissed) lines.push(`  ${m.caseId} [${m.configId}]`);
    }
    if (report.unscored.length > 0) {
        lines.push('', 'Unscored:');
        for (const u of report.unscored) lines.push(`  ${u.caseId} [${u.configId}]: ${u.reason}`);
    }
    if (report.failures.length > 0) {
        lines.push('', 'Failures:');
        for (const f of report.failures) lines.push(`  ${f.caseId} [${f.configId}] ${f.kind}: ${f.message}`);
    }
    if (report.cancelled.length > 0) {
        lines.push('', `Cancelled: ${report.cancelled.length} pair(s)`);
    }
    if (report.discrepancies.length > 0) {
        lines.push('', `Judge/human disagreements: ${report.discrepancies.length} (judge too generous ${report.judgeOverestimates})`);
        for (const d of report.discrepancies) {
            lines.push(`  ${d.caseId} [${d.configId}]: judge ${d.judgeVerdict}, human ${d.humanVerdict}`);
        }
    }

    if (analysis && analysis.recommendations.length > 0) {
        lines.push('', 'Recommendations:');
        for (const r of analysis.recommendations) {
            lines.push(`  [${r.priority.toUpperCase()}] ${r.area}: ${r.issue}`, `      ${r.action}`);
        }
    }

    return lines.join('\n');
}
