/**
 * Per-turn state machine of the response pipeline
 */
export enum TurnState {
    RECEIVED = 'RECEIVED',
    RETRIEVING = 'RETRIEVING',
    COMPOSING = 'COMPOSING',
    RED_FLAG_CHECK_PRE = 'RED_FLAG_CHECK_PRE',
    GENERATING = 'GENERATING',
    RED_FLAG_CHECK_POST = 'RED_FLAG_CHECK_POST',
    FINALIZED = 'FINALIZED',
}

export type MessageRole = 'user' | 'assistant' | 'system-note';

export type Severity = 'high' | 'medium' | 'low';

/**
 * One entry of a session log. Frozen once appended.
 */
export interface Message {
    role: MessageRole;
    text: string;
    timestamp: string; // ISO timestamp
    redFlag?: boolean;
    escalationText?: string;
    severity?: Severity;
    matchedRuleIds?: string[];
}

/**
 * Snapshot of what the patient-context service knows about a user
 */
export interface PatientContext {
    userId: string;
    ageRange?: string;
    pregnant?: boolean;
    conditions?: string[];
    medications?: string[];
    notes?: string;
}

export interface Session {
    id: string;
    userId?: string;
    created_at: string;
    updated_at: string;
    patientContext?: PatientContext;
    messages: Message[];
}

export interface RetrievedChunk {
    sourceId: string;
    text: string;
    score: number;
}

export const CASE_CATEGORIES = [
    'common',
    'red-flag',
    'edge-case',
    'emotional-support',
    'follow-up',
    'myth',
    'pregnancy-safety',
] as const;

export type CaseCategory = (typeof CASE_CATEGORIES)[number];

export interface EvaluationCase {
    id: string;
    category: CaseCategory;
    questions: string[];
    referenceNotes?: string;
    expectedElements?: string[];
    expectedRedFlags?: string[];
}

export interface ModelResponse {
    caseId: string;
    configId: string;
    text: string;
    chunks: RetrievedChunk[];
    latencyMs: number;
    redFlag: boolean;
    severity?: Severity;
    degraded: boolean;
}

export const RUBRIC_DIMENSIONS = [
    'medicalAccuracy',
    'safety',
    'patientFriendliness',
    'actionability',
    'scope',
] as const;

export type RubricDimension = (typeof RUBRIC_DIMENSIONS)[number];

export type DimensionScores = Record<RubricDimension, number>;

export type Verdict = 'PASS' | 'REVISE' | 'FAIL';

export interface ScoredJudgement {
    status: 'scored';
    caseId: string;
    configId: string;
    rubricVersion: string;
    dimensions: DimensionScores;
    overallPercentage: number;
    verdict: Verdict;
    rationale: string;
    issues: Partial<Record<RubricDimension, string[]>>;
}

export interface UnscoredJudgement {
    status: 'unscored';
    caseId: string;
    configId: string;
    rubricVersion: string;
    reason: string;
    rawOutput?: string;
}

export type JudgeScore = ScoredJudgement | UnscoredJudgement;

export interface HumanScore {
    caseId: string;
    configId: string;
    reviewerId: string;
    dimensions: DimensionScores;
    notes: string;
    verdict: Verdict;
    submittedAt: string;
    sequence: number;
}

export type PairStatus = 'completed' | 'failed' | 'cancelled';

/**
 * Result of running one (case, model configuration) pair
 */
export interface PairResult {
    caseId: string;
    configId: string;
    category: CaseCategory;
    status: PairStatus;
    response?: ModelResponse;
    error?: {
        kind: string;
        message: string;
    };
}

export type ReconciledSource = 'human' | 'judge' | 'none';

export interface ReconciledVerdict {
    caseId: string;
    configId: string;
    judgeVerdict: Verdict | 'UNSCORED' | null;
    humanVerdict: Verdict | null;
    finalVerdict: Verdict | 'UNSCORED';
    source: ReconciledSource;
    reviewCount: number;
    discrepancy: 'overestimate' | 'underestimate' | null;
}

export interface ConfigStats {
    configId: string;
    total: number;
    completed: number;
    failed: number;
    cancelled: number;
    scored: number;
    unscored: number;
    passes: number;
    revisions: number;
    failures: number;
    passRate: number;
    averageScore: number;
    dimensionAverages: DimensionScores;
    scoreDistribution: Record<string, number>;
}

export interface CategoryStats {
    configId: string;
    category: CaseCategory;
    evaluated: number;
    passes: number;
    passRate: number;
}

export interface TestRunReport {
    generated_at: string;
    byConfig: ConfigStats[];
    byCategory: CategoryStats[];
    redFlagsMissed: Array<{ caseId: string; configId: string }>;
    unscored: Array<{ caseId: string; configId: string; reason: string }>;
    failures: Array<{ caseId: string; configId: string; kind: string; message: string }>;
    cancelled: Array<{ caseId: string; configId: string }>;
    discrepancies: ReconciledVerdict[];
    judgeOverestimates: number;
    reconciled: ReconciledVerdict[];
}

export interface TestRun {
    id: string;
    started_at: string;
    completed_at: string;
    configIds: string[];
    cases: EvaluationCase[];
    entries: PairResult[];
    judgeScores: JudgeScore[];
    humanScores: HumanScore[];
    report: TestRunReport;
}

/**
 * API response wrapper
 */
export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: string;
}
