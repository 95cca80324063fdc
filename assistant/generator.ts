import {
    GenerationError,
    Message,
    PatientContext,
    PersistenceError,
    ProviderError,
    RetrievedChunk,
    Severity,
    TurnState,
    createLogger,
    errorMessage,
} from '@care-companion/shared';
import { ModelConfig, PromptLimits } from './config';
import { composePrompt } from './context';
import { FALLBACK_MESSAGE } from './policy';
import { LanguageModelProvider } from './providers';
import { RedFlagDetector, RedFlagMatch, compareSeverity } from './red-flags';
import { RetryPolicy, Sleep, defaultSleep, withBackoff } from './retry';
import { ConversationMemory, NewMessage } from './session-store';
import { PatientContextService } from './tools/patientContext';
import { RetrievalIndex } from './tools/retrieval';

const log = createLogger('generator');

export interface GeneratorDeps {
    provider: LanguageModelProvider;
    detector: RedFlagDetector;
    memory: ConversationMemory;
    retrieval?: RetrievalIndex | null;
    patientContext?: PatientContextService | null;
    sleep?: Sleep;
}

export interface GeneratorSettings {
    model: Pick<ModelConfig, 'temperature' | 'maxOutputTokens'>;
    prompt: PromptLimits;
    retry: RetryPolicy;
    topK: number;
}

export interface TurnRequest {
    sessionId: string;
    text: string;
    userId?: string;
    signal?: AbortSignal;
}

export interface TurnOutcome {
    sessionId: string;
    answer: string;
    trace: TurnState[];
    redFlag: boolean;
    severity?: Severity;
    matchedRuleIds: string[];
    escalationTexts: string[];
    chunks: RetrievedChunk[];
    degraded: {
        retrieval: boolean;
        generation: boolean;
    };
    attempts: number;
    promptLength: number;
    latencyMs: number;
    generationError?: GenerationError;
    persistenceError?: PersistenceError;
}

const toPersistenceError = (err: unknown): PersistenceError =>
    err instanceof PersistenceError ? err : new PersistenceError(errorMessage(err), { cause: err });

/**
 * Highest severity first, input order within a severity
 */
function orderMatches(matches: RedFlagMatch[]): RedFlagMatch[] {
    return matches
        .map((match, index) => ({ match, index }))
        .sort((a, b) => compareSeverity(b.match.severity, a.match.severity) || a.index - b.index)
        .map(({ match }) => match);
}

/**
 * Appends each distinct escalation text once. Existing content is never removed.
 */
export function applyEscalations(draft: string, escalations: string[]): string {
    let answer = draft;
    for (const text of escalations) {
        if (!answer.includes(text)) {
            answer = `${answer.trimEnd()}\n\n${text}`;
        }
    }
    return answer;
}

/**
 * Runs one user turn through retrieval, prompt composition, red-flag checks,
 * generation and the memory update.
 */
export class ResponseGenerator {
    private sleep: Sleep;

    constructor(
        private readonly deps: GeneratorDeps,
        private readonly settings: GeneratorSettings,
    ) {
        this.sleep = deps.sleep ?? defaultSleep;
    }

    get providerId(): string {
        return this.deps.provider.id;
    }

    async respond(request: TurnRequest): Promise<TurnOutcome> {
        const started = Date.now();
        const trace: TurnState[] = [TurnState.RECEIVED];
        const { sessionId } = request;
        const question = request.text.trim();
        if (!question) {
            throw new RangeError('Question text is empty');
        }

        let persistenceError: PersistenceError | undefined;

        let patientContext: PatientContext | null = null;
        if (request.userId && this.deps.patientContext) {
            try {
                patientContext = await this.deps.patientContext.lookup(request.userId);
            } catch (err) {
                log.warn({ sessionId, err: errorMessage(err) }, 'Patient context lookup failed, answering without it');
            }
            if (patientContext) {
                try {
                    await this.deps.memory.setPatientContext(sessionId, patientContext);
                } catch (err) {
                    persistenceError = toPersistenceError(err);
                    log.error({ sessionId, err: persistenceError.message }, 'Could not store patient context');
                }
            }
        }

        trace.push(TurnState.RETRIEVING);
        let chunks: RetrievedChunk[] = [];
        let retrievalDegraded = false;
        if (this.deps.retrieval) {
            try {
                chunks = await this.deps.retrieval.search(question, this.settings.topK);
            } catch (err) {
                retrievalDegraded = true;
                log.warn({ sessionId, err: errorMessage(err) }, 'Retrieval failed, answering without reference material');
            }
        }

        trace.push(TurnState.COMPOSING);
        let history: Message[] = [];
        const historySize = this.settings.prompt.historyTurns * 2;
        try {
            history = await this.deps.memory.historyWindow(sessionId, historySize);
            if (request.userId && history.length < historySize) {
                const earlier = await this.deps.memory.recentContext(request.userId, historySize - history.length, {
                    excludeSessionId: sessionId,
                });
                history = [...earlier, ...history];
            }
        } catch (err) {
            persistenceError = toPersistenceError(err);
            log.error({ sessionId, err: persistenceError.message }, 'Could not read history');
        }
        const payload = composePrompt({ question, history, chunks, patientContext }, this.settings.prompt);

        trace.push(TurnState.RED_FLAG_CHECK_PRE);
        const preMatches = this.deps.detector.detectAll(question);
        if (preMatches.length > 0) {
            log.warn({ sessionId, rules: preMatches.map((m) => m.ruleId) }, 'Red flag in user message');
        }

        trace.push(TurnState.GENERATING);
        const outcome = await withBackoff(
            async () => {
                const text = await this.deps.provider.generate(payload, {
                    temperature: this.settings.model.temperature,
                    maxOutputTokens: this.settings.model.maxOutputTokens,
                    timeoutMs: this.settings.retry.timeoutMs,
                    signal: request.signal,
                });
                if (!text.trim()) {
                    throw new ProviderError('Empty completion', { retryable: true });
                }
                return text;
            },
            this.settings.retry,
            this.sleep,
            (attempt, delayMs, err) =>
                log.warn({ sessionId, attempt, delayMs, err: errorMessage(err) }, 'Generation attempt failed, retrying'),
        );

        let draft: string;
        let generationError: GenerationError | undefined;
        if (outcome.value !== undefined) {
            draft = outcome.value;
        } else {
            generationError = new GenerationError(
                `Generation failed after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`,
                outcome.attempts,
                { cause: outcome.error },
            );
            log.error({ sessionId, provider: this.deps.provider.id, attempts: outcome.attempts }, generationError.message);
            draft = FALLBACK_MESSAGE;
        }

        trace.push(TurnState.RED_FLAG_CHECK_POST);
        // the fallback text is ours, only model drafts are checked
        const postMatches = generationError ? [] : this.deps.detector.detectAll(draft);
        const seen = new Set<string>();
        const allMatches = orderMatches(
            [...preMatches, ...postMatches].filter((m) => {
                if (seen.has(m.ruleId)) return false;
                seen.add(m.ruleId);
                return true;
            }),
        );
        const escalationTexts = [...new Set(allMatches.map((m) => m.escalation))];
        const answer = applyEscalations(draft, escalationTexts);
        const severity = allMatches[0]?.severity;
        const orderedPre = orderMatches(preMatches);

        trace.push(TurnState.FINALIZED);
        try {
            const turn: NewMessage[] = [
                {
                    role: 'user',
                    text: question,
                    ...(orderedPre.length > 0
                        ? {
                              redFlag: true,
                              severity: orderedPre[0].severity,
                              escalationText: orderedPre[0].escalation,
                              matchedRuleIds: orderedPre.map((m) => m.ruleId),
                          }
                        : { redFlag: false }),
                },
                {
                    role: 'assistant',
                    text: answer,
                    ...(allMatches.length > 0
                        ? {
                              redFlag: true,
                              severity,
                              escalationText: escalationTexts.join('\n\n'),
                              matchedRuleIds: allMatches.map((m) => m.ruleId),
                          }
                        : { redFlag: false }),
                },
            ];
            await this.deps.memory.appendTurn(sessionId, turn, { userId: request.userId });
        } catch (err) {
            persistenceError = toPersistenceError(err);
            log.error({ sessionId, err: persistenceError.message }, 'Could not persist turn');
        }

        const latencyMs = Date.now() - started;
        log.info(
            {
                sessionId,
                provider: this.deps.provider.id,
                latencyMs,
                chunks: payload.includedChunks.length,
                redFlag: allMatches.length > 0,
                attempts: outcome.attempts,
            },
            'Turn finalized',
        );

        return {
            sessionId,
            answer,
            trace,
            redFlag: allMatches.length > 0,
            severity,
            matchedRuleIds: allMatches.map((m) => m.ruleId),
            escalationTexts,
            chunks: payload.includedChunks,
            degraded: { retrieval: retrievalDegraded, generation: generationError !== undefined },
            attempts: outcome.attempts,
            promptLength: payload.length,
            latencyMs,
            generationError,
            persistenceError,
        };
    }
}
