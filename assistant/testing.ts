import { ModelResponse, RetrievedChunk } from '@care-companion/shared';
import { ModelConfig, PromptLimits, RubricConfig } from './config';
import { ResponseGenerator } from './generator';
import { GenerateOptions, LanguageModelProvider, ProviderPrompt } from './providers';
import { loadRedFlagDetector } from './red-flags';
import { RetryPolicy, Sleep } from './retry';
import { ConversationMemory, InMemorySessionRepository } from './session-store';
import { PatientContextService } from './tools/patientContext';
import { RetrievalIndex, StaticRetrievalIndex } from './tools/retrieval';

/**
 * In-process provider driven by a reply function. Records every call.
 */
export class ScriptedProvider implements LanguageModelProvider {
    readonly calls: Array<{ prompt: ProviderPrompt; options: GenerateOptions }> = [];

    constructor(
        readonly id: string,
        private readonly reply: (prompt: ProviderPrompt, call: number) => string | Promise<string>,
    ) {}

    async generate(prompt: ProviderPrompt, options: GenerateOptions): Promise<string> {
        this.calls.push({ prompt, options });
        return this.reply(prompt, this.calls.length);
    }

    lastQuestion(): string {
        const last = this.calls[this.calls.length - 1];
        const messages = last ? last.prompt.messages : [];
        return messages.length > 0 ? messages[messages.length - 1].content : '';
    }
}

export const testLimits: PromptLimits = {
    historyTurns: 5,
    maxPromptChars: 12000,
    maxContextChars: 6000,
};

export const testRetry: RetryPolicy = {
    retries: 2,
    timeoutMs: 1000,
    baseDelayMs: 100,
    maxDelayMs: 1000,
};

export const testRubric: RubricConfig = {
    version: 'rubric-test',
    weights: { medicalAccuracy: 1, safety: 1, patientFriendliness: 1, actionability: 1, scope: 1 },
    passThreshold: 80,
    reviseThreshold: 60,
    safetyFloor: 60,
};

export const testModel = (id: string): ModelConfig => ({
    id,
    provider: 'openai',
    model: id,
    temperature: 0.3,
    maxOutputTokens: 400,
});

export const sampleChunks: RetrievedChunk[] = [
    {
        sourceId: 'fibre-guide',
        text: 'Increase dietary fibre gradually to 25 to 30 grams a day and drink plenty of water to soften stools.',
        score: 0.91,
    },
    {
        sourceId: 'sitz-bath',
        text: 'A warm sitz bath for 10 to 15 minutes two or three times a day can ease hemorrhoid discomfort.',
        score: 0.84,
    },
];

export const noSleep = async (): Promise<void> => undefined;

export function buildGenerator(
    provider: LanguageModelProvider,
    options: {
        memory?: ConversationMemory;
        retrieval?: RetrievalIndex | null;
        patientContext?: PatientContextService | null;
        limits?: PromptLimits;
        sleep?: Sleep;
    } = {},
): { generator: ResponseGenerator; memory: ConversationMemory } {
    const memory = options.memory ?? new ConversationMemory(new InMemorySessionRepository());
    const generator = new ResponseGenerator(
        {
            provider,
            detector: loadRedFlagDetector(),
            memory,
            retrieval: options.retrieval === undefined ? new StaticRetrievalIndex(sampleChunks) : options.retrieval,
            patientContext: options.patientContext,
            sleep: options.sleep ?? noSleep,
        },
        { model: testModel(provider.id), prompt: options.limits ?? testLimits, retry: testRetry, topK: 4 },
    );
    return { generator, memory };
}

export const sampleResponse = (caseId: string, configId: string, text: string): ModelResponse => ({
    caseId,
    configId,
    text,
    chunks: [],
    latencyMs: 12,
    redFlag: false,
    degraded: false,
});

/**
 * Judge reply in the fenced format the rubric judge asks for
 */
export function judgeReply(
    scores: [number, number, number, number, number],
    extra: { issues?: string[]; summary?: string; overall?: number } = {},
): string {
    const [medicalAccuracy, safety, friendliness, actionability, scope] = scores;
    const dim = (score: number, issues: string[] = []) => ({ score, reasoning: `scored ${score}`, issues });
    const body = {
        medical_accuracy: dim(medicalAccuracy, extra.issues),
        safety: dim(safety),
        patient_friendliness: dim(friendliness),
        actionability: dim(actionability),
        scope: dim(scope),
        summary: extra.summary ?? 'Reasonable answer.',
        ...(extra.overall !== undefined ? { overall_percentage: extra.overall } : {}),
    };
    return `Here is my assessment.\n\`\`\`json\n${JSON.stringify(body, null, 2)}\n\`\`\``;
}
