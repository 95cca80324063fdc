import { AppConfig, ModelConfig } from './config';
import { ResponseGenerator } from './generator';
import { EvaluationHarness, GeneratorFactory } from './harness';
import { RubricJudge } from './judge';
import { LanguageModelProvider, createProvider } from './providers';
import { RedFlagDetector, loadRedFlagDetector } from './red-flags';
import { FileTestRunRepository, TestRunRepository } from './run-store';
import { ConversationMemory, FileSessionRepository, SessionRepository } from './session-store';
import { HttpPatientContextService, PatientContextService } from './tools/patientContext';
import { HttpRetrievalIndex, RetrievalIndex } from './tools/retrieval';

export interface PipelineOverrides {
    detector?: RedFlagDetector;
    sessions?: SessionRepository;
    runs?: TestRunRepository;
    retrieval?: RetrievalIndex | null;
    patientContext?: PatientContextService | null;
    providerFor?: (model: ModelConfig) => LanguageModelProvider;
}

export interface Pipeline {
    config: AppConfig;
    detector: RedFlagDetector;
    memory: ConversationMemory;
    retrieval: RetrievalIndex | null;
    patientContext: PatientContextService | null;
    runs: TestRunRepository;
    generator: ResponseGenerator;
    createGenerator: GeneratorFactory;
    judge: RubricJudge;
    harness: EvaluationHarness;
}

/**
 * Wires every component from one immutable configuration. Overrides replace
 * the external adapters (tests, offline runs).
 */
export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
    const detector = overrides.detector ?? loadRedFlagDetector(config.redFlagRulesFile);
    const providerFor = overrides.providerFor ?? ((model: ModelConfig) => createProvider(model, config.openaiApiKey));

    const retrieval =
        overrides.retrieval !== undefined
            ? overrides.retrieval
            : config.retrieval.baseUrl
              ? new HttpRetrievalIndex(config.retrieval.baseUrl, { timeoutMs: config.retrieval.timeoutMs })
              : null;
    const patientContext =
        overrides.patientContext !== undefined
            ? overrides.patientContext
            : config.patientContextBaseUrl
              ? new HttpPatientContextService(config.patientContextBaseUrl)
              : null;

    const createGenerator: GeneratorFactory = (model, memory) =>
        new ResponseGenerator(
            { provider: providerFor(model), detector, memory, retrieval, patientContext },
            { model, prompt: config.prompt, retry: config.generation, topK: config.retrieval.topK },
        );

    const memory = new ConversationMemory(
        overrides.sessions ?? new FileSessionRepository(config.sessionDir),
        undefined,
        config.sessionCacheSize,
    );
    const judge = new RubricJudge({
        provider: providerFor(config.judgeModel),
        rubric: config.rubric,
        maxOutputTokens: config.judgeModel.maxOutputTokens,
        retry: config.generation,
    });

    return {
        config,
        detector,
        memory,
        retrieval,
        patientContext,
        runs: overrides.runs ?? new FileTestRunRepository(config.resultsDir),
        generator: createGenerator(config.chatModel, memory),
        createGenerator,
        judge,
        harness: new EvaluationHarness(createGenerator, config.evaluation),
    };
}
