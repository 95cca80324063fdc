import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ProviderError, createLogger, errorMessage } from '@care-companion/shared';
import { ModelConfig } from './config';

const log = createLogger('provider');

export interface ChatTurn {
    role: 'user' | 'assistant';
    content: string;
}

export interface ProviderPrompt {
    system: string;
    messages: ChatTurn[];
}

export interface GenerateOptions {
    temperature: number;
    maxOutputTokens: number;
    timeoutMs?: number;
    signal?: AbortSignal;
}

/**
 * Capability every model backend implements. Variants are chosen by configuration.
 */
export interface LanguageModelProvider {
    readonly id: string;
    generate(prompt: ProviderPrompt, options: GenerateOptions): Promise<string>;
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);

export function toProviderError(err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    if (err instanceof OpenAI.APIUserAbortError) {
        return new ProviderError('Request aborted', { retryable: false, cause: err });
    }
    if (err instanceof OpenAI.APIConnectionError) {
        // includes APIConnectionTimeoutError
        return new ProviderError(`Provider unreachable: ${err.message}`, { retryable: true, cause: err });
    }
    if (err instanceof OpenAI.APIError) {
        const status = err.status;
        const retryable = status === undefined || RETRYABLE_STATUS.has(status) || status >= 500;
        return new ProviderError(`Provider error ${status ?? ''}: ${err.message}`.trim(), {
            retryable,
            status,
            cause: err,
        });
    }
    return new ProviderError(errorMessage(err), { retryable: false, cause: err });
}

/**
 * Chat-completions backend on the openai SDK. Also serves any endpoint that speaks
 * the same API (local model servers, routers) through `baseURL`.
 */
export class OpenAIChatProvider implements LanguageModelProvider {
    readonly id: string;

    constructor(
        private readonly client: OpenAI,
        private readonly model: string,
        id?: string,
    ) {
        this.id = id ?? model;
    }

    async generate(prompt: ProviderPrompt, options: GenerateOptions): Promise<string> {
        const messages: ChatCompletionMessageParam[] = [
            { role: 'system', content: prompt.system },
            ...prompt.messages.map(
                (m): ChatCompletionMessageParam =>
                    m.role === 'user' ? { role: 'user', content: m.content } : { role: 'assistant', content: m.content },
            ),
        ];

        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages,
                    temperature: options.temperature,
                    max_tokens: options.maxOutputTokens,
                },
                {
                    timeout: options.timeoutMs,
                    signal: options.signal,
                    maxRetries: 0,
                },
            );

            const content = response.choices[0]?.message?.content;
            if (!content || !content.trim()) {
                throw new ProviderError('Empty completion', { retryable: true });
            }
            return content;
        } catch (err) {
            const providerError = toProviderError(err);
            log.warn({ provider: this.id, retryable: providerError.retryable, status: providerError.status }, providerError.message);
            throw providerError;
        }
    }
}

export function createProvider(modelConfig: ModelConfig, apiKey: string): LanguageModelProvider {
    switch (modelConfig.provider) {
        case 'openai':
            return new OpenAIChatProvider(new OpenAI({ apiKey, maxRetries: 0 }), modelConfig.model, modelConfig.id);
        case 'openai-compatible':
            return new OpenAIChatProvider(
                new OpenAI({
                    // local servers usually ignore the key, the SDK still wants one
                    apiKey: apiKey || 'unused',
                    baseURL: modelConfig.baseUrl,
                    maxRetries: 0,
                }),
                modelConfig.model,
                modelConfig.id,
            );
    }
}
