import OpenAI from 'openai';
import { describe, it, expect } from 'vitest';
import { ProviderError } from '@care-companion/shared';
import { OpenAIChatProvider, createProvider, toProviderError } from './providers';

describe('toProviderError', () => {
    it('keeps provider errors as they are', () => {
        const original = new ProviderError('already mapped', { retryable: true });
        expect(toProviderError(original)).toBe(original);
    });

    it('retries rate limits and server errors but not auth failures', () => {
        const limited = toProviderError(new OpenAI.RateLimitError(429, undefined, 'slow down', undefined));
        expect(limited.retryable).toBe(true);
        expect(limited.status).toBe(429);

        const server = toProviderError(new OpenAI.InternalServerError(503, undefined, 'overloaded', undefined));
        expect(server.retryable).toBe(true);

        const auth = toProviderError(new OpenAI.AuthenticationError(401, undefined, 'invalid api key', undefined));
        expect(auth.retryable).toBe(false);
        expect(auth.status).toBe(401);
        expect(auth.message).toMatch(/^Provider error 401: .*invalid api key$/);
    });

    it('retries connection failures', () => {
        const mapped = toProviderError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));
        expect(mapped.retryable).toBe(true);
        expect(mapped.message).toBe('Provider unreachable: socket hang up');
    });

    it('does not retry aborted requests or unknown errors', () => {
        expect(toProviderError(new OpenAI.APIUserAbortError()).message).toBe('Request aborted');
        expect(toProviderError(new OpenAI.APIUserAbortError()).retryable).toBe(false);
        const plain = toProviderError(new Error('boom'));
        expect(plain.retryable).toBe(false);
        expect(plain.message).toBe('boom');
    });
});

describe('createProvider', () => {
    it('builds chat-completions providers named by the configuration id', () => {
        const provider = createProvider(
            { id: 'local-llama', provider: 'openai-compatible', model: 'llama3', baseUrl: 'http://localhost:11434/v1', temperature: 0, maxOutputTokens: 300 },
            '',
        );
        expect(provider).toBeInstanceOf(OpenAIChatProvider);
        expect(provider.id).toBe('local-llama');
    });
});
