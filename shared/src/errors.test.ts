import { describe, it, expect } from 'vitest';
import {
    ConfigurationError,
    GenerationError,
    PersistenceError,
    ProviderError,
    RetrievalError,
    errorMessage,
    httpStatusFor,
    isCareError,
} from './errors';

describe('care errors', () => {
    it('carries kind and class name', () => {
        const err = new RetrievalError('index down');
        expect(err.kind).toBe('retrieval');
        expect(err.name).toBe('RetrievalError');
        expect(isCareError(err)).toBe(true);
        expect(isCareError(new Error('plain'))).toBe(false);
    });

    it('joins configuration issues into the message', () => {
        const err = new ConfigurationError('Invalid configuration', ['A is required', 'B: too small']);
        expect(err.message).toBe('Invalid configuration: A is required; B: too small');
        expect(new ConfigurationError('Nothing listed').message).toBe('Nothing listed');
    });

    it('keeps the cause', () => {
        const cause = new Error('EACCES');
        expect(new PersistenceError('write failed', { cause }).cause).toBe(cause);
    });

    it('stringifies non-errors', () => {
        expect(errorMessage(new Error('x'))).toBe('x');
        expect(errorMessage(42)).toBe('42');
    });
});

describe('httpStatusFor', () => {
    it('maps upstream failures to 502 and local ones to 500', () => {
        expect(httpStatusFor(new ProviderError('rate limited', { retryable: true, status: 429 }))).toBe(502);
        expect(httpStatusFor(new GenerationError('gave up', 3))).toBe(502);
        expect(httpStatusFor(new PersistenceError('disk full'))).toBe(500);
    });

    it('keeps client error codes set by the framework', () => {
        expect(httpStatusFor(Object.assign(new Error('Body is too large'), { statusCode: 413 }))).toBe(413);
        expect(httpStatusFor(Object.assign(new Error('weird'), { statusCode: 302 }))).toBe(500);
        expect(httpStatusFor('nope')).toBe(500);
    });
});
