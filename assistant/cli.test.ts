import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@care-companion/shared';
import { describeSetupError, flagValue, flagValues, hasFlag, parsePositiveInt, positionals } from './cli';

const args = ['--models', 'models.json', '--cases', 'a.json', 'run_1', '--cases', 'b.json', '--no-judge', '--limit'];

describe('argument helpers', () => {
    it('reads single and repeated flag values', () => {
        expect(flagValue(args, 'models')).toBe('models.json');
        expect(flagValue(args, 'limit')).toBeUndefined();
        expect(flagValue(args, 'missing')).toBeUndefined();
        expect(flagValues(args, 'cases')).toEqual(['a.json', 'b.json']);
    });

    it('does not take the next flag as a value', () => {
        expect(flagValue(['--reviewer', '--notes', 'x'], 'reviewer')).toBeUndefined();
    });

    it('detects bare flags', () => {
        expect(hasFlag(args, 'no-judge')).toBe(true);
        expect(hasFlag(args, 'judge')).toBe(false);
    });

    it('skips flags and their values when collecting positionals', () => {
        expect(positionals(args, ['models', 'cases', 'limit'])).toEqual(['run_1']);
        expect(positionals(['show', 'run_2', '--json'], [])).toEqual(['show', 'run_2']);
    });
});

describe('parsePositiveInt', () => {
    it('accepts positive integers and passes undefined through', () => {
        expect(parsePositiveInt('4', 'concurrency')).toBe(4);
        expect(parsePositiveInt(undefined, 'concurrency')).toBeUndefined();
    });

    it('rejects anything else', () => {
        for (const raw of ['0', '-2', '1.5', 'many']) {
            expect(() => parsePositiveInt(raw, 'concurrency')).toThrow('--concurrency must be a positive integer');
        }
    });
});

describe('describeSetupError', () => {
    it('lists configuration issues one per line', () => {
        const err = new ConfigurationError('Invalid configuration', ['OPENAI_API_KEY is required', 'HISTORY_TURNS: bad']);
        expect(describeSetupError(err)).toBe(
            'Configuration error:\n  - OPENAI_API_KEY is required\n  - HISTORY_TURNS: bad',
        );
    });

    it('falls back to the error message', () => {
        expect(describeSetupError(new Error('disk full'))).toBe('Setup failed: disk full');
        expect(describeSetupError('odd')).toBe('Setup failed: odd');
    });
});
