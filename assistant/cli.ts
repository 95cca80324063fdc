import { ConfigurationError, errorMessage } from '@care-companion/shared';

/**
 * Value following `--name`, or undefined
 */
export function flagValue(args: string[], name: string): string | undefined {
    const index = args.indexOf(`--${name}`);
    if (index === -1) return undefined;
    const value = args[index + 1];
    return value !== undefined && !value.startsWith('--') ? value : undefined;
}

/**
 * Every value of a repeatable flag, in order
 */
export function flagValues(args: string[], name: string): string[] {
    const values: string[] = [];
    args.forEach((arg, i) => {
        const value = args[i + 1];
        if (arg === `--${name}` && value !== undefined && !value.startsWith('--')) {
            values.push(value);
        }
    });
    return values;
}

export function hasFlag(args: string[], name: string): boolean {
    return args.includes(`--${name}`);
}

/**
 * Arguments that are neither flags nor flag values
 */
export function positionals(args: string[], valueFlags: string[]): string[] {
    const result: string[] = [];
    for (let i = 0; i < args.length; i += 1) {
        const arg = args[i];
        if (arg.startsWith('--')) {
            if (valueFlags.includes(arg.slice(2))) i += 1;
            continue;
        }
        result.push(arg);
    }
    return result;
}

export function describeSetupError(err: unknown): string {
    if (err instanceof ConfigurationError) {
        return ['Configuration error:', ...err.issues.map((i) => `  - ${i}`)].join('\n');
    }
    return `Setup failed: ${errorMessage(err)}`;
}

export function exitOnSetupError(err: unknown): never {
    console.error(`✗ ${describeSetupError(err)}`);
    process.exit(1);
}

export function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError('Invalid arguments', [`--${name} must be a positive integer`]);
    }
    return value;
}
