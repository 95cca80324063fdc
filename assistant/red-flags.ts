import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError, Severity } from '@care-companion/shared';
import defaultRuleFile from './data/red-flag-rules.json';

export interface RedFlagRule {
    id: string;
    description: string;
    severity: Severity;
    pattern: string;
    escalation: string;
}

export interface RedFlagMatch {
    ruleId: string;
    severity: Severity;
    escalation: string;
    matchedText: string;
}

const SEVERITY_RANK: Record<Severity, number> = { high: 3, medium: 2, low: 1 };

const ruleSchema = z.object({
    id: z.string().min(1),
    description: z.string().default(''),
    severity: z.enum(['high', 'medium', 'low']),
    pattern: z.string().min(1),
    escalation: z.string().min(1),
});

const ruleFileSchema = z.object({
    version: z.string().optional(),
    rules: z.array(ruleSchema).min(1),
});

interface CompiledRule {
    rule: RedFlagRule;
    regex: RegExp;
}

/**
 * Immutable, ordered rule set. Declaration order breaks severity ties.
 */
export class RedFlagDetector {
    private readonly compiled: ReadonlyArray<CompiledRule>;

    constructor(rules: RedFlagRule[]) {
        const seen = new Set<string>();
        this.compiled = Object.freeze(
            rules.map((rule) => {
                if (seen.has(rule.id)) {
                    throw new ConfigurationError('Invalid red-flag rules', [`duplicate rule id ${rule.id}`]);
                }
                seen.add(rule.id);
                let regex: RegExp;
                try {
                    regex = new RegExp(rule.pattern, 'i');
                } catch (err) {
                    throw new ConfigurationError('Invalid red-flag rules', [
                        `rule ${rule.id}: ${err instanceof Error ? err.message : String(err)}`,
                    ]);
                }
                return { rule: Object.freeze({ ...rule }), regex };
            }),
        );
    }

    get rules(): RedFlagRule[] {
        return this.compiled.map((c) => c.rule);
    }

    /**
     * Every matching rule, in declaration order
     */
    detectAll(text: string): RedFlagMatch[] {
        const matches: RedFlagMatch[] = [];
        for (const { rule, regex } of this.compiled) {
            const found = regex.exec(text);
            if (found) {
                matches.push({
                    ruleId: rule.id,
                    severity: rule.severity,
                    escalation: rule.escalation,
                    matchedText: found[0],
                });
            }
        }
        return matches;
    }

    /**
     * Highest-severity match, first declared on ties, or null
     */
    detect(text: string): RedFlagMatch | null {
        let best: RedFlagMatch | null = null;
        for (const match of this.detectAll(text)) {
            if (!best || SEVERITY_RANK[match.severity] > SEVERITY_RANK[best.severity]) {
                best = match;
            }
        }
        return best;
    }
}

export function parseRedFlagRules(raw: unknown): RedFlagRule[] {
    const parsed = ruleFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid red-flag rules',
            parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
    }
    return parsed.data.rules;
}

/**
 * Loads the rule file once; the detector it returns is shared by every component.
 * Without a path the bundled rule set is used.
 */
export function loadRedFlagDetector(filePath?: string): RedFlagDetector {
    if (!filePath) {
        return new RedFlagDetector(parseRedFlagRules(defaultRuleFile));
    }
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
        throw new ConfigurationError(`Cannot read red-flag rules from ${filePath}`, [
            err instanceof Error ? err.message : String(err),
        ]);
    }
    return new RedFlagDetector(parseRedFlagRules(raw));
}

export function compareSeverity(a: Severity, b: Severity): number {
    return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}
