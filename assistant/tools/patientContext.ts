import { z } from 'zod';
import { HttpClient, PatientContext, createLogger, errorMessage } from '@care-companion/shared';

const log = createLogger('patient-context');

export interface PatientContextService {
    lookup(userId: string): Promise<PatientContext | null>;
}

const patientContextSchema = z.object({
    ageRange: z.string().optional(),
    pregnant: z.boolean().optional(),
    conditions: z.array(z.string()).optional(),
    medications: z.array(z.string()).optional(),
    notes: z.string().optional(),
});

/**
 * Reads `GET /patients/:id/context`. Any failure degrades to "no context".
 */
export class HttpPatientContextService implements PatientContextService {
    private http: HttpClient;

    constructor(baseUrl: string, options: { timeoutMs?: number } = {}) {
        this.http = new HttpClient(baseUrl, { timeoutMs: options.timeoutMs ?? 3000, retries: 1 });
    }

    async lookup(userId: string): Promise<PatientContext | null> {
        try {
            const data = await this.http.getEnvelope(`/patients/${encodeURIComponent(userId)}/context`);
            if (data === undefined || data === null) return null;
            const parsed = patientContextSchema.safeParse(data);
            if (!parsed.success) {
                log.warn({ userId }, 'Ignoring malformed patient context');
                return null;
            }
            return { userId, ...parsed.data };
        } catch (err) {
            log.warn({ userId, err: errorMessage(err) }, 'Patient context lookup failed');
            return null;
        }
    }
}

/**
 * Fixed contexts keyed by user id
 */
export class StaticPatientContextService implements PatientContextService {
    private contexts: Map<string, PatientContext>;

    constructor(contexts: PatientContext[] = []) {
        this.contexts = new Map(contexts.map((c) => [c.userId, c]));
    }

    async lookup(userId: string): Promise<PatientContext | null> {
        return this.contexts.get(userId) ?? null;
    }
}
