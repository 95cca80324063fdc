import { z } from 'zod';
import { HttpClient, RetrievalError, RetrievedChunk, errorMessage } from '@care-companion/shared';

/**
 * Semantic search over the curated document collection
 */
export interface RetrievalIndex {
    search(query: string, k: number): Promise<RetrievedChunk[]>;
}

const searchResponseSchema = z.object({
    results: z.array(
        z.object({
            sourceId: z.string(),
            text: z.string(),
            score: z.number(),
        }),
    ),
});

/**
 * Adapter for a remote vector index exposing `POST /search { query, k }`
 */
export class HttpRetrievalIndex implements RetrievalIndex {
    private http: HttpClient;

    constructor(baseUrl: string, options: { timeoutMs?: number; retries?: number } = {}) {
        this.http = new HttpClient(baseUrl, { timeoutMs: options.timeoutMs, retries: options.retries ?? 1 });
    }

    async search(query: string, k: number): Promise<RetrievedChunk[]> {
        let body: unknown;
        try {
            body = await this.http.post('/search', { query, k });
        } catch (err) {
            throw new RetrievalError(`Retrieval index unavailable: ${errorMessage(err)}`, { cause: err });
        }

        const parsed = searchResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new RetrievalError(`Malformed retrieval response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }
        return parsed.data.results.slice(0, k);
    }
}

/**
 * Fixed chunk list ranked by naive term overlap. Used offline and in tests.
 */
export class StaticRetrievalIndex implements RetrievalIndex {
    constructor(private readonly chunks: RetrievedChunk[]) {}

    async search(query: string, k: number): Promise<RetrievedChunk[]> {
        const terms = new Set(
            query
                .toLowerCase()
                .split(/\W+/)
                .filter((t) => t.length > 3),
        );
        return this.chunks
            .map((chunk) => {
                const words = chunk.text.toLowerCase().split(/\W+/);
                const hits = words.filter((w) => terms.has(w)).length;
                return { chunk, hits };
            })
            .filter(({ hits }) => hits > 0)
            .sort((a, b) => b.hits - a.hits)
            .slice(0, k)
            .map(({ chunk }) => chunk);
    }
}
