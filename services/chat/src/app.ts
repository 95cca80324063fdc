import Fastify from 'fastify';
import { ZodError, z } from 'zod';
import { ApiResponse, Message, errorMessage, httpStatusFor, rootLogger } from '@care-companion/shared';
import { ConversationMemory, PatientHistorySummary, ResponseGenerator, SessionSummary } from '@care-companion/assistant';

export interface ChatAppDeps {
    generator: ResponseGenerator;
    memory: ConversationMemory;
}

const turnBodySchema = z.object({
    text: z.string().trim().min(1, 'text must not be empty'),
    userId: z.string().trim().min(1).optional(),
});

const messagesQuerySchema = z.object({
    limit: z.coerce.number().int().positive().max(500).default(50),
});

export interface TurnReply {
    sessionId: string;
    answer: string;
    redFlag: boolean;
    severity?: string;
    matchedRuleIds: string[];
    sources: string[];
    degraded: {
        retrieval: boolean;
        generation: boolean;
    };
    attempts: number;
    latencyMs: number;
    persisted: boolean;
}

/**
 * HTTP surface over the response pipeline and the conversation memory
 */
export function buildChatApp(deps: ChatAppDeps) {
    const app = Fastify({ logger: rootLogger.child({ module: 'chat-service' }) });

    app.setErrorHandler((error: Error, request, reply) => {
        if (error instanceof ZodError) {
            const response: ApiResponse = {
                success: false,
                error: error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
            };
            return reply.code(400).send(response);
        }
        const status = httpStatusFor(error);
        if (status >= 500) {
            request.log.error({ err: errorMessage(error) }, 'Request failed');
        }
        const response: ApiResponse = {
            success: false,
            error: status >= 500 ? 'Internal error' : errorMessage(error),
        };
        return reply.code(status).send(response);
    });

    /**
     * POST /sessions/:id/turns - Answer one patient message
     */
    app.post<{ Params: { id: string }; Body: unknown }>('/sessions/:id/turns', async (request, reply) => {
        const body = turnBodySchema.parse(request.body);
        const outcome = await deps.generator.respond({
            sessionId: request.params.id,
            text: body.text,
            userId: body.userId,
        });

        const response: ApiResponse<TurnReply> = {
            success: true,
            data: {
                sessionId: outcome.sessionId,
                answer: outcome.answer,
                redFlag: outcome.redFlag,
                severity: outcome.severity,
                matchedRuleIds: outcome.matchedRuleIds,
                sources: [...new Set(outcome.chunks.map((c) => c.sourceId))],
                degraded: outcome.degraded,
                attempts: outcome.attempts,
                latencyMs: outcome.latencyMs,
                persisted: outcome.persistenceError === undefined,
            },
        };
        return reply.send(response);
    });

    /**
     * GET /sessions/:id/messages - Most recent messages, oldest first
     */
    app.get<{ Params: { id: string }; Querystring: unknown }>('/sessions/:id/messages', async (request, reply) => {
        const { limit } = messagesQuerySchema.parse(request.query);
        const messages = await deps.memory.historyWindow(request.params.id, limit);
        const response: ApiResponse<Message[]> = { success: true, data: messages };
        return reply.send(response);
    });

    /**
     * GET /sessions/:id/summary - Message and red-flag counts
     */
    app.get<{ Params: { id: string } }>('/sessions/:id/summary', async (request, reply) => {
        const summary = await deps.memory.summarize(request.params.id);
        if (!summary) {
            const response: ApiResponse = { success: false, error: 'Session not found' };
            return reply.code(404).send(response);
        }
        const response: ApiResponse<SessionSummary> = { success: true, data: summary };
        return reply.send(response);
    });

    /**
     * GET /patients/:userId/summary - Counts across every conversation of a patient
     */
    app.get<{ Params: { userId: string } }>('/patients/:userId/summary', async (request, reply) => {
        const summary = await deps.memory.patientSummary(request.params.userId);
        if (summary.totalConversations === 0) {
            const response: ApiResponse = { success: false, error: 'Patient not found' };
            return reply.code(404).send(response);
        }
        const response: ApiResponse<PatientHistorySummary> = { success: true, data: summary };
        return reply.send(response);
    });

    /**
     * GET /patients/:userId/messages - Latest messages across conversations, oldest first
     */
    app.get<{ Params: { userId: string }; Querystring: unknown }>('/patients/:userId/messages', async (request, reply) => {
        const { limit } = messagesQuerySchema.parse(request.query);
        const messages = await deps.memory.recentContext(request.params.userId, limit);
        const response: ApiResponse<Message[]> = { success: true, data: messages };
        return reply.send(response);
    });

    app.get('/health', async () => {
        return { status: 'ok', service: 'chat' };
    });

    return app;
}
