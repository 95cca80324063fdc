import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
    Message,
    PatientContext,
    PersistenceError,
    Session,
    createLogger,
    errorMessage,
} from '@care-companion/shared';

const log = createLogger('memory');

/**
 * Durable backing for sessions. `load` returns null for unknown ids.
 */
export interface SessionRepository {
    load(id: string): Promise<Session | null>;
    save(session: Session): Promise<void>;
    /** Every session tagged with the user, oldest first */
    listByUser(userId: string): Promise<Session[]>;
}

const byCreation = (a: Session, b: Session) => a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id);

const messageSchema = z.object({
    role: z.enum(['user', 'assistant', 'system-note']),
    text: z.string(),
    timestamp: z.string(),
    redFlag: z.boolean().optional(),
    escalationText: z.string().optional(),
    severity: z.enum(['high', 'medium', 'low']).optional(),
    matchedRuleIds: z.array(z.string()).optional(),
});

const sessionSchema = z.object({
    id: z.string(),
    userId: z.string().optional(),
    created_at: z.string(),
    updated_at: z.string(),
    patientContext: z
        .object({
            userId: z.string(),
            ageRange: z.string().optional(),
            pregnant: z.boolean().optional(),
            conditions: z.array(z.string()).optional(),
            medications: z.array(z.string()).optional(),
            notes: z.string().optional(),
        })
        .optional(),
    messages: z.array(messageSchema),
});

const freezeMessage = (message: Message): Message =>
    Object.freeze({
        ...message,
        ...(message.matchedRuleIds ? { matchedRuleIds: [...message.matchedRuleIds] } : {}),
    });

/**
 * One JSON document per session. Writes go to a temp file that is renamed
 * over the target, so a crash never leaves a half-written session.
 */
export class FileSessionRepository implements SessionRepository {
    constructor(private readonly dir: string) {}

    private fileFor(id: string): string {
        return path.join(this.dir, `${encodeURIComponent(id)}.json`);
    }

    async load(id: string): Promise<Session | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.fileFor(id), 'utf-8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
            throw new PersistenceError(`Cannot read session ${id}: ${errorMessage(err)}`, { cause: err });
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            log.warn({ sessionId: id, err: errorMessage(err) }, 'Session document is not valid JSON, starting fresh');
            return null;
        }
        const parsed = sessionSchema.safeParse(json);
        if (!parsed.success) {
            log.warn({ sessionId: id }, 'Session document failed validation, starting fresh');
            return null;
        }
        return parsed.data;
    }

    async save(session: Session): Promise<void> {
        const target = this.fileFor(session.id);
        const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
        try {
            await fs.mkdir(this.dir, { recursive: true });
            await fs.writeFile(temp, JSON.stringify(session, null, 2), 'utf-8');
            await fs.rename(temp, target);
        } catch (err) {
            await fs.rm(temp, { force: true }).catch((cleanupErr: unknown) => {
                log.warn({ sessionId: session.id, err: errorMessage(cleanupErr) }, 'Could not remove temp file');
            });
            throw new PersistenceError(`Cannot write session ${session.id}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async listByUser(userId: string): Promise<Session[]> {
        let names: string[];
        try {
            names = await fs.readdir(this.dir);
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
            throw new PersistenceError(`Cannot list sessions: ${errorMessage(err)}`, { cause: err });
        }
        const sessions: Session[] = [];
        for (const name of names.filter((n) => n.endsWith('.json'))) {
            const session = await this.load(decodeURIComponent(name.slice(0, -'.json'.length)));
            if (session?.userId === userId) sessions.push(session);
        }
        return sessions.sort(byCreation);
    }
}

/**
 * Process-local repository. Stores deep copies so callers cannot mutate saved state.
 */
export class InMemorySessionRepository implements SessionRepository {
    private sessions: Map<string, Session> = new Map();

    async load(id: string): Promise<Session | null> {
        const session = this.sessions.get(id);
        return session ? structuredClone(session) : null;
    }

    async save(session: Session): Promise<void> {
        this.sessions.set(session.id, structuredClone(session));
    }

    async listByUser(userId: string): Promise<Session[]> {
        return Array.from(this.sessions.values())
            .filter((s) => s.userId === userId)
            .map((s) => structuredClone(s))
            .sort(byCreation);
    }

    list(): string[] {
        return Array.from(this.sessions.keys());
    }
}

export type NewMessage = Omit<Message, 'timestamp'> & { timestamp?: string };

export interface SessionSummary {
    sessionId: string;
    totalMessages: number;
    userMessages: number;
    assistantMessages: number;
    redFlagsDetected: number;
    uniqueFlags: string[];
    firstActivity: string | null;
    lastActivity: string | null;
}

/**
 * Conversation record of one patient across every session tagged with their user id
 */
export interface PatientHistorySummary {
    userId: string;
    totalConversations: number;
    totalMessages: number;
    redFlagsDetected: number;
    uniqueFlags: string[];
    firstConversation: string | null;
    lastConversation: string | null;
}

export const DEFAULT_SESSION_CACHE_SIZE = 500;

const flagsOf = (messages: Message[]): { detected: number; unique: string[] } => {
    const flagged = messages.filter((m) => m.redFlag);
    const unique = new Set<string>();
    for (const m of flagged) {
        for (const ruleId of m.matchedRuleIds ?? []) unique.add(ruleId);
    }
    return { detected: flagged.filter((m) => m.role === 'user').length, unique: [...unique].sort() };
};

/**
 * Per-session append-only conversation log.
 *
 * Appends to the same session run one at a time in arrival order, and
 * timestamps within a session never go backwards. At most `cacheSize`
 * sessions stay cached; the least recently used one is dropped first.
 */
export class ConversationMemory {
    private cache: Map<string, Session> = new Map();
    private chains: Map<string, Promise<void>> = new Map();

    constructor(
        private readonly repository: SessionRepository,
        private readonly now: () => Date = () => new Date(),
        private readonly cacheSize: number = DEFAULT_SESSION_CACHE_SIZE,
    ) {}

    private serialize<T>(id: string, task: () => Promise<T>): Promise<T> {
        const previous = this.chains.get(id) ?? Promise.resolve();
        const run = previous.then(task);
        const tail = run.then(
            () => undefined,
            () => undefined,
        );
        this.chains.set(id, tail);
        void tail.then(() => {
            if (this.chains.get(id) === tail) this.chains.delete(id);
        });
        return run;
    }

    private remember(id: string, session: Session): void {
        this.cache.delete(id);
        this.cache.set(id, session);
        while (this.cache.size > this.cacheSize) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }

    get cachedSessions(): number {
        return this.cache.size;
    }

    private async read(id: string): Promise<Session | null> {
        const cached = this.cache.get(id);
        if (cached) {
            this.remember(id, cached);
            return cached;
        }
        const loaded = await this.repository.load(id);
        if (!loaded) return null;
        const session: Session = { ...loaded, messages: loaded.messages.map(freezeMessage) };
        this.remember(id, session);
        return session;
    }

    private blank(id: string): Session {
        const ts = this.now().toISOString();
        return { id, created_at: ts, updated_at: ts, messages: [] };
    }

    private async ensure(id: string): Promise<Session> {
        const existing = await this.read(id);
        if (existing) return existing;
        const session = this.blank(id);
        await this.repository.save(session);
        this.remember(id, session);
        log.info({ sessionId: id }, 'Session created');
        return session;
    }

    /**
     * Returns the session, creating an empty one when none exists
     */
    getSession(id: string): Promise<Session> {
        return this.serialize(id, () => this.ensure(id));
    }

    append(id: string, message: NewMessage): Promise<Message> {
        return this.appendTurn(id, [message]).then(([stored]) => stored);
    }

    /**
     * Stamps and stores several messages with a single save: either all of
     * them are recorded or none is. A `userId` tags a session that has none yet.
     */
    appendTurn(id: string, messages: NewMessage[], options: { userId?: string } = {}): Promise<Message[]> {
        return this.serialize(id, async () => {
            const existing = await this.read(id);
            const session = existing ?? this.blank(id);

            let lastTs = session.messages.length > 0 ? Date.parse(session.messages[session.messages.length - 1].timestamp) : null;
            const stored = messages.map((message) => {
                let ts = message.timestamp ? Date.parse(message.timestamp) : this.now().getTime();
                if (Number.isNaN(ts)) ts = this.now().getTime();
                if (lastTs !== null && ts <= lastTs) ts = lastTs + 1;
                lastTs = ts;
                return freezeMessage({ ...message, timestamp: new Date(ts).toISOString() });
            });

            const userId = session.userId ?? options.userId;
            const next: Session = {
                ...session,
                ...(userId ? { userId } : {}),
                updated_at: stored.length > 0 ? stored[stored.length - 1].timestamp : session.updated_at,
                messages: [...session.messages, ...stored],
            };
            await this.repository.save(next);
            this.remember(id, next);
            if (!existing) log.info({ sessionId: id }, 'Session created');
            return stored;
        });
    }

    /**
     * Stores the patient context snapshot used for the latest turn
     */
    setPatientContext(id: string, patientContext: PatientContext): Promise<Session> {
        return this.serialize(id, async () => {
            const session = await this.ensure(id);
            const next: Session = {
                ...session,
                userId: session.userId ?? patientContext.userId,
                patientContext: { ...patientContext },
            };
            await this.repository.save(next);
            this.remember(id, next);
            return next;
        });
    }

    /**
     * Most recent `n` messages, oldest first. Unknown sessions give [] and are not created.
     */
    async historyWindow(id: string, n: number): Promise<Message[]> {
        if (n <= 0) return [];
        const session = await this.serialize(id, () => this.read(id));
        return session ? session.messages.slice(-n) : [];
    }

    async summarize(id: string): Promise<SessionSummary | null> {
        const session = await this.serialize(id, () => this.read(id));
        if (!session) return null;

        const messages = session.messages;
        const flags = flagsOf(messages);
        return {
            sessionId: id,
            totalMessages: messages.length,
            userMessages: messages.filter((m) => m.role === 'user').length,
            assistantMessages: messages.filter((m) => m.role === 'assistant').length,
            redFlagsDetected: flags.detected,
            uniqueFlags: flags.unique,
            firstActivity: messages[0]?.timestamp ?? null,
            lastActivity: messages[messages.length - 1]?.timestamp ?? null,
        };
    }

    /**
     * Every conversation of a user, oldest first
     */
    patientSessions(userId: string): Promise<Session[]> {
        return this.repository.listByUser(userId);
    }

    /**
     * Last `n` messages across the user's conversations, oldest first
     */
    async recentContext(userId: string, n: number, options: { excludeSessionId?: string } = {}): Promise<Message[]> {
        if (n <= 0) return [];
        const sessions = await this.patientSessions(userId);
        return sessions
            .filter((s) => s.id !== options.excludeSessionId)
            .flatMap((s) => s.messages)
            .slice(-n);
    }

    async patientSummary(userId: string): Promise<PatientHistorySummary> {
        const sessions = await this.patientSessions(userId);
        const messages = sessions.flatMap((s) => s.messages);
        const flags = flagsOf(messages);
        return {
            userId,
            totalConversations: sessions.length,
            totalMessages: messages.length,
            redFlagsDetected: flags.detected,
            uniqueFlags: flags.unique,
            firstConversation: sessions[0]?.created_at ?? null,
            lastConversation: sessions[sessions.length - 1]?.created_at ?? null,
        };
    }
}
