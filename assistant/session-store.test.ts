import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PersistenceError, Session } from '@care-companion/shared';
import { ConversationMemory, FileSessionRepository, InMemorySessionRepository, SessionRepository } from './session-store';

const fixedClock = (iso: string) => () => new Date(iso);

describe('FileSessionRepository', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'care-sessions-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('round-trips a session across a restart', async () => {
        const first = new ConversationMemory(new FileSessionRepository(dir));
        await first.append('s-1', { role: 'user', text: 'Is it normal to strain?', redFlag: false });
        await first.append('s-1', {
            role: 'assistant',
            text: 'Try not to strain.',
            redFlag: true,
            severity: 'medium',
            escalationText: 'See your doctor.',
            matchedRuleIds: ['fever'],
        });
        await first.setPatientContext('s-1', { userId: 'u-7', pregnant: false });

        const restarted = new ConversationMemory(new FileSessionRepository(dir));
        const session = await restarted.getSession('s-1');
        const original = await first.getSession('s-1');
        expect(session).toEqual(original);
        expect(session.patientContext).toEqual({ userId: 'u-7', pregnant: false });
        expect(session.messages.map((m) => m.text)).toEqual(['Is it normal to strain?', 'Try not to strain.']);
        expect(session.messages[1].matchedRuleIds).toEqual(['fever']);
    });

    it('returns null for an unknown session', async () => {
        expect(await new FileSessionRepository(dir).load('missing')).toBeNull();
    });

    it('treats a corrupt document as a fresh session', async () => {
        await fs.writeFile(path.join(dir, 'broken.json'), '{ not json', 'utf-8');
        expect(await new FileSessionRepository(dir).load('broken')).toBeNull();

        await fs.writeFile(path.join(dir, 'wrong-shape.json'), JSON.stringify({ id: 'wrong-shape' }), 'utf-8');
        expect(await new FileSessionRepository(dir).load('wrong-shape')).toBeNull();
    });

    it('keeps ids with path separators inside the directory', async () => {
        const repo = new FileSessionRepository(dir);
        const session: Session = { id: '../escape/attempt', created_at: 'a', updated_at: 'a', messages: [] };
        await repo.save(session);
        expect(await fs.readdir(dir)).toEqual([`${encodeURIComponent('../escape/attempt')}.json`]);
        expect(await repo.load('../escape/attempt')).toEqual(session);
    });

    it('reports write failures as persistence errors', async () => {
        const blocker = path.join(dir, 'not-a-dir');
        await fs.writeFile(blocker, 'x', 'utf-8');
        const repo = new FileSessionRepository(path.join(blocker, 'sessions'));
        await expect(repo.save({ id: 's', created_at: 'a', updated_at: 'a', messages: [] })).rejects.toBeInstanceOf(
            PersistenceError,
        );
    });
});

describe('ConversationMemory', () => {
    it('never lets timestamps go backwards within a session', async () => {
        const memory = new ConversationMemory(new InMemorySessionRepository(), fixedClock('2024-05-01T10:00:00.000Z'));
        const first = await memory.append('s', { role: 'user', text: 'first' });
        const second = await memory.append('s', { role: 'assistant', text: 'second' });
        const third = await memory.append('s', { role: 'user', text: 'third', timestamp: '2024-04-30T00:00:00.000Z' });

        expect(first.timestamp).toBe('2024-05-01T10:00:00.000Z');
        expect(second.timestamp).toBe('2024-05-01T10:00:00.001Z');
        expect(third.timestamp).toBe('2024-05-01T10:00:00.002Z');
    });

    it('applies concurrent appends in call order', async () => {
        const memory = new ConversationMemory(new InMemorySessionRepository());
        await Promise.all(
            Array.from({ length: 10 }, (_, i) => memory.append('busy', { role: 'user', text: `message ${i}` })),
        );
        const history = await memory.historyWindow('busy', 20);
        expect(history.map((m) => m.text)).toEqual(Array.from({ length: 10 }, (_, i) => `message ${i}`));
    });

    it('freezes stored messages', async () => {
        const memory = new ConversationMemory(new InMemorySessionRepository());
        const stored = await memory.append('s', { role: 'user', text: 'hi', matchedRuleIds: ['x'] });
        expect(Object.isFrozen(stored)).toBe(true);
    });

    it('returns the most recent messages oldest first', async () => {
        const memory = new ConversationMemory(new InMemorySessionRepository());
        for (const text of ['a', 'b', 'c', 'd']) {
            await memory.append('s', { role: 'user', text });
        }
        expect((await memory.historyWindow('s', 2)).map((m) => m.text)).toEqual(['c', 'd']);
        expect(await memory.historyWindow('s', 0)).toEqual([]);
    });

    it('does not create a session when reading history', async () => {
        const repo = new InMemorySessionRepository();
        const memory = new ConversationMemory(repo);
        expect(await memory.historyWindow('ghost', 5)).toEqual([]);
        expect(await memory.summarize('ghost')).toBeNull();
        expect(repo.list()).toEqual([]);
    });

    it('leaves the cached session untouched when a save fails', async () => {
        const inner = new InMemorySessionRepository();
        let failNext = false;
        const flaky: SessionRepository = {
            load: (id) => inner.load(id),
            save: async (session) => {
                if (failNext) throw new PersistenceError('disk full');
                await inner.save(session);
            },
            listByUser: (userId) => inner.listByUser(userId),
        };
        const memory = new ConversationMemory(flaky);
        await memory.append('s', { role: 'user', text: 'kept' });
        failNext = true;
        await expect(memory.append('s', { role: 'assistant', text: 'lost' })).rejects.toThrow('disk full');
        failNext = false;
        expect((await memory.historyWindow('s', 10)).map((m) => m.text)).toEqual(['kept']);
    });

    it('summarizes message counts and flags', async () => {
        const memory = new ConversationMemory(new InMemorySessionRepository(), fixedClock('2024-05-01T10:00:00.000Z'));
        await memory.append('s', { role: 'user', text: 'bleeding and dizzy', redFlag: true, matchedRuleIds: ['bleeding_with_dizziness'] });
        await memory.append('s', {
            role: 'assistant',
            text: 'Please seek care.',
            redFlag: true,
            matchedRuleIds: ['bleeding_with_dizziness', 'fever'],
        });
        await memory.append('s', { role: 'user', text: 'thanks', redFlag: false });

        expect(await memory.summarize('s')).toEqual({
            sessionId: 's',
            totalMessages: 3,
            userMessages: 2,
            assistantMessages: 1,
            redFlagsDetected: 1,
            uniqueFlags: ['bleeding_with_dizziness', 'fever'],
            firstActivity: '2024-05-01T10:00:00.000Z',
            lastActivity: '2024-05-01T10:00:00.002Z',
        });
    });

    it('stores a turn with one save or not at all', async () => {
        const inner = new InMemorySessionRepository();
        let saves = 0;
        const repo: SessionRepository = {
            load: (id) => inner.load(id),
            save: async (session) => {
                saves += 1;
                if (session.messages.some((m) => m.role === 'assistant')) throw new PersistenceError('disk full');
                await inner.save(session);
            },
            listByUser: (userId) => inner.listByUser(userId),
        };
        const memory = new ConversationMemory(repo);

        await expect(
            memory.appendTurn('s', [
                { role: 'user', text: 'Is this bleeding normal?' },
                { role: 'assistant', text: 'Tell me more.' },
            ]),
        ).rejects.toThrow('disk full');

        expect(saves).toBe(1);
        expect(await memory.historyWindow('s', 10)).toEqual([]);
        expect(await inner.load('s')).toBeNull();
    });

    it('stamps every message of a turn in order and tags the user', async () => {
        const repo = new InMemorySessionRepository();
        const memory = new ConversationMemory(repo, fixedClock('2024-05-01T10:00:00.000Z'));
        const stored = await memory.appendTurn(
            's',
            [
                { role: 'user', text: 'q' },
                { role: 'assistant', text: 'a' },
            ],
            { userId: 'u-1' },
        );

        expect(stored.map((m) => m.timestamp)).toEqual(['2024-05-01T10:00:00.000Z', '2024-05-01T10:00:00.001Z']);
        const saved = await repo.load('s');
        expect(saved?.userId).toBe('u-1');
        expect(saved?.updated_at).toBe('2024-05-01T10:00:00.001Z');
    });

    it('drops the least recently used session from its cache', async () => {
        const inner = new InMemorySessionRepository();
        const loads: string[] = [];
        const counting: SessionRepository = {
            load: (id) => {
                loads.push(id);
                return inner.load(id);
            },
            save: (session) => inner.save(session),
            listByUser: (userId) => inner.listByUser(userId),
        };
        const memory = new ConversationMemory(counting, undefined, 2);
        await memory.append('a', { role: 'user', text: '1' });
        await memory.append('b', { role: 'user', text: '2' });
        await memory.historyWindow('a', 1);
        await memory.append('c', { role: 'user', text: '3' });
        expect(memory.cachedSessions).toBe(2);

        loads.length = 0;
        await memory.historyWindow('a', 1);
        await memory.historyWindow('c', 1);
        expect(loads).toEqual([]);

        expect((await memory.historyWindow('b', 1)).map((m) => m.text)).toEqual(['2']);
        expect(loads).toEqual(['b']);
    });
});

describe('patient history across sessions', () => {
    const seed = async () => {
        const repo = new InMemorySessionRepository();
        let clock = Date.parse('2024-05-01T10:00:00.000Z');
        const memory = new ConversationMemory(repo, () => new Date(clock));
        await memory.appendTurn(
            'monday',
            [
                { role: 'user', text: 'bleeding and dizzy', redFlag: true, matchedRuleIds: ['bleeding_with_dizziness'] },
                { role: 'assistant', text: 'Please seek care.', redFlag: true, matchedRuleIds: ['bleeding_with_dizziness'] },
            ],
            { userId: 'u-1' },
        );
        clock = Date.parse('2024-05-03T09:00:00.000Z');
        await memory.appendTurn(
            'wednesday',
            [
                { role: 'user', text: 'feeling better' },
                { role: 'assistant', text: 'Glad to hear it.' },
            ],
            { userId: 'u-1' },
        );
        await memory.appendTurn('other', [{ role: 'user', text: 'not mine' }], { userId: 'u-2' });
        return { repo, memory };
    };

    it('lists the sessions of a patient oldest first', async () => {
        const { memory } = await seed();
        expect((await memory.patientSessions('u-1')).map((s) => s.id)).toEqual(['monday', 'wednesday']);
        expect(await memory.patientSessions('nobody')).toEqual([]);
    });

    it('gives the latest messages from earlier conversations', async () => {
        const { memory } = await seed();
        expect((await memory.recentContext('u-1', 3)).map((m) => m.text)).toEqual([
            'Please seek care.',
            'feeling better',
            'Glad to hear it.',
        ]);
        expect((await memory.recentContext('u-1', 10, { excludeSessionId: 'wednesday' })).map((m) => m.text)).toEqual([
            'bleeding and dizzy',
            'Please seek care.',
        ]);
        expect(await memory.recentContext('u-1', 0)).toEqual([]);
    });

    it('summarizes every conversation of a patient', async () => {
        const { memory } = await seed();
        expect(await memory.patientSummary('u-1')).toEqual({
            userId: 'u-1',
            totalConversations: 2,
            totalMessages: 4,
            redFlagsDetected: 1,
            uniqueFlags: ['bleeding_with_dizziness'],
            firstConversation: '2024-05-01T10:00:00.000Z',
            lastConversation: '2024-05-03T09:00:00.000Z',
        });
    });

    it('finds tagged sessions on disk', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'care-patients-'));
        try {
            const repo = new FileSessionRepository(dir);
            await repo.save({ id: 'b', userId: 'u-1', created_at: '2024-05-02T00:00:00.000Z', updated_at: 'x', messages: [] });
            await repo.save({ id: 'a', userId: 'u-1', created_at: '2024-05-01T00:00:00.000Z', updated_at: 'x', messages: [] });
            await repo.save({ id: 'c', created_at: '2024-05-01T00:00:00.000Z', updated_at: 'x', messages: [] });
            await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored', 'utf-8');

            expect((await repo.listByUser('u-1')).map((s) => s.id)).toEqual(['a', 'b']);
            expect(await new FileSessionRepository(path.join(dir, 'missing')).listByUser('u-1')).toEqual([]);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
