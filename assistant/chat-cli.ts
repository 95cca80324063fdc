#!/usr/bin/env node
import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { nanoid } from 'nanoid';
import { ConfigurationError, errorMessage } from '@care-companion/shared';
import { exitOnSetupError, flagValue } from './cli';
import { loadConfig } from './config';
import { Pipeline, createPipeline } from './pipeline';

const args = process.argv.slice(2);

if (args.includes('--help')) {
    console.log('Usage:');
    console.log('  care-chat [--session <id>] [--user <id>]');
    console.log('');
    console.log('');
    console.log('With --user, earlier conversations of that patient are carried into the answers.');
    console.log('Commands inside the chat: /summary, /history, /patient, /quit');
    process.exit(0);
}

let pipeline: Pipeline;
try {
    const config = loadConfig();
    if (!config.retrieval.baseUrl) {
        throw new ConfigurationError('Invalid configuration', ['RETRIEVAL_BASE_URL is required for chat']);
    }
    pipeline = createPipeline(config);
} catch (err) {
    exitOnSetupError(err);
}

const sessionId = flagValue(args, 'session') ?? `session_${nanoid(10)}`;
const userId = flagValue(args, 'user');

async function main(): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    console.log('🩺 Care Companion');
    console.log('=================\n');
    console.log(`Session: ${sessionId}`);
    if (userId) {
        const earlier = await pipeline.memory.patientSessions(userId);
        const previous = earlier.filter((s) => s.id !== sessionId);
        if (previous.length > 0) {
            console.log(`Welcome back. ${previous.length} earlier conversation(s) on record.`);
        }
    }
    console.log('This assistant gives general information about hemorrhoids and constipation.');
    console.log('It does not replace a doctor. In an emergency, call your local emergency number.\n');

    while (true) {
        let line: string;
        try {
            line = (await rl.question('You: ')).trim();
        } catch {
            // stdin closed
            break;
        }
        if (!line) continue;
        if (line === '/quit' || line === '/exit') break;

        if (line === '/summary') {
            const summary = await pipeline.memory.summarize(sessionId);
            console.log(summary ? JSON.stringify(summary, null, 2) : 'No messages yet.');
            continue;
        }
        if (line === '/patient') {
            if (!userId) {
                console.log('Start the chat with --user <id> to see your history across conversations.');
            } else {
                console.log(JSON.stringify(await pipeline.memory.patientSummary(userId), null, 2));
            }
            continue;
        }
        if (line === '/history') {
            const history = await pipeline.memory.historyWindow(sessionId, 20);
            for (const m of history) {
                console.log(`[${m.timestamp}] ${m.role}${m.redFlag ? ' ⚠' : ''}: ${m.text}`);
            }
            continue;
        }

        try {
            const outcome = await pipeline.generator.respond({ sessionId, userId, text: line });
            console.log(`\nAssistant: ${outcome.answer}\n`);
            if (outcome.degraded.retrieval) {
                console.log('(reference material was unavailable for this answer)\n');
            }
            if (outcome.persistenceError) {
                console.log('(this turn could not be saved to your conversation history)\n');
            }
        } catch (err) {
            console.error(`✗ ${errorMessage(err)}`);
        }
    }

    rl.close();
    console.log('\nGoodbye. Take care.');
}

main()
    .then(() => process.exit(0))
    .catch((err) => {
        console.error('\n✗ Chat failed:', errorMessage(err));
        process.exit(1);
    });
