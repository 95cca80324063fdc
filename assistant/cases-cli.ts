#!/usr/bin/env node
import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { CASE_CATEGORIES, CaseCategory, errorMessage } from '@care-companion/shared';
import { CaseCollection } from './authoring';
import { exitOnSetupError, flagValue } from './cli';
import { RedFlagDetector, loadRedFlagDetector } from './red-flags';

const args = process.argv.slice(2);

if (args.includes('--help')) {
    console.log('Usage:');
    console.log('  care-cases [--file <path>] [--prefix <id prefix>] [--rules <red-flag rule file>]');
    console.log('');
    console.log('Commands: add, batch, show, delete <id>, save, quit');
    console.log('Saved files can be passed to care-eval with --cases <path>.');
    process.exit(0);
}

const filePath = flagValue(args, 'file') ?? './manual-cases.json';
const prefix = flagValue(args, 'prefix') ?? 'manual';

let detector: RedFlagDetector;
try {
    detector = loadRedFlagDetector(flagValue(args, 'rules') ?? process.env.RED_FLAG_RULES_FILE);
} catch (err) {
    exitOnSetupError(err);
}

const isCategory = (value: string): value is CaseCategory => CASE_CATEGORIES.some((c) => c === value);

async function main(): Promise<void> {
    const collection = await CaseCollection.open(filePath, detector, prefix);
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    console.log('✍️  Care Companion case authoring');
    console.log('================================\n');
    console.log(`File: ${filePath} (${collection.size} case(s) loaded)\n`);

    let dirty = false;
    while (true) {
        let line: string;
        try {
            line = (await rl.question('cases> ')).trim();
        } catch {
            // stdin closed
            break;
        }
        const [command, ...rest] = line.split(/\s+/);

        if (command === 'quit' || command === 'exit') {
            if (dirty && (await rl.question('Save before quitting? (y/n): ')).trim().toLowerCase() === 'y') {
                await collection.save(filePath);
                console.log(`✓ Saved ${collection.size} case(s)`);
            }
            break;
        }

        try {
            if (command === 'add') {
                const question = await rl.question('Question: ');
                const raw = (await rl.question(`Category (${CASE_CATEGORIES.join('/')}, empty = guess): `)).trim();
                if (raw && !isCategory(raw)) {
                    console.log(`Unknown category ${raw}`);
                    continue;
                }
                const added = collection.add(question, raw && isCategory(raw) ? raw : undefined);
                dirty = true;
                console.log(`✓ Added ${added.id} as ${added.category}`);
            } else if (command === 'batch') {
                console.log('Paste questions, one per line. Finish with an empty line.');
                const lines: string[] = [];
                while (true) {
                    const next = await rl.question('');
                    if (!next.trim()) break;
                    lines.push(next);
                }
                const added = collection.addBatch(lines.join('\n'));
                dirty = dirty || added.length > 0;
                console.log(`✓ Added ${added.length} question(s)`);
            } else if (command === 'show') {
                for (const c of collection.list()) {
                    const flags = c.expectedRedFlags?.length ? ` ⚠ ${c.expectedRedFlags.join(', ')}` : '';
                    console.log(`${c.id} [${c.category}]${flags}: ${c.questions.join(' / ')}`);
                }
                const counts = Object.entries(collection.countsByCategory()).filter(([, n]) => n > 0);
                console.log(`\n${collection.size} case(s): ${counts.map(([c, n]) => `${c} ${n}`).join(', ') || 'none'}`);
            } else if (command === 'delete') {
                const [id] = rest;
                if (!id) {
                    console.log('Usage: delete <id>');
                } else if (collection.remove(id)) {
                    dirty = true;
                    console.log(`✓ Deleted ${id}`);
                } else {
                    console.log(`No case with id ${id}`);
                }
            } else if (command === 'save') {
                await collection.save(filePath);
                dirty = false;
                console.log(`✓ Saved ${collection.size} case(s) to ${filePath}`);
            } else if (command) {
                console.log('Commands: add, batch, show, delete <id>, save, quit');
            }
        } catch (err) {
            console.error(`✗ ${errorMessage(err)}`);
        }
    }

    rl.close();
}

main()
    .then(() => process.exit(0))
    .catch((err) => {
        console.error('\n✗ Case authoring failed:', errorMessage(err));
        process.exit(1);
    });
