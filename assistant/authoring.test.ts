import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError } from '@care-companion/shared';
import { CaseCollection, autoCategorize } from './authoring';
import { loadEvaluationCases } from './cases';
import { loadRedFlagDetector } from './red-flags';

const detector = loadRedFlagDetector();

describe('autoCategorize', () => {
    it('puts anything the red-flag rules catch first', () => {
        expect(autoCategorize("I've had rectal bleeding for 3 weeks and feel dizzy", detector)).toBe('red-flag');
        expect(autoCategorize("I'm pregnant and have a fever", detector)).toBe('red-flag');
    });

    it('falls back to keywords in precedence order', () => {
        expect(autoCategorize("I'm pregnant, which stool softener is safe?", detector)).toBe('pregnancy-safety');
        expect(autoCategorize("I'm pregnant and worried about piles", detector)).toBe('pregnancy-safety');
        expect(autoCategorize('I feel so embarrassed to talk about this', detector)).toBe('emotional-support');
        expect(autoCategorize('Is it true that sitting on cold stone causes piles?', detector)).toBe('myth');
        expect(autoCategorize('How much water should I drink each day?', detector)).toBe('common');
    });

    it('accepts custom keyword rules', () => {
        expect(autoCategorize('My toddler strains a lot', detector, [{ category: 'edge-case', keywords: ['toddler'] }])).toBe(
            'edge-case',
        );
        expect(autoCategorize('Is it true?', detector, [])).toBe('common');
    });
});

describe('CaseCollection', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'care-authoring-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('adds questions with sequential ids and expected red flags', () => {
        const collection = new CaseCollection(detector);
        expect(collection.add('  How much fibre is enough?  ')).toEqual({
            id: 'manual-001',
            category: 'common',
            questions: ['How much fibre is enough?'],
        });
        expect(collection.add("I've had rectal bleeding for 3 weeks and feel dizzy")).toEqual({
            id: 'manual-002',
            category: 'red-flag',
            questions: ["I've had rectal bleeding for 3 weeks and feel dizzy"],
            expectedRedFlags: ['bleeding_with_dizziness', 'persistent_bleeding'],
        });
        expect(collection.add('Does coffee make it worse?', 'myth').category).toBe('myth');
        expect(() => collection.add('   ')).toThrow(RangeError);
    });

    it('adds a pasted batch one question per line', () => {
        const collection = new CaseCollection(detector);
        const added = collection.addBatch(
            "# from the clinic inbox\nHow much fibre is enough?\n\n  I'm pregnant, is a sitz bath ok?  \r\nIs it true that spicy food causes hemorrhoids?",
        );
        expect(added.map((c) => [c.id, c.category, c.questions[0]])).toEqual([
            ['manual-001', 'common', 'How much fibre is enough?'],
            ['manual-002', 'pregnancy-safety', "I'm pregnant, is a sitz bath ok?"],
            ['manual-003', 'myth', 'Is it true that spicy food causes hemorrhoids?'],
        ]);
        expect(collection.countsByCategory()).toEqual({
            common: 1,
            'red-flag': 0,
            'edge-case': 0,
            'emotional-support': 0,
            'follow-up': 0,
            myth: 1,
            'pregnancy-safety': 1,
        });
    });

    it('removes cases by id', () => {
        const collection = new CaseCollection(detector);
        collection.addBatch('first?\nsecond?');
        expect(collection.remove('manual-001')).toBe(true);
        expect(collection.remove('manual-001')).toBe(false);
        expect(collection.list().map((c) => c.id)).toEqual(['manual-002']);
        expect(collection.add('third?').id).toBe('manual-003');
    });

    it('saves a file the evaluation loader reads back', async () => {
        const file = path.join(dir, 'nested', 'manual-cases.json');
        const collection = new CaseCollection(detector);
        collection.addBatch("How much fibre is enough?\nI've had rectal bleeding for 3 weeks and feel dizzy");
        await collection.save(file);

        expect(loadEvaluationCases([file])).toEqual(collection.list());
        expect(JSON.parse(await fs.readFile(file, 'utf-8')).version).toBe('manual');
    });

    it('continues numbering from an existing file', async () => {
        const file = path.join(dir, 'cases.json');
        await fs.writeFile(
            file,
            JSON.stringify({
                version: 'manual',
                cases: [
                    { id: 'manual-007', category: 'common', questions: ['Old question?'] },
                    { id: 'clinic-1', category: 'myth', questions: ['Another?'] },
                ],
            }),
            'utf-8',
        );

        const collection = await CaseCollection.open(file, detector);
        expect(collection.size).toBe(2);
        expect(collection.add('New question?').id).toBe('manual-008');
    });

    it('starts empty for a missing file and refuses a corrupt one', async () => {
        expect((await CaseCollection.open(path.join(dir, 'missing.json'), detector)).size).toBe(0);

        const broken = path.join(dir, 'broken.json');
        await fs.writeFile(broken, '{ not json', 'utf-8');
        await expect(CaseCollection.open(broken, detector)).rejects.toBeInstanceOf(ConfigurationError);
    });
});
