import { Message, PatientContext, RetrievedChunk } from '@care-companion/shared';
import { PromptLimits } from './config';
import { SAFETY_POLICY, describePatientContext } from './policy';
import { ChatTurn, ProviderPrompt } from './providers';

export const REFERENCE_HEADER = 'REFERENCE MATERIAL';
export const NO_REFERENCE = `${REFERENCE_HEADER}\n(No reference material matched this question. Give general self-care guidance only and suggest a clinician for anything specific.)`;

const SECTION_SEPARATOR = '\n\n';
const MIN_CHUNK_CHARS = 40;

export interface ComposeInput {
    question: string;
    history: Message[];
    chunks: RetrievedChunk[];
    patientContext?: PatientContext | null;
    policy?: string;
}

export interface PromptPayload extends ProviderPrompt {
    includedChunks: RetrievedChunk[];
    droppedHistory: number;
    questionTruncated: boolean;
    length: number;
}

export function promptLength(prompt: ProviderPrompt): number {
    return prompt.system.length + prompt.messages.reduce((sum, m) => sum + m.content.length, 0);
}

/**
 * Highest score first, duplicate (sourceId, text) pairs removed
 */
export function rankChunks(chunks: RetrievedChunk[]): RetrievedChunk[] {
    const seen = new Set<string>();
    return [...chunks]
        .sort((a, b) => b.score - a.score)
        .filter((chunk) => {
            const key = `${chunk.sourceId}\u0000${chunk.text}`;
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        });
}

const chunkPrefix = (position: number, chunk: RetrievedChunk) => `[${position}] source: ${chunk.sourceId}\n`;

/**
 * Packs ranked chunks into a reference section no longer than `budget`.
 * The first chunk that does not fit is truncated and the rest are dropped.
 */
function fitChunks(ranked: RetrievedChunk[], budget: number): { section: string; included: RetrievedChunk[] } | null {
    let section = REFERENCE_HEADER;
    const included: RetrievedChunk[] = [];

    for (const chunk of ranked) {
        const prefix = chunkPrefix(included.length + 1, chunk);
        const block = SECTION_SEPARATOR + prefix + chunk.text;
        if (section.length + block.length <= budget) {
            section += block;
            included.push(chunk);
            continue;
        }
        const room = budget - section.length - SECTION_SEPARATOR.length - prefix.length;
        if (room >= MIN_CHUNK_CHARS) {
            const text = chunk.text.slice(0, room);
            section += SECTION_SEPARATOR + prefix + text;
            included.push({ ...chunk, text });
        }
        break;
    }

    return included.length > 0 ? { section, included } : null;
}

function toTurns(history: Message[]): ChatTurn[] {
    const turns: ChatTurn[] = [];
    for (const message of history) {
        if (message.role === 'user' || message.role === 'assistant') {
            turns.push({ role: message.role, content: message.text });
        }
    }
    return turns;
}

/**
 * Builds the model input in fixed order: safety policy, patient context,
 * reference chunks, recent history, current question.
 *
 * The payload never exceeds `limits.maxPromptChars`. Chunks give way first,
 * then the oldest history, and the question is cut only when nothing else is left.
 * The policy is never trimmed.
 */
export function composePrompt(input: ComposeInput, limits: PromptLimits): PromptPayload {
    const policy = input.policy ?? SAFETY_POLICY;
    const fixedSections = [policy];
    if (input.patientContext) {
        fixedSections.push(describePatientContext(input.patientContext));
    }
    const base = fixedSections.join(SECTION_SEPARATOR);

    const window = limits.historyTurns > 0 ? toTurns(input.history).slice(-limits.historyTurns * 2) : [];
    let history = [...window];
    let question = input.question;

    const roomForReference = () =>
        limits.maxPromptChars -
        base.length -
        SECTION_SEPARATOR.length -
        history.reduce((sum, turn) => sum + turn.content.length, 0) -
        question.length;

    while (history.length > 0 && roomForReference() < NO_REFERENCE.length) {
        history = history.slice(1);
    }
    let questionTruncated = false;
    const deficit = NO_REFERENCE.length - roomForReference();
    if (deficit > 0) {
        question = question.slice(0, Math.max(0, question.length - deficit));
        questionTruncated = true;
    }

    const fitted = fitChunks(rankChunks(input.chunks), Math.min(roomForReference(), limits.maxContextChars));
    const reference = fitted ? fitted.section : NO_REFERENCE;

    const system = base + SECTION_SEPARATOR + reference;
    const messages: ChatTurn[] = [...history, { role: 'user', content: question }];
    const payload: ProviderPrompt = { system, messages };

    return {
        system,
        messages,
        includedChunks: fitted ? fitted.included : [],
        droppedHistory: window.length - history.length,
        questionTruncated,
        length: promptLength(payload),
    };
}
