import { PatientContext } from '@care-companion/shared';

const POLICY_NOTES: string[] = [
    'You are a patient education assistant for hemorrhoids and constipation.',
    'Answer only from the reference material provided below and from widely accepted self-care guidance; say so when the material does not cover a question.',
    'Never diagnose a condition, never prescribe or dose prescription medication, and never tell a patient to stop a prescribed treatment.',
    'Over-the-counter options may be described in general terms with a reminder to follow the label or ask a pharmacist.',
    'If the patient mentions heavy or persistent bleeding, black or tarry stools, dizziness or fainting, severe pain, fever, vomiting, or no bowel movement for several days with pain, tell them to seek prompt in-person medical care.',
    'Use plain, calm, non-judgemental language. These topics are embarrassing for many people; normalise them.',
    'Give specific, practical steps (fibre, fluids, toilet habits, activity) and say when to follow up with a clinician.',
    'For pregnancy, recommend checking any product with their obstetric care provider.',
    'Keep answers under 250 words unless the patient asks for more detail.',
];

/**
 * Fixed safety policy. Always the first segment of every prompt and never trimmed.
 */
export const SAFETY_POLICY = `SAFETY POLICY\n${POLICY_NOTES.map((n) => `- ${n}`).join('\n')}`;

/**
 * Shown when the provider cannot produce an answer. Never empty.
 */
export const FALLBACK_MESSAGE =
    "I'm sorry, I can't answer right now. If your symptoms are severe, getting worse, or worrying you, " +
    'please contact your doctor or seek urgent care. For heavy bleeding, fainting, or severe pain, call emergency services.';

export const PATIENT_CONTEXT_MAX_CHARS = 1000;

/**
 * Patient-specific notes appended to the patient context segment
 */
export function patientPolicyNotes(context: PatientContext): string[] {
    const notes: string[] = [];
    if (context.pregnant) {
        notes.push('Patient is pregnant: only pregnancy-safe suggestions; refer product choices to their obstetric provider.');
    }
    if (context.medications && context.medications.length > 0) {
        notes.push('Patient takes medication: mention that laxatives and supplements can interact and a pharmacist can check.');
    }
    return notes;
}

/**
 * Renders the patient context segment, capped at PATIENT_CONTEXT_MAX_CHARS
 */
export function describePatientContext(context: PatientContext): string {
    const parts: string[] = ['PATIENT CONTEXT'];
    if (context.ageRange) parts.push(`Age range: ${context.ageRange}`);
    if (context.pregnant !== undefined) parts.push(`Pregnant: ${context.pregnant ? 'yes' : 'no'}`);
    if (context.conditions?.length) parts.push(`Known conditions: ${context.conditions.join(', ')}`);
    if (context.medications?.length) parts.push(`Medications: ${context.medications.join(', ')}`);
    if (context.notes) parts.push(`Notes: ${context.notes}`);
    for (const note of patientPolicyNotes(context)) {
        parts.push(`- ${note}`);
    }

    const text = parts.join('\n');
    return text.length > PATIENT_CONTEXT_MAX_CHARS ? text.slice(0, PATIENT_CONTEXT_MAX_CHARS) : text;
}
