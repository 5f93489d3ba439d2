export const DEFAULT_INSTRUCTION = `You are a government service desk assistant. Answer the citizen's questions about the administrative service described in the knowledge section.
Rules:
- Base every answer on the knowledge text alone; do not invent fees, deadlines or documents.
- If the knowledge text does not cover the question, say so and point the citizen to the issuing authority.
- Keep answers short and in plain language.`;

export const KNOWLEDGE_HEADING = 'Knowledge:';

export const DEFAULT_LABELS = { user: 'User', assistant: 'Assistant' } as const;

export const headerPrompt = (instruction: string, delimiter: string, assistantLabel: string) =>
    `${instruction}
The knowledge text and every message below are enclosed in ${delimiter}. Reply as ${assistantLabel} and close your reply with ${delimiter}.`;
