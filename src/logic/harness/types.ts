export type Speaker = 'user' | 'assistant';

export const SPEAKERS: readonly Speaker[] = ['user', 'assistant'];

export interface ConversationTurn {
  speaker: Speaker;
  text: string;
}

export type SpeakerLabels = Record<Speaker, string>;

export interface PromptOptions {
  delimiter?: string;
  instruction?: string;   // replaces the default service-desk instruction
  labels?: Partial<SpeakerLabels>;
}

export interface PromptInput extends PromptOptions {
  snippet: string;        // KnowledgeSnippet
  turns: ConversationTurn[];
}

export interface PromptAssembly {
  prompt: string;
  delimiter: string;
  turnCount: number;
}

export interface DisassembledPrompt {
  snippet: string;
  turns: ConversationTurn[];
}

export interface CompletionResult {
  prompt: string;
  completion: string;     // raw backend text
  reply: string;          // completion cut at the closing delimiter
  model: string;
}
