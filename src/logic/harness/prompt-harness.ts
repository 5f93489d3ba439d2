import { DEFAULT_DELIMITER } from '../../config/env.validation';
import { InvalidInputError } from './harness.errors';
import { DEFAULT_INSTRUCTION, DEFAULT_LABELS, KNOWLEDGE_HEADING, headerPrompt } from './prompt';
import {
  ConversationTurn,
  DisassembledPrompt,
  PromptAssembly,
  PromptInput,
  PromptOptions,
  SPEAKERS,
  SpeakerLabels,
} from './types';

const SECTION_SEPARATOR = '\n\n';

interface ResolvedOptions {
  delimiter: string;
  instruction: string;
  labels: SpeakerLabels;
}

export function resolveLabels(labels?: Partial<SpeakerLabels>): SpeakerLabels {
  return {
    user: labels?.user || DEFAULT_LABELS.user,
    assistant: labels?.assistant || DEFAULT_LABELS.assistant,
  };
}

// Equal labels would make every parsed turn come back as the first speaker.
export function labelsAreDistinct(labels?: Partial<SpeakerLabels>): boolean {
  const resolved = resolveLabels(labels);
  return resolved.user !== resolved.assistant;
}

function resolveOptions(options: PromptOptions): ResolvedOptions {
  const labels = resolveLabels(options.labels);
  if (labels.user === labels.assistant) {
    throw new InvalidInputError(`User and assistant labels must differ (both are "${labels.user}")`);
  }
  return {
    delimiter: options.delimiter || DEFAULT_DELIMITER,
    instruction: options.instruction?.trim() || DEFAULT_INSTRUCTION,
    labels,
  };
}

/**
 * First delimiter at or after `from` that is followed by what must come after a closing
 * delimiter. Text ending in a prefix of the delimiter (`"resident"` before `"""`) makes
 * the first plain match land too early.
 */
function findClosingDelimiter(text: string, delimiter: string, from: number, closes: (after: number) => boolean): number {
  for (let at = text.indexOf(delimiter, from); at !== -1; at = text.indexOf(delimiter, at + 1)) {
    if (closes(at + delimiter.length)) {
      return at;
    }
  }
  return -1;
}

function renderHeader(o: ResolvedOptions): string {
  return headerPrompt(o.instruction, o.delimiter, o.labels.assistant);
}

function renderKnowledge(snippet: string, delimiter: string): string {
  return `${KNOWLEDGE_HEADING}\n${delimiter}${snippet}${delimiter}`;
}

export function renderTurn(turn: ConversationTurn, labels: SpeakerLabels, delimiter: string): string {
  return `${labels[turn.speaker]}: ${delimiter}${turn.text}${delimiter}`;
}

function openMarker(o: ResolvedOptions): string {
  return `${o.labels.assistant}: ${o.delimiter}`;
}

/**
 * Builds the completion prompt: instruction header, knowledge snippet, the turns in the
 * order given, and an open assistant marker the model is expected to continue.
 * Pure; the only check is that the snippet has content.
 */
export function assemblePrompt(input: PromptInput): PromptAssembly {
  if (!input.snippet || input.snippet.trim().length === 0) {
    throw new InvalidInputError('Knowledge snippet must not be empty');
  }
  const o = resolveOptions(input);

  const prompt = [
    renderHeader(o),
    renderKnowledge(input.snippet, o.delimiter),
    input.turns.map(t => renderTurn(t, o.labels, o.delimiter)).join('\n'),
    openMarker(o),
  ]
    .filter(section => section.length > 0)
    .join(SECTION_SEPARATOR);

  return { prompt, delimiter: o.delimiter, turnCount: input.turns.length };
}

/**
 * Reverses assemblePrompt for a blob built with the same options.
 * Exact as long as the delimiter occurs in neither the snippet nor any turn text
 * and contains no line break.
 */
export function disassemblePrompt(prompt: string, options: PromptOptions = {}): DisassembledPrompt {
  const o = resolveOptions(options);
  const d = o.delimiter;

  const knowledgeStart = `${renderHeader(o)}${SECTION_SEPARATOR}${KNOWLEDGE_HEADING}\n${d}`;
  if (!prompt.startsWith(knowledgeStart)) {
    throw new InvalidInputError('Prompt does not start with the expected header and knowledge section');
  }
  const snippetEnd = findClosingDelimiter(prompt, d, knowledgeStart.length, after =>
    prompt.startsWith(SECTION_SEPARATOR, after));
  if (snippetEnd === -1) {
    throw new InvalidInputError('Knowledge section is not closed by the delimiter');
  }
  const snippet = prompt.slice(knowledgeStart.length, snippetEnd);

  const marker = openMarker(o);
  const bodyStart = snippetEnd + d.length;
  const bodyEnd = prompt.length - marker.length;
  if (!prompt.endsWith(marker) || bodyEnd < bodyStart) {
    throw new InvalidInputError('Prompt does not end with an open assistant marker');
  }
  const body = prompt.slice(bodyStart, bodyEnd);

  if (body === SECTION_SEPARATOR) {
    return { snippet, turns: [] };
  }
  if (body.length < 2 * SECTION_SEPARATOR.length || !body.startsWith(SECTION_SEPARATOR) || !body.endsWith(SECTION_SEPARATOR)) {
    throw new InvalidInputError('Conversation section is malformed');
  }
  const transcript = body.slice(SECTION_SEPARATOR.length, body.length - SECTION_SEPARATOR.length);

  return { snippet, turns: parseTranscript(transcript, o) };
}

function parseTranscript(transcript: string, o: ResolvedOptions): ConversationTurn[] {
  const turns: ConversationTurn[] = [];
  let cursor = 0;

  while (cursor < transcript.length) {
    const speaker = SPEAKERS.find(s => transcript.startsWith(`${o.labels[s]}: ${o.delimiter}`, cursor));
    if (!speaker) {
      throw new InvalidInputError(`Unrecognised speaker at offset ${cursor}`);
    }
    const textStart = cursor + `${o.labels[speaker]}: ${o.delimiter}`.length;
    const textEnd = findClosingDelimiter(transcript, o.delimiter, textStart, after =>
      after === transcript.length ||
      (transcript[after] === '\n' && SPEAKERS.some(s => transcript.startsWith(`${o.labels[s]}: ${o.delimiter}`, after + 1))));
    if (textEnd === -1) {
      throw new InvalidInputError(`Turn ${turns.length + 1} is not closed by the delimiter`);
    }
    turns.push({ speaker, text: transcript.slice(textStart, textEnd) });

    cursor = textEnd + o.delimiter.length;
    if (cursor < transcript.length) {
      if (transcript[cursor] !== '\n') {
        throw new InvalidInputError(`Expected a line break after turn ${turns.length}`);
      }
      cursor += 1;
      if (cursor === transcript.length) {
        throw new InvalidInputError('Transcript ends with a dangling line break');
      }
    }
  }
  return turns;
}

// The model may run past its turn when the backend ignores stop sequences.
export function extractReply(completion: string, delimiter: string = DEFAULT_DELIMITER): string {
  const end = completion.indexOf(delimiter);
  return (end === -1 ? completion : completion.slice(0, end)).trim();
}
