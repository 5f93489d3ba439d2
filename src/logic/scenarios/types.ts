import z from 'zod';
import { labelsAreDistinct } from '../harness/prompt-harness';

export const scenarioSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().default(''),
  snippet: z.string().refine(s => s.trim().length > 0, 'snippet must not be empty'),
  instruction: z.string().optional(),
  delimiter: z.string().min(1).optional(),
  labels: z
    .object({ user: z.string().min(1).optional(), assistant: z.string().min(1).optional() })
    .refine(labelsAreDistinct, 'user and assistant labels must differ')
    .optional(),
  turns: z.array(z.object({ speaker: z.enum(['user', 'assistant']), text: z.string() })).default([]),
});

export type ScenarioFile = z.infer<typeof scenarioSchema>;

export type Scenario = ScenarioFile & { name: string; source: string };

// What the HTTP API returns: the file path stays on the server.
export type ScenarioView = Omit<Scenario, 'source'>;

export interface ScenarioSummary {
  name: string;
  description: string;
  turnCount: number;
}

