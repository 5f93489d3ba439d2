import z from 'zod';

export const DEFAULT_DELIMITER = '"""';

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8787),
    CORS_ORIGIN: z.string().default('*'),
    GEMINI_API_KEY: z.string().default(''),
    GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),
    COMPLETION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    COMPLETION_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(512),
    HARNESS_DELIMITER: z.string().min(1).default(DEFAULT_DELIMITER),
    SCENARIOS_DIR: z.string().min(1).default('scenarios'),
    SESSIONS_MAX: z.coerce.number().int().positive().default(100),
    SESSION_IDLE_MINUTES: z.coerce.number().positive().default(60),
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

// Used as ConfigModule's `validate` hook; the returned object replaces process.env in ConfigService.
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
    const parsed = envSchema.safeParse(config);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${problems}`);
    }
    return parsed.data;
}
