import { z } from 'zod';
import { UsageError } from '../types/errors';

const envSchema = z.object({
    // Recognizer
    AUDIVERIS_PATH: z.string().min(1).optional(),
    AUDIVERIS_JAVA_HOME: z.string().min(1).optional(),
    OMR_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),

    // Resolution guard
    OMR_MIN_WIDTH: z.coerce.number().int().positive().default(1200),
    OMR_MIN_HEIGHT: z.coerce.number().int().positive().default(600),
    OMR_SCALE_FACTOR: z.coerce.number().int().min(2).max(16).default(4),

    // Annotation
    OMR_COORDINATE_SPACE: z.enum(['recognizer', 'original']).default('recognizer'),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/** Validates the environment; empty strings count as unset. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const cleaned = Object.fromEntries(
        Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== '')
    );
    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        throw new UsageError(`Invalid environment configuration:\n${issues}`);
    }
    return parsed.data;
}
