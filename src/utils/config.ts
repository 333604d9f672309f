import { z } from 'zod';

export const ConfigSchema = z.object({
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    LOG_FORMAT: z.enum(['json', 'simple']).default('simple'),
});

export type Config = z.infer<typeof ConfigSchema>;

function fromEnv(env: NodeJS.ProcessEnv) {
    return {
        LOG_LEVEL: env.LOG_LEVEL || undefined,
        LOG_FORMAT: env.LOG_FORMAT || undefined,
    };
}

/**
 * Reads configuration from environment variables. Unknown variables are ignored;
 * an invalid value throws a ZodError naming the variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return ConfigSchema.parse(fromEnv(env));
}

/** Like {@link loadConfig}, but reports invalid values instead of throwing. */
export function safeLoadConfig(env: NodeJS.ProcessEnv = process.env) {
    return ConfigSchema.safeParse(fromEnv(env));
}
