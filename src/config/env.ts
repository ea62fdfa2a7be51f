import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

/**
 * Drop a trailing "# comment" some deployments leave in numeric values
 */
function stripComment(value: unknown): unknown {
    if (typeof value !== 'string') {
        return value;
    }
    return value.split('#')[0].trim();
}

const positiveInt = () => z.preprocess(stripComment, z.coerce.number().int().positive().finite());

// Define the schema for environment variables
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_TO_FILE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),
    LOG_DIR: z.string().min(1).default('./logs'),

    // Upstream price endpoint
    PRICE_URL: z.string().url().default('https://play.myfly.club/oil-prices'),
    POLLING_INTERVAL_S: positiveInt().default(300),
    REQUEST_TIMEOUT_MS: positiveInt().default(30000),

    // Change detection
    CHANGE_THRESHOLD: z.preprocess(stripComment, z.coerce.number().nonnegative().finite()).default(0.01),

    // Adaptive polling
    NO_CHANGE_LIMIT: z.preprocess(stripComment, z.coerce.number().int().positive()).default(3),
    RELAX_MULTIPLIER: z.preprocess(stripComment, z.coerce.number().int().min(1)).default(3),
    ERROR_BACKOFF_MS: positiveInt().default(60000),

    // Local history
    HISTORY_FILE: z.string().min(1).default('price_history.json'),
});

// Parse and validate environment variables
function validateEnv() {
    try {
        return envSchema.parse(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('❌ Invalid environment variables:');
            error.errors.forEach(err => {
                console.error(`  - ${err.path.join('.')}: ${err.message}`);
            });
            process.exit(1);
        }
        throw error;
    }
}

// Export validated environment configuration
export const env = validateEnv();

export type Env = z.infer<typeof envSchema>;
