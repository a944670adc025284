/**
 * Centralized Environment Variable Validation
 *
 * Validates every environment variable at startup using Zod. When validation
 * fails the process exits with the list of offending variables.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add a JSDoc comment explaining the variable
 * 3. Document it in .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - App will not start without these
    // ----------------------------------------

    /** PostgreSQL connection string */
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** Pino level override (trace, debug, info, warn, error, fatal, silent) */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    /** CORS allowed origin (production only) */
    CORS_ORIGIN: z.string().optional(),

    // ----------------------------------------
    // AI / ANTHROPIC
    // ----------------------------------------

    /** Anthropic API key for the chat agent. Without it the agent answers with a configuration error. */
    ANTHROPIC_API_KEY: z.string().optional(),

    /** Model used for chat completions */
    AI_MODEL: z.string().default('claude-sonnet-4-5-20250929'),

    /** Max tokens per model response */
    AI_MAX_TOKENS: z.coerce.number().int().positive().default(1024),

    // ----------------------------------------
    // KNOWLEDGE BASE (vector store)
    // ----------------------------------------

    /** Qdrant base URL, e.g. http://localhost:6333 */
    QDRANT_URL: z.string().url().optional(),

    /** Qdrant API key (cloud deployments) */
    QDRANT_API_KEY: z.string().optional(),

    /** Collection holding the help-centre articles */
    QDRANT_COLLECTION: z.string().default('knowledge_base'),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

function parseEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (result.success) return result.data;

    const issues = result.error.issues.map(issue => {
        const path = issue.path.join('.');
        return `  - ${path}: ${issue.message}`;
    }).join('\n');

    console.error('Environment validation failed:\n' + issues);
    process.exit(1);
}

export const env = parseEnv();
