// src/config.ts

import 'dotenv/config';
import { z } from 'zod';

export type StoreMode = 'dedupe' | 'append';

export interface AppConfig {
    botToken: string;
    geminiApiKey: string;
    ownerId?: number;
    port: number;
    dbFile: string;
    geminiModel: string;
    geminiTimeoutMs: number;
    storeMode: StoreMode;
}

const required = (name: string) =>
    z.string({ required_error: `"${name}" env variable is required!` })
        .trim()
        .min(1, `"${name}" env variable is required!`);

const EnvSchema = z.object({
    BOT_TOKEN: required('BOT_TOKEN'),
    GEMINI_API_KEY: required('GEMINI_API_KEY'),
    // Not used by the bot itself; kept so deployments can carry it.
    OWNER_ID: z.coerce.number().int().positive().optional(),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    DB_FILE: z.string().trim().min(1).default('users_data.db'),
    GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.0-flash'),
    GEMINI_TIMEOUT_MS: z.coerce.number().int().min(10_000).max(15_000).default(10_000),
    STORE_MODE: z.enum(['dedupe', 'append']).default('dedupe'),
});

// Empty strings from .env files count as unset.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') out[key] = value;
    }
    return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue =>
            issue.message.includes('env variable')
                ? issue.message
                : `"${issue.path.join('.')}": ${issue.message}`
        );
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
    const e = parsed.data;
    return {
        botToken: e.BOT_TOKEN,
        geminiApiKey: e.GEMINI_API_KEY,
        ownerId: e.OWNER_ID,
        port: e.PORT,
        dbFile: e.DB_FILE,
        geminiModel: e.GEMINI_MODEL,
        geminiTimeoutMs: e.GEMINI_TIMEOUT_MS,
        storeMode: e.STORE_MODE,
    };
}
