import path from 'path';
import { z } from 'zod';

const serverSchema = z.object({
    SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    DATA_DIR: z.string().min(1).default('data'),
    CANVAS_API_URL: z.string().url().optional(),
    CANVAS_API_KEY: z.string().optional(),
    GEMINI_API_KEY: z.string().optional(),
    GROQ_API_KEY: z.string().optional(),
    OPENROUTER_API_KEY: z.string().optional(),
    OPENAI_API_BASE: z.string().url().optional(),
});

export interface ServerConfig {
    port: number;
    dataDir: string;
    canvas?: { baseUrl: string; token: string };
    apiKeys: { gemini?: string; groq?: string; openrouter?: string };
    openaiBaseUrl?: string;
}

// Placeholder keys copied from .env.example count as missing
const isValidKey = (key?: string): key is string => !!key && key.trim().length > 0 && !key.startsWith('your_');

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Readonly<ServerConfig> {
    // Empty strings in .env mean "unset"
    const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
    const parsed = serverSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid server configuration: ${issues}`);
    }
    const data = parsed.data;

    return Object.freeze({
        port: data.SERVER_PORT,
        dataDir: path.resolve(cwd, data.DATA_DIR),
        canvas: data.CANVAS_API_URL && isValidKey(data.CANVAS_API_KEY)
            ? { baseUrl: data.CANVAS_API_URL.replace(/\/+$/, ''), token: data.CANVAS_API_KEY }
            : undefined,
        apiKeys: {
            gemini: isValidKey(data.GEMINI_API_KEY) ? data.GEMINI_API_KEY : undefined,
            groq: isValidKey(data.GROQ_API_KEY) ? data.GROQ_API_KEY : undefined,
            openrouter: isValidKey(data.OPENROUTER_API_KEY) ? data.OPENROUTER_API_KEY : undefined,
        },
        openaiBaseUrl: data.OPENAI_API_BASE,
    });
}
