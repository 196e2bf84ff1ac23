import fs from 'fs';
import path from 'path';
import process from 'process';
import { z } from 'zod';
import { isLogLevel, logToStderr } from './utils/logger.js';

export const CONFIG_FILE = path.join(process.cwd(), 'docx-filler.config.json');

export const DEFAULT_VALIDATION_TIMEOUT = 10000; // milliseconds

export const ConfigSchema = z.object({
    sofficePath: z.string().min(1).default('soffice'),
    validationTimeoutMs: z.number().int().positive().default(DEFAULT_VALIDATION_TIMEOUT),
    forcePack: z.boolean().default(false),
    includeHeadersFooters: z.boolean().default(true),
    logLevel: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load configuration: defaults, then the optional JSON file, then
 * environment overrides.  A broken file is reported and ignored.
 */
export function loadConfig(configFile: string = CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): Config {
    return applyEnvironment(readConfigFile(configFile), env);
}

function readConfigFile(configFile: string): Config {
    let raw: unknown = {};
    try {
        if (fs.existsSync(configFile)) {
            raw = JSON.parse(fs.readFileSync(configFile, 'utf8'));
        }
    } catch (error) {
        logToStderr('warning', `Error loading config ${configFile}, using defaults`, error);
        return ConfigSchema.parse({});
    }

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        logToStderr('warning', `Invalid config ${configFile} (${details}), using defaults`);
        return ConfigSchema.parse({});
    }
    return parsed.data;
}

export function applyEnvironment(config: Config, env: NodeJS.ProcessEnv): Config {
    const result = { ...config };

    if (env.DOCX_FILLER_SOFFICE) result.sofficePath = env.DOCX_FILLER_SOFFICE;

    const timeout = Number(env.DOCX_FILLER_VALIDATION_TIMEOUT_MS);
    if (env.DOCX_FILLER_VALIDATION_TIMEOUT_MS && Number.isInteger(timeout) && timeout > 0) {
        result.validationTimeoutMs = timeout;
    }

    const force = env.DOCX_FILLER_FORCE_PACK?.toLowerCase();
    if (force === 'true' || force === '1') result.forcePack = true;
    if (force === 'false' || force === '0') result.forcePack = false;

    const level = env.DOCX_FILLER_LOG_LEVEL?.toLowerCase();
    if (level && isLogLevel(level)) result.logLevel = level;

    return result;
}

let cached: Config | null = null;

/** Configuration of the running server, loaded once. */
export function getConfig(): Config {
    cached ??= loadConfig();
    return cached;
}
