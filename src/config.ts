import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import { ConfigError, errorMessage } from './errors';

export const ConfigSchema = z.object({
    wavelog: z.object({
        url: z.string().min(1, 'wavelog.url is required'),
        apiKey: z.string().min(1, 'wavelog.apiKey is required'),
        stationProfileId: z.string().min(1, 'wavelog.stationProfileId is required'),
        timeout: z.number().int().positive().default(5000),     // HTTP timeout in ms
    }),
    server: z.object({
        port: z.number().int().min(1).max(65535).default(2333), // UDP listen port
        verbose: z.boolean().default(false),
        maxConcurrent: z.number().int().positive().default(4),  // Payloads processed in parallel
    }).default({}),
    log: z.object({
        file: z.string().default('wavelog-transport.log'),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export const DEFAULT_CONFIG_FILE = 'config.json';

// Written when no config file exists yet
export const DEFAULT_CONFIG: ConfigInput = {
    wavelog: {
        url: 'https://your-wavelog-url.com',
        apiKey: 'your-api-key-here',
        stationProfileId: '1',
        timeout: 5000,
    },
    server: {
        port: 2333,
        verbose: true,
        maxConcurrent: 4,
    },
    log: {
        file: 'wavelog-transport.log',
    },
};

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
    const value = raw[name];
    return isRecord(value) ? value : {};
}

function parseBooleanEnv(value: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Apply environment overrides on top of the file contents (env vars take precedence)
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
    const wavelog = { ...section(raw, 'wavelog') };
    const server = { ...section(raw, 'server') };

    if (env.WAVELOG_URL) wavelog.url = env.WAVELOG_URL;
    if (env.WAVELOG_API_KEY) wavelog.apiKey = env.WAVELOG_API_KEY;
    if (env.WAVELOG_STATION_PROFILE_ID) wavelog.stationProfileId = env.WAVELOG_STATION_PROFILE_ID;
    if (env.WAVELOG_TRANSPORT_PORT) server.port = Number(env.WAVELOG_TRANSPORT_PORT);
    if (env.WAVELOG_TRANSPORT_VERBOSE) server.verbose = parseBooleanEnv(env.WAVELOG_TRANSPORT_VERBOSE);

    return { ...raw, wavelog, server };
}

export function parseConfig(raw: unknown, env: Env = {}): Config {
    if (!isRecord(raw)) {
        throw new ConfigError('failed to parse config file: expected a JSON object');
    }

    const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`invalid configuration: ${issues}`);
    }
    return result.data;
}

export function createDefaultConfig(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
}

/**
 * Load config from a JSON file. A missing file is replaced by a template
 * and reported as an error so the operator can fill it in.
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_FILE, env: Env = process.env): Config {
    const resolved = path.resolve(process.cwd(), filePath);

    if (!fs.existsSync(resolved)) {
        try {
            createDefaultConfig(resolved);
        } catch (error) {
            throw new ConfigError(`failed to create default config: ${errorMessage(error)}`);
        }
        throw new ConfigError(`default config created at ${resolved} - please configure and restart`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`failed to parse config file: ${errorMessage(error)}`);
    }

    return parseConfig(raw, env);
}
