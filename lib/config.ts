import * as fs from 'node:fs/promises';
import {parse as parseToml} from '@iarna/toml';
import {z} from 'zod';
import {ConfigurationError, describeError, errorCode} from './errors';
import {IngestorConfig} from './typing';

export const DEFAULT_CONFIG_PATH = './alphasense.toml';
export const CONFIG_TABLE = 'alphasense';
export const DEFAULT_UPLOAD_CLIENT_ID = 'enterprise-sync';

const ENV_PREFIX = 'ALPHASENSE_';

// TOML integers such as `client_id = 42` are taken as their string form
const scalar = z.union([z.string(), z.number(), z.bigint()]).transform(value => String(value));
const requiredString = scalar.pipe(z.string().trim().min(1));
const requiredUrl = scalar.pipe(z.string().trim().min(1).url());

export const IngestorConfigSchema = z.object({
    username: requiredString,
    password: requiredString,
    api_key: requiredString,
    client_id: requiredString,
    client_secret: requiredString,
    auth_url: requiredUrl,
    ingestion_base_url: requiredUrl,
    upload_client_id: requiredString.default(DEFAULT_UPLOAD_CLIENT_ID)
});

const CONFIG_KEYS = IngestorConfigSchema.keyof().options;

export type Env = Record<string, string | undefined>;

function applyEnvOverrides(table: Record<string, unknown>, env: Env): Record<string, unknown> {
    const merged: Record<string, unknown> = {...table};
    for (const key of CONFIG_KEYS) {
        const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
        if (value !== undefined && value.trim() !== '') {
            merged[key] = value;
        }
    }
    return merged;
}

function isTable(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the `[alphasense]` table of a TOML document into an immutable config.
 * `origin` only appears in error messages.
 */
export function parseConfig(source: string, origin: string, env: Env = {}): IngestorConfig {
    let document: Record<string, unknown>;
    try {
        document = parseToml(source);
    } catch (error) {
        throw new ConfigurationError(`Invalid TOML in ${origin}: ${describeError(error)}`, {cause: error});
    }

    const table = document[CONFIG_TABLE];
    if (!isTable(table)) {
        throw new ConfigurationError(`Missing [${CONFIG_TABLE}] section in ${origin}`);
    }

    const result = IngestorConfigSchema.safeParse(applyEnvOverrides(table, env));
    if (!result.success) {
        const fields = [...new Set(result.error.issues.map(issue => issue.path.join('.')))];
        throw new ConfigurationError(`Missing or invalid fields in [${CONFIG_TABLE}] of ${origin}: ${fields.join(', ')} (expected non-empty strings or numbers, URLs for auth_url and ingestion_base_url)`);
    }

    const parsed = result.data;
    return Object.freeze({
        username: parsed.username,
        password: parsed.password,
        apiKey: parsed.api_key,
        clientId: parsed.client_id,
        clientSecret: parsed.client_secret,
        authUrl: parsed.auth_url,
        ingestionBaseUrl: parsed.ingestion_base_url,
        uploadClientId: parsed.upload_client_id
    });
}

export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): Promise<IngestorConfig> {
    let source: string;
    try {
        source = await fs.readFile(configPath, {encoding: 'utf-8'});
    } catch (error) {
        const message = errorCode(error) === 'ENOENT'
            ? `Configuration file not found: ${configPath}`
            : `Cannot read configuration file ${configPath}: ${describeError(error)}`;
        throw new ConfigurationError(message, {cause: error});
    }
    return parseConfig(source, configPath, env);
}
