import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from '../../lib/logger';
import { FetchLike, IngestorConfig } from '../../lib/typing';

export const AUTH_URL = 'https://auth.test.local/auth';
export const INGESTION_BASE_URL = 'https://ingest.test.local/ingestion-api/v1';

export const testConfig: IngestorConfig = {
    username: 'analyst@test.local',
    password: 'test-password',
    apiKey: 'test-api-key',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    authUrl: AUTH_URL,
    ingestionBaseUrl: INGESTION_BASE_URL,
    uploadClientId: 'enterprise-sync'
};

export const VALID_TOML = `[alphasense]
username = "analyst@test.local"
password = "test-password"
api_key = "test-api-key"
client_id = "test-client"
client_secret = "test-secret"
auth_url = "${AUTH_URL}"
ingestion_base_url = "${INGESTION_BASE_URL}"
`;

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'alphasense-ingest-'));
}

export function writeFile(dir: string, name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
}

export function silentLogger(): Logger {
    return {
        runId: 'test-run',
        verbose: false,
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn()
    };
}

export function mockFetch() {
    return jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    });
}

export function textResponse(body: string, status: number): Response {
    return new Response(body, { status });
}
