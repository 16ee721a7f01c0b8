import {z} from 'zod';
import {AuthenticationError, describeError} from './errors';
import {Logger, maskSecret} from './logger';
import {AccessToken, FetchLike, IngestorConfig} from './typing';

const lenientString = z.string().nullish().catch(undefined);

// Only access_token is required; malformed optional fields are dropped.
const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: lenientString,
    expires_in: z.union([
        z.number(),
        z.string().trim().regex(/^\d+(\.\d+)?$/).transform(Number)
    ]).pipe(z.number().nonnegative()).nullish().catch(undefined),
    refresh_token: lenientString,
    scope: lenientString
});

const OPTIONAL_TOKEN_FIELDS = ['token_type', 'expires_in', 'refresh_token', 'scope'] as const;

export function isTokenExpired(token: AccessToken, now: Date = new Date()): boolean {
    return token.expiresAt !== undefined && token.expiresAt.getTime() <= now.getTime();
}

/**
 * OAuth2 client for the AlphaSense auth endpoint. Every call makes exactly
 * one request; failures surface as AuthenticationError.
 */
export class AuthService {
    constructor(
        private readonly config: IngestorConfig,
        private readonly logger: Logger,
        private readonly fetchImpl: FetchLike = fetch
    ) {
    }

    // Exchange username/password and client credentials for a bearer token
    async authenticate(): Promise<AccessToken> {
        this.logger.debug(`Requesting password-grant token for ${this.config.username} from ${this.config.authUrl}`);
        return this.requestToken(new URLSearchParams({
            grant_type: 'password',
            username: this.config.username,
            password: this.config.password,
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret
        }));
    }

    // Not invoked by the CLI flow.
    async refresh(refreshToken: string): Promise<AccessToken> {
        this.logger.debug(`Refreshing token ${maskSecret(refreshToken)} at ${this.config.authUrl}`);
        return this.requestToken(new URLSearchParams({
            grant_type: 'refresh_token',
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            refresh_token: refreshToken
        }));
    }

    private async requestToken(form: URLSearchParams): Promise<AccessToken> {
        const startTime = Date.now();
        let response: Response;
        let body: string;
        try {
            response = await this.fetchImpl(this.config.authUrl, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'x-api-key': this.config.apiKey
                },
                body: form
            });
            body = await response.text();
        } catch (error) {
            throw new AuthenticationError(`Token request to ${this.config.authUrl} failed: ${describeError(error)}`, {cause: error});
        }

        this.logger.debug(`Token endpoint answered HTTP ${response.status} in ${Date.now() - startTime}ms`);

        if (!response.ok) {
            throw new AuthenticationError(`Token request rejected with HTTP ${response.status}: ${body}`, {
                status: response.status,
                body
            });
        }

        let payload: unknown;
        try {
            payload = JSON.parse(body);
        } catch (error) {
            throw new AuthenticationError('Token response is not valid JSON', {status: response.status, body, cause: error});
        }

        const fields = z.record(z.string(), z.unknown()).safeParse(payload);
        if (!fields.success) {
            throw new AuthenticationError('Token response is not a JSON object', {status: response.status, body});
        }

        const parsed = TokenResponseSchema.safeParse(fields.data);
        if (!parsed.success) {
            throw new AuthenticationError('Token response does not contain an access_token', {
                status: response.status,
                body,
                cause: parsed.error
            });
        }

        const tokens = parsed.data;
        const dropped = OPTIONAL_TOKEN_FIELDS.filter(field =>
            fields.data[field] != null && tokens[field] == null);
        if (dropped.length > 0) {
            this.logger.warn(`Ignoring malformed token response fields: ${dropped.join(', ')}`);
        }

        const token: AccessToken = {
            accessToken: tokens.access_token,
            tokenType: tokens.token_type ?? 'bearer'
        };
        if (typeof tokens.expires_in === 'number') {
            token.expiresIn = tokens.expires_in;
            token.expiresAt = new Date(startTime + tokens.expires_in * 1000);
        }
        if (tokens.refresh_token) token.refreshToken = tokens.refresh_token;
        if (tokens.scope) token.scope = tokens.scope;

        this.logger.debug(`✅ Obtained ${token.tokenType} token ${maskSecret(token.accessToken)}`);
        return token;
    }
}
