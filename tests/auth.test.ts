import { AuthService, isTokenExpired } from '../lib/auth';
import { AuthenticationError } from '../lib/errors';
import { AUTH_URL, jsonResponse, mockFetch, silentLogger, testConfig, textResponse } from './support/fixtures';

function sentForm(fetchMock: ReturnType<typeof mockFetch>): URLSearchParams {
    const init = fetchMock.mock.calls[0][1];
    if (!(init?.body instanceof URLSearchParams)) {
        throw new Error('expected a form body');
    }
    return init.body;
}

describe('AuthService', () => {
    let fetchMock: ReturnType<typeof mockFetch>;
    let auth: AuthService;

    beforeEach(() => {
        fetchMock = mockFetch();
        auth = new AuthService(testConfig, silentLogger(), fetchMock);
    });

    describe('authenticate', () => {
        it('should return the access token on a 200 response', async () => {
            fetchMock.mockResolvedValue(jsonResponse({
                access_token: 'test-access-token',
                token_type: 'bearer',
                refresh_token: 'test-refresh-token'
            }));

            const token = await auth.authenticate();

            expect(token).toEqual({
                accessToken: 'test-access-token',
                tokenType: 'bearer',
                refreshToken: 'test-refresh-token'
            });
        });

        it('should send a password grant with the api key header', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ access_token: 'test-access-token' }));

            await auth.authenticate();

            expect(fetchMock).toHaveBeenCalledTimes(1);
            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe(AUTH_URL);
            expect(init?.method).toBe('POST');
            expect(init?.headers).toEqual({
                'Content-Type': 'application/x-www-form-urlencoded',
                'x-api-key': 'test-api-key'
            });
            expect(Object.fromEntries(sentForm(fetchMock))).toEqual({
                grant_type: 'password',
                username: 'analyst@test.local',
                password: 'test-password',
                client_id: 'test-client',
                client_secret: 'test-secret'
            });
        });

        it('should compute the expiry from expires_in', async () => {
            jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
            fetchMock.mockResolvedValue(jsonResponse({ access_token: 'test-access-token', expires_in: 3600 }));

            const token = await auth.authenticate();

            expect(token.expiresIn).toBe(3600);
            expect(token.expiresAt?.getTime()).toBe(1_000_000 + 3_600_000);
            expect(token.tokenType).toBe('bearer');
        });

        it('should accept expires_in sent as a string', async () => {
            jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
            fetchMock.mockResolvedValue(jsonResponse({ access_token: 'test-access-token', expires_in: '3600' }));

            const token = await auth.authenticate();

            expect(token.expiresIn).toBe(3600);
            expect(token.expiresAt?.getTime()).toBe(1_000_000 + 3_600_000);
        });

        it('should accept null optional fields', async () => {
            fetchMock.mockResolvedValue(jsonResponse({
                access_token: 'test-access-token',
                token_type: null,
                expires_in: null,
                refresh_token: null,
                scope: null
            }));

            const token = await auth.authenticate();

            expect(token).toEqual({ accessToken: 'test-access-token', tokenType: 'bearer' });
        });

        it('should drop malformed optional fields with a warning', async () => {
            const logger = silentLogger();
            auth = new AuthService(testConfig, logger, fetchMock);
            fetchMock.mockResolvedValue(jsonResponse({
                access_token: 'test-access-token',
                expires_in: 'soon',
                scope: ['read']
            }));

            const token = await auth.authenticate();

            expect(token).toEqual({ accessToken: 'test-access-token', tokenType: 'bearer' });
            expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed token response fields: expires_in, scope');
        });

        it('should fail on a JSON body that is not an object', async () => {
            fetchMock.mockResolvedValue(jsonResponse(['test-access-token']));

            await expect(auth.authenticate()).rejects.toThrow('Token response is not a JSON object');
        });

        it.each([401, 500])('should fail on HTTP %i', async (status) => {
            fetchMock.mockResolvedValue(textResponse('{"error":"denied"}', status));

            const error = await auth.authenticate().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AuthenticationError);
            expect(error).toMatchObject({
                status,
                body: '{"error":"denied"}',
                message: `Token request rejected with HTTP ${status}: {"error":"denied"}`
            });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should fail on a body that is not JSON', async () => {
            fetchMock.mockResolvedValue(textResponse('<html>oops</html>', 200));

            await expect(auth.authenticate()).rejects.toThrow('Token response is not valid JSON');
        });

        it('should fail when access_token is missing', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ token_type: 'bearer' }));

            await expect(auth.authenticate()).rejects.toThrow('Token response does not contain an access_token');
        });

        it('should wrap transport errors', async () => {
            fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));

            const error = await auth.authenticate().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AuthenticationError);
            expect(error).toMatchObject({
                message: `Token request to ${AUTH_URL} failed: connect ECONNREFUSED`,
                status: undefined
            });
        });
    });

    describe('refresh', () => {
        it('should send a refresh_token grant to the configured auth url', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ access_token: 'test-new-token' }));

            const token = await auth.refresh('test-refresh-token');

            expect(token.accessToken).toBe('test-new-token');
            expect(fetchMock.mock.calls[0][0]).toBe(AUTH_URL);
            expect(Object.fromEntries(sentForm(fetchMock))).toEqual({
                grant_type: 'refresh_token',
                client_id: 'test-client',
                client_secret: 'test-secret',
                refresh_token: 'test-refresh-token'
            });
        });
    });

    describe('isTokenExpired', () => {
        it('should treat a token without expiry as valid', () => {
            expect(isTokenExpired({ accessToken: 'a', tokenType: 'bearer' })).toBe(false);
        });

        it('should compare expiresAt with the given time', () => {
            const token = { accessToken: 'a', tokenType: 'bearer', expiresAt: new Date(5000) };

            expect(isTokenExpired(token, new Date(4999))).toBe(false);
            expect(isTokenExpired(token, new Date(5000))).toBe(true);
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });
});
