import { describe, expect, it } from 'vitest';
import { AuthenticationError, NetworkError } from '../../src/lib/errors';
import { OAuthTokenAcquirer, extractAccessToken } from '../../src/lib/tokenAcquirer';
import { createFakeHttp, tokenRequestKind, type FakeHandler } from '../helpers/fakeHttp';
import { RecordingLogger } from '../helpers/recordingLogger';

const BASE_URL = 'https://fuel.test';
const TOKEN_PATHS = ['/api/v1/oauth/generate_access_token', '/oauth/token'];
const credentials = { clientId: 'test-client', clientSecret: 'test-secret' };

function createAcquirer(handler: FakeHandler) {
    const { http, requests } = createFakeHttp(handler);
    const logger = new RecordingLogger();
    const acquirer = new OAuthTokenAcquirer({
        baseUrl: BASE_URL,
        tokenPaths: TOKEN_PATHS,
        scope: 'fuelfinder.read',
        timeoutMs: 5000,
        logger,
        http
    });
    return { acquirer, requests, logger };
}

describe('extractAccessToken', () => {
    it('reads the token from the success envelope', () => {
        expect(extractAccessToken({ success: true, data: { access_token: 'test-token' } })).toBe('test-token');
    });

    it('reads the token from a bare OAuth payload', () => {
        expect(extractAccessToken({ access_token: 'test-token', token_type: 'Bearer' })).toBe('test-token');
    });

    it('rejects a payload without a token', () => {
        expect(() => extractAccessToken({ success: true, data: {} })).toThrow(AuthenticationError);
        expect(() => extractAccessToken({ token_type: 'Bearer' })).toThrow('No access token in response: {"token_type":"Bearer"}');
    });
});

describe('OAuthTokenAcquirer', () => {
    it('fails fast when credentials are missing', async () => {
        const { acquirer, requests } = createAcquirer(() => ({ status: 200, data: { access_token: 'test-token' } }));

        await expect(acquirer.acquire({ clientId: '', clientSecret: 'test-secret' })).rejects.toBeInstanceOf(
            AuthenticationError
        );
        expect(requests).toHaveLength(0);
    });

    it('returns the token from the first successful JSON request', async () => {
        const { acquirer, requests, logger } = createAcquirer(() => ({
            status: 200,
            data: { success: true, data: { access_token: 'test-token' } }
        }));

        await expect(acquirer.acquire(credentials)).resolves.toBe('test-token');
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('https://fuel.test/api/v1/oauth/generate_access_token');
        expect(JSON.parse(String(requests[0].data))).toEqual({ client_id: 'test-client', client_secret: 'test-secret' });
        expect(requests[0].timeout).toBe(5000);
        expect(logger.messages('info')).toContain('Success with JSON format at /api/v1/oauth/generate_access_token');
    });

    it('probes formats in order on each path until one answers 200', async () => {
        const { acquirer, requests, logger } = createAcquirer((request) => {
            if (request.url === 'https://fuel.test/oauth/token' && tokenRequestKind(request) === 'basic') {
                return { status: 200, data: { access_token: 'test-token' } };
            }
            return { status: 401, data: { error: 'invalid_client' } };
        });

        await expect(acquirer.acquire(credentials)).resolves.toBe('test-token');
        expect(requests.map((request) => [request.url, tokenRequestKind(request)])).toEqual([
            ['https://fuel.test/api/v1/oauth/generate_access_token', 'json'],
            ['https://fuel.test/api/v1/oauth/generate_access_token', 'form'],
            ['https://fuel.test/api/v1/oauth/generate_access_token', 'basic'],
            ['https://fuel.test/oauth/token', 'json'],
            ['https://fuel.test/oauth/token', 'form'],
            ['https://fuel.test/oauth/token', 'basic']
        ]);
        expect(requests[5].auth).toEqual({ username: 'test-client', password: 'test-secret' });
        expect(logger.messages('warn')[0]).toBe('JSON format returned 401: {"error":"invalid_client"}');
    });

    it('sends the client-credentials grant as a form body', async () => {
        const { acquirer, requests } = createAcquirer((request) =>
            tokenRequestKind(request) === 'form' ? { status: 200, data: { access_token: 'test-token' } } : { status: 400 }
        );

        await acquirer.acquire(credentials);

        expect(String(requests[1].data)).toBe(
            'grant_type=client_credentials&client_id=test-client&client_secret=test-secret&scope=fuelfinder.read'
        );
    });

    it('treats a non-JSON 200 body as a rejected attempt', async () => {
        const { acquirer, requests } = createAcquirer((request) =>
            tokenRequestKind(request) === 'json'
                ? { status: 200, data: '<html>maintenance</html>' }
                : { status: 200, data: { access_token: 'test-token' } }
        );

        await expect(acquirer.acquire(credentials)).resolves.toBe('test-token');
        expect(requests).toHaveLength(2);
    });

    it('stops with an authentication error when a 200 JSON body has no token', async () => {
        const { acquirer, requests } = createAcquirer(() => ({ status: 200, data: { success: false } }));

        await expect(acquirer.acquire(credentials)).rejects.toBeInstanceOf(AuthenticationError);
        expect(requests).toHaveLength(1);
    });

    it('fails with a network error carrying the last transport failure when every attempt is rejected', async () => {
        const { acquirer, requests } = createAcquirer((request) =>
            request.url === 'https://fuel.test/oauth/token' ? new Error('connect ECONNREFUSED') : { status: 404 }
        );

        const failure = acquirer.acquire(credentials);

        await expect(failure).rejects.toBeInstanceOf(NetworkError);
        await expect(failure).rejects.toThrow('All token endpoints failed. Last error: connect ECONNREFUSED');
        expect(requests).toHaveLength(6);
    });

    it('reports no last error when every attempt got a response', async () => {
        const { acquirer } = createAcquirer(() => ({ status: 403 }));

        await expect(acquirer.acquire(credentials)).rejects.toThrow('All token endpoints failed. Last error: none');
    });
});
