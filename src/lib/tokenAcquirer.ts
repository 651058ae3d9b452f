import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { ClientCredentials, Logger, TokenAcquirer } from '../types';
import { AuthenticationError, NetworkError, describeError } from './errors';
import { previewBody } from './http';

type TokenRequestFormat = 'json' | 'form' | 'basic';

const TOKEN_REQUEST_FORMATS: readonly TokenRequestFormat[] = ['json', 'form', 'basic'];

const FORMAT_LABELS: Record<TokenRequestFormat, string> = {
    json: 'JSON format',
    form: 'form-urlencoded',
    basic: 'Basic Auth'
};

// Either the {success, data} envelope or a bare OAuth payload
const TokenPayloadSchema = z.union([
    z
        .object({ success: z.literal(true), data: z.object({ access_token: z.string().min(1) }) })
        .transform((payload) => payload.data.access_token),
    z.object({ access_token: z.string().min(1) }).transform((payload) => payload.access_token)
]);

export function extractAccessToken(payload: unknown): string {
    const result = TokenPayloadSchema.safeParse(payload);
    if (!result.success) {
        throw new AuthenticationError(`No access token in response: ${previewBody(payload)}`);
    }
    return result.data;
}

function isJsonObject(data: unknown): boolean {
    return typeof data === 'object' && data !== null && !Array.isArray(data);
}

export interface OAuthTokenAcquirerOptions {
    baseUrl: string;
    tokenPaths: readonly string[];
    scope: string;
    timeoutMs: number;
    logger: Logger;
    http?: AxiosInstance;
}

/**
 * Obtains a bearer token with the client-credentials grant. Each token path is
 * tried with a JSON body, a form body, and HTTP Basic auth, in that order,
 * until one answers 200.
 */
export class OAuthTokenAcquirer implements TokenAcquirer {
    private readonly http: AxiosInstance;

    constructor(private readonly options: OAuthTokenAcquirerOptions) {
        this.http = options.http ?? axios.create();
    }

    async acquire(credentials: ClientCredentials): Promise<string> {
        if (!credentials.clientId || !credentials.clientSecret) {
            throw new AuthenticationError(
                'Missing OAuth credentials. Set GOV_UK_CLIENT_ID and GOV_UK_CLIENT_SECRET environment variables.'
            );
        }

        const { logger } = this.options;
        let lastError: unknown;

        for (const tokenPath of this.options.tokenPaths) {
            const tokenUrl = `${this.options.baseUrl}${tokenPath}`;
            logger.info(`Trying token endpoint: ${tokenUrl}`);

            for (const format of TOKEN_REQUEST_FORMATS) {
                const label = FORMAT_LABELS[format];
                const [body, config] = this.buildRequest(format, credentials);

                let response: AxiosResponse<unknown>;
                try {
                    response = await this.http.post<unknown>(tokenUrl, body, config);
                } catch (error) {
                    logger.warn(`${label} failed for ${tokenPath}: ${describeError(error)}`);
                    lastError = error;
                    continue;
                }

                if (response.status !== 200) {
                    logger.warn(`${label} returned ${response.status}: ${previewBody(response.data)}`);
                    continue;
                }
                if (!isJsonObject(response.data)) {
                    logger.warn(`${label} at ${tokenPath} returned a body that is not JSON: ${previewBody(response.data)}`);
                    continue;
                }

                logger.info(`Success with ${label} at ${tokenPath}`);
                const token = extractAccessToken(response.data);
                logger.info('Successfully obtained access token');
                return token;
            }
        }

        const reason = lastError === undefined ? 'none' : describeError(lastError);
        throw new NetworkError(`All token endpoints failed. Last error: ${reason}`);
    }

    private buildRequest(format: TokenRequestFormat, credentials: ClientCredentials): [unknown, AxiosRequestConfig] {
        const config: AxiosRequestConfig = {
            timeout: this.options.timeoutMs,
            // Every status is inspected here rather than thrown
            validateStatus: () => true,
            headers: { 'Accept': 'application/json' }
        };

        switch (format) {
            case 'json':
                return [
                    { client_id: credentials.clientId, client_secret: credentials.clientSecret },
                    { ...config, headers: { 'Accept': 'application/json', 'Content-Type': 'application/json' } }
                ];
            case 'form':
                return [
                    new URLSearchParams({
                        grant_type: 'client_credentials',
                        client_id: credentials.clientId,
                        client_secret: credentials.clientSecret,
                        scope: this.options.scope
                    }),
                    config
                ];
            case 'basic':
                return [
                    new URLSearchParams({ grant_type: 'client_credentials', scope: this.options.scope }),
                    { ...config, auth: { username: credentials.clientId, password: credentials.clientSecret } }
                ];
        }
    }
}
