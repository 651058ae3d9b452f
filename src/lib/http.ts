import axios, { type AxiosInstance } from 'axios';
import { ApiError, NetworkError } from './errors';

export const USER_AGENT = 'UK-Fuel-Finder-Sync/1.0';

export function createHttpClient(): AxiosInstance {
    return axios.create({
        headers: {
            'User-Agent': USER_AGENT,
            'Accept': 'application/json'
        }
    });
}

// First 200 characters of a response body, for log lines
export function previewBody(data: unknown): string {
    const text = typeof data === 'string' ? data : String(JSON.stringify(data));
    return text.substring(0, 200);
}

/**
 * Translate an axios failure into the taxonomy: a response with a bad status
 * is an ApiError, anything without a response is a NetworkError. Errors that
 * did not come from axios are returned unchanged.
 */
export function toRequestError(error: unknown, action: string): unknown {
    if (!axios.isAxiosError(error)) return error;

    if (error.response) {
        return new ApiError(
            `${action} returned ${error.response.status} ${error.response.statusText}`.trim(),
            error.response.status,
            { body: previewBody(error.response.data) }
        );
    }
    return new NetworkError(`${action} failed: ${error.message}`, { code: error.code });
}
