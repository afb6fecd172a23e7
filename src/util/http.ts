import axios from 'axios';
import { ScrapeAbortedError, TransportTimeoutError } from './errors';

export interface HttpResponse {
    status: number;
    body: string;
}

/**
 * Minimal GET capability the fetcher needs. Resolves for every HTTP status;
 * rejects only when no response arrived (timeout, DNS, reset, cancellation).
 */
export interface HttpTransport {
    get(url: string, headers: Readonly<Record<string, string>>, timeoutMs: number, signal?: AbortSignal): Promise<HttpResponse>;
}

export function createAxiosTransport(): HttpTransport {
    const client = axios.create({
        responseType: 'text',
        // Status handling belongs to the fetcher
        validateStatus: () => true,
        transformResponse: [(data: unknown) => data],
        maxRedirects: 5,
    });

    return {
        async get(url, headers, timeoutMs, signal) {
            try {
                const response = await client.get<unknown>(url, { headers: { ...headers }, timeout: timeoutMs, signal });
                const body = typeof response.data === 'string' ? response.data : '';
                return { status: response.status, body };
            } catch (e: unknown) {
                if (signal?.aborted || axios.isCancel(e)) {
                    throw new ScrapeAbortedError();
                }
                if (axios.isAxiosError(e) && (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT')) {
                    throw new TransportTimeoutError(url, timeoutMs);
                }
                throw e;
            }
        },
    };
}
