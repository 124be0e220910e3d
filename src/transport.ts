import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { HttpRequest, HttpResponse, HttpTransport } from './interfaces/ecos-interfaces';

export const DEFAULT_TIMEOUT = 30_000;

function encodeBody(body: unknown): string | undefined {
    return body === undefined ? undefined : JSON.stringify(body);
}

/**
 * Transport backed by axios. The body is always handed back as text so the
 * client decodes every answer the same way.
 */
export class AxiosTransport implements HttpTransport {
    private readonly http: AxiosInstance;

    constructor(options: { timeout?: number; instance?: AxiosInstance } = {}) {
        this.http = options.instance ?? axios.create({ timeout: options.timeout ?? DEFAULT_TIMEOUT });
    }

    async request(request: HttpRequest): Promise<HttpResponse> {
        const response = await this.http.request<unknown>({
            method: request.method,
            url: request.url,
            headers: request.headers,
            params: request.params,
            data: encodeBody(request.body),
            responseType: 'text',
            transformResponse: (data: unknown) => data,
            validateStatus: () => true,
        });

        return {
            status: response.status,
            statusText: response.statusText,
            body: typeof response.data === 'string' ? response.data : '',
        };
    }
}

/**
 * Transport backed by the global `fetch`.
 */
export class FetchTransport implements HttpTransport {
    private readonly timeout: number;

    constructor(options: { timeout?: number } = {}) {
        this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    }

    async request(request: HttpRequest): Promise<HttpResponse> {
        const url = new URL(request.url);
        for (const [key, value] of Object.entries(request.params ?? {})) {
            url.searchParams.append(key, String(value));
        }

        const response = await fetch(url, {
            method: request.method,
            headers: request.headers,
            body: encodeBody(request.body),
            signal: AbortSignal.timeout(this.timeout),
        });

        return {
            status: response.status,
            statusText: response.statusText,
            body: await response.text(),
        };
    }
}
