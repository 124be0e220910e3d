import type { Logger } from 'pino';

export type Datacenter = 'CN' | 'EU' | 'AU';

export type HttpMethod = 'GET' | 'POST';

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpRequest {
    method: HttpMethod;
    url: string;
    headers: Record<string, string>;
    params?: QueryParams;
    body?: unknown;
}

export interface HttpResponse {
    status: number;
    statusText: string;
    body: string;
}

/**
 * Carries one HTTP exchange. Implementations never throw on a non-2xx
 * status; they only reject when no response was received.
 */
export interface HttpTransport {
    request(request: HttpRequest): Promise<HttpResponse>;
}

export interface EcosClientOptions {
    /** Region of the ECOS API. Ignored when `url` is given. */
    datacenter?: Datacenter | string;
    url?: string;
    email?: string;
    password?: string;
    accessToken?: string;
    refreshToken?: string;
    /** Defaults to an {@link AxiosTransport}. */
    transport?: HttpTransport;
    logger?: Logger;
    /** Request timeout in milliseconds for the default transport. */
    timeout?: number;
}
