/**
 * @file Generation Transport
 *
 * Black-box request/response channel to the generation backend. The
 * client builds the request; the transport only moves bytes and
 * enforces the timeout.
 *
 * @module generation
 */

import { TransportError } from '../core/errors.js';

export interface TransportRequest {
    url: string;
    headers: Record<string, string>;
    body: string;
    timeoutMs: number;
}

export interface TransportResponse {
    status: number;
    body: string;
}

export interface Transport {
    request_send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * HTTP POST through the global `fetch`.
 */
export class FetchTransport implements Transport {
    async request_send(request: TransportRequest): Promise<TransportResponse> {
        let response: Response;
        try {
            response = await fetch(request.url, {
                method: 'POST',
                headers: request.headers,
                body: request.body,
                signal: AbortSignal.timeout(request.timeoutMs),
            });
        } catch (error: unknown) {
            if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
                throw new TransportError(`Generation backend timed out after ${request.timeoutMs} ms`, { cause: error });
            }
            const message: string = error instanceof Error ? error.message : String(error);
            throw new TransportError(`Generation backend unreachable: ${message}`, { cause: error });
        }
        return { status: response.status, body: await response.text() };
    }
}
