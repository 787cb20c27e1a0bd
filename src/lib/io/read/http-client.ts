/**
 * Issues a single HTTP exchange. Implementations own redirects, TLS,
 * connection reuse and any timeout policy.
 */
interface HttpClient {
    send(request: Request): Promise<Response>;
}

/**
 * HttpClient backed by the platform fetch.
 */
class FetchHttpClient implements HttpClient {
    send(request: Request): Promise<Response> {
        return fetch(request);
    }
}

export { FetchHttpClient };
export type { HttpClient };
