export class MastodonApiError extends Error {
    constructor(
        message: string,
        public statusCode: number,
        public host: string,
        public endpoint?: string,
        public retryAfterSeconds?: number
    ) {
        super(message);
        this.name = 'MastodonApiError';
    }

    /** Status 0 marks a request that never got a response. */
    get isNetworkError(): boolean {
        return this.statusCode === 0;
    }

    get isRateLimited(): boolean {
        return this.statusCode === 429;
    }
}
