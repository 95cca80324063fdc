import axios, { AxiosInstance, AxiosRequestConfig, isAxiosError } from 'axios';
import { ApiResponse } from './types';

export interface HttpClientOptions {
    timeoutMs?: number;
    retries?: number;
    retryDelayMs?: number;
    headers?: Record<string, string>;
    /** Replaces the transport, e.g. with an in-process one */
    adapter?: AxiosRequestConfig['adapter'];
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * 4xx answers other than 408/429 will not improve on a retry
 */
const isRetryable = (err: unknown): boolean => {
    if (!isAxiosError(err)) return false;
    const status = err.response?.status;
    if (status === undefined) return true;
    return status === 408 || status === 429 || status >= 500;
};

/**
 * HTTP client wrapper for the external collaborators (retrieval index, patient context)
 */
export class HttpClient {
    private client: AxiosInstance;
    private retries: number;
    private retryDelayMs: number;

    constructor(baseURL: string, options: HttpClientOptions = {}) {
        this.client = axios.create({
            baseURL,
            timeout: options.timeoutMs ?? 5000,
            headers: {
                'Content-Type': 'application/json',
                ...options.headers,
            },
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
        this.retries = options.retries ?? 2;
        this.retryDelayMs = options.retryDelayMs ?? 150;
    }

    async post<T = unknown>(url: string, data: unknown): Promise<T> {
        return this.request<T>({ method: 'POST', url, data });
    }

    async get<T = unknown>(url: string): Promise<T> {
        return this.request<T>({ method: 'GET', url });
    }

    /**
     * Unwraps the { success, data, error } envelope used by every service
     */
    async getEnvelope<T = unknown>(url: string): Promise<T | undefined> {
        const body = await this.get<ApiResponse<T>>(url);
        if (!body?.success) {
            throw new Error(body?.error || 'Unexpected service error');
        }
        return body.data;
    }

    private async request<T>(config: AxiosRequestConfig): Promise<T> {
        let attempt = 0;
        while (true) {
            try {
                const response = await this.client.request<T>(config);
                return response.data;
            } catch (err) {
                attempt += 1;
                if (attempt > this.retries || !isRetryable(err)) throw err;
                await sleep(this.retryDelayMs * attempt);
            }
        }
    }
}
