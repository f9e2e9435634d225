import { createLogger } from '../utils/Logger.ts';

import type { Location } from '../model/Models.ts';
import type { Logger } from 'pino';

export interface FetchOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Anything that can return the current-conditions body for a location.
 */
export interface WeatherSource {
    readonly name: string;
    fetchCurrent(location: Location, options: FetchOptions): Promise<unknown>;
}

export class HttpStatusError extends Error {
    readonly status: number;

    constructor(status: number, statusText: string, body: string) {
        super(`Weather API responded ${status} ${statusText}${body ? `: ${body.slice(0, 200)}` : ''}`);
        this.name = 'HttpStatusError';
        this.status = status;
    }
}

export class RequestTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`Weather API request timed out after ${timeoutMs} ms`);
        this.name = 'RequestTimeoutError';
    }
}

export class InvalidResponseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidResponseError';
    }
}

/**
 * Open-Meteo forecast endpoint, `current=` variables only.
 */
export class OpenMeteoSource implements WeatherSource {
    readonly name = 'open-meteo';
    private baseUrl: string;
    private params: readonly string[];
    private logger: Logger;

    constructor(baseUrl: string, params: readonly string[]) {
        this.baseUrl = baseUrl;
        this.params = params;
        this.logger = createLogger('OpenMeteoSource');
    }

    buildUrl(location: Location): string {
        const url = new URL(this.baseUrl);
        url.searchParams.set('latitude', String(location.latitude));
        url.searchParams.set('longitude', String(location.longitude));
        url.searchParams.set('current', this.params.join(','));
        url.searchParams.set('timezone', 'UTC');
        return url.toString();
    }

    async fetchCurrent(location: Location, options: FetchOptions): Promise<unknown> {
        const url = this.buildUrl(location);
        this.logger.debug({ locationId: location.id, url }, 'Requesting current conditions');

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(new RequestTimeoutError(options.timeoutMs)), options.timeoutMs);
        const onAbort = () => controller.abort(options.signal?.reason);
        options.signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: {
                    'Accept': 'application/json'
                },
                redirect: 'follow',
                signal: controller.signal
            });

            const body = await response.text();
            if (!response.ok) {
                throw new HttpStatusError(response.status, response.statusText, body);
            }

            let parsed: unknown;
            try {
                parsed = JSON.parse(body);
            } catch {
                throw new InvalidResponseError(`Weather API returned a non-JSON body for ${location.id}`);
            }
            if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
                throw new InvalidResponseError(`Weather API returned a non-object body for ${location.id}`);
            }
            return parsed;
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onAbort);
        }
    }
}
