import { createLogger } from '../utils/Logger.ts';

import type { Logger } from 'pino';

/**
 * Posts failure messages to an optional webhook (`{ "text": ... }`).
 * Delivery problems are logged; they never fail the run a second time.
 */
export class AlertNotifier {
    private webhookUrl: string;
    private timeoutMs: number;
    private logger: Logger;

    constructor(webhookUrl: string, timeoutMs: number = 5_000) {
        this.webhookUrl = webhookUrl;
        this.timeoutMs = timeoutMs;
        this.logger = createLogger('AlertNotifier');
    }

    get enabled(): boolean {
        return this.webhookUrl.trim().length > 0;
    }

    async notify(message: string): Promise<boolean> {
        if (!this.enabled) return false;

        try {
            const response = await fetch(this.webhookUrl, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ text: message }),
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            if (!response.ok) {
                this.logger.error(`Failed to send alert webhook: ${response.status} ${response.statusText}`);
                return false;
            }
            this.logger.info('Alert sent');
            return true;
        } catch (err) {
            this.logger.error({ err }, 'Failed to send alert webhook');
            return false;
        }
    }
}
