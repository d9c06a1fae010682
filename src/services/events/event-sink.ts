import type { Logger } from '../../utils/logger';
import type { DomainEvent, EventSink, HttpEventSinkConfig } from './types';

/** Writes each event as a structured log line. */
export class LogEventSink implements EventSink {
    constructor(private logger: Logger) {}

    emit(event: DomainEvent): void {
        this.logger.info('domain_event', { ...event });
    }
}

/**
 * POSTs each event as JSON. Delivery failures are logged and never reach
 * the caller.
 */
export class HttpEventSink implements EventSink {
    constructor(
        private config: HttpEventSinkConfig,
        private logger: Logger,
        private fetchImpl: typeof fetch = fetch
    ) {}

    emit(event: DomainEvent): void {
        void this.deliver(event);
    }

    async deliver(event: DomainEvent): Promise<boolean> {
        try {
            const response = await this.fetchImpl(this.config.url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'X-Event-Type': event.type,
                },
                body: JSON.stringify({
                    event: event.type,
                    payload: event,
                    timestamp: new Date(event.occurredAt).toISOString(),
                }),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });

            if (!response.ok) {
                this.logger.warn('Event delivery rejected', {
                    eventType: event.type,
                    status: response.status,
                });
                return false;
            }
            return true;
        } catch (error) {
            this.logger.error('Event delivery failed', error, { eventType: event.type });
            return false;
        }
    }
}

/** Forwards every event to each sink; one failing sink does not stop the others. */
export class FanoutEventSink implements EventSink {
    constructor(
        private sinks: EventSink[],
        private logger: Logger
    ) {}

    emit(event: DomainEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.emit(event);
            } catch (error) {
                this.logger.error('Event sink threw', error, { eventType: event.type });
            }
        }
    }
}

export function createEventSink(config: { eventSinkUrl?: string; eventSinkTimeoutMs: number }, logger: Logger): EventSink {
    const sinks: EventSink[] = [new LogEventSink(logger)];
    if (config.eventSinkUrl) {
        sinks.push(new HttpEventSink({ url: config.eventSinkUrl, timeoutMs: config.eventSinkTimeoutMs }, logger));
    }
    return new FanoutEventSink(sinks, logger);
}
