import { createLogger, logError } from '../utils/logger.js';

const log = createLogger('PubSub');

type Subscribers<TEvents> = {
    [K in keyof TEvents]?: Set<(payload: TEvents[K]) => void>;
};

/**
 * Simple typed Pub/Sub for in-process events.
 * `TEvents` maps each topic to its payload type.
 */
export class PubSub<TEvents extends object> {
    private subscribers: Subscribers<TEvents> = {};

    subscribe<K extends keyof TEvents>(topic: K, callback: (payload: TEvents[K]) => void): () => void {
        const subs = this.subscribers[topic] ?? new Set<(payload: TEvents[K]) => void>();
        subs.add(callback);
        this.subscribers[topic] = subs;

        return () => {
            const current = this.subscribers[topic];
            if (current) {
                current.delete(callback);
                if (current.size === 0) {
                    delete this.subscribers[topic];
                }
            }
        };
    }

    publish<K extends keyof TEvents>(topic: K, payload: TEvents[K]): void {
        const subs = this.subscribers[topic];
        if (!subs) return;
        for (const callback of subs) {
            try {
                callback(payload);
            } catch (error) {
                // subscriber failures never abort a publish
                logError(log, `Subscriber for ${String(topic)} failed`, error);
            }
        }
    }

    subscriberCount<K extends keyof TEvents>(topic: K): number {
        return this.subscribers[topic]?.size ?? 0;
    }
}
