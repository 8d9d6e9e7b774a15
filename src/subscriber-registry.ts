import { AvrState } from './device-state';
import { AvrLogger, consoleLogger } from './logger';
import { errorMessage } from './errors';

export type StateListener = (state: Readonly<AvrState>) => void | Promise<void>;

export interface StateObserver {
    onStateChanged(state: Readonly<AvrState>): void | Promise<void>;
}

export type StateSubscriber = StateListener | StateObserver;

/**
 * Registry of state-change subscribers.
 *
 * Holds plain references; removal only happens through `unsubscribe`.
 */
export class SubscriberRegistry {
    private subscribers = new Set<StateSubscriber>();
    private logger: AvrLogger;

    constructor(logger: AvrLogger = consoleLogger) {
        this.logger = logger;
    }

    subscribe(subscriber: StateSubscriber): void {
        this.subscribers.add(subscriber);
    }

    unsubscribe(subscriber: StateSubscriber): boolean {
        return this.subscribers.delete(subscriber);
    }

    get size(): number {
        return this.subscribers.size;
    }

    /**
     * Deliver a snapshot to every subscriber registered when the pass starts.
     * A throwing (or rejecting) subscriber is logged and skipped for this
     * pass only; delivery to the rest continues and it stays registered.
     *
     * @returns The subscribers whose delivery failed in this pass
     */
    async notify(state: Readonly<AvrState>): Promise<StateSubscriber[]> {
        const failed: StateSubscriber[] = [];
        for (const subscriber of [...this.subscribers]) {
            try {
                if (typeof subscriber === 'function') {
                    await subscriber(state);
                } else {
                    await subscriber.onStateChanged(state);
                }
            } catch (e) {
                this.logger.error(`Error in state update callback: ${errorMessage(e)}`);
                failed.push(subscriber);
            }
        }
        return failed;
    }
}

export default SubscriberRegistry;
