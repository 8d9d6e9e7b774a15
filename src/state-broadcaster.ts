import { AvrState, AvrStateJSON, stateToJSON } from './device-state';
import { StateObserver } from './subscriber-registry';
import { AvrLogger, consoleLogger } from './logger';
import { errorMessage } from './errors';

export interface StateUpdateMessage {
    type: 'state_update';
    state: AvrStateJSON;
    connected: boolean;
}

export interface BroadcastClient {
    send(message: StateUpdateMessage): void | Promise<void>;
}

/**
 * Fans state snapshots out to many clients (e.g. the flow nodes attached to
 * one receiver). A client whose delivery fails is dropped once the pass over
 * all clients has finished.
 */
export class StateBroadcaster implements StateObserver {
    private clients = new Set<BroadcastClient>();
    private isConnected: () => boolean;
    private logger: AvrLogger;

    constructor(isConnected: () => boolean, logger: AvrLogger = consoleLogger) {
        this.isConnected = isConnected;
        this.logger = logger;
    }

    addClient(client: BroadcastClient): void {
        this.clients.add(client);
    }

    removeClient(client: BroadcastClient): void {
        this.clients.delete(client);
    }

    get clientCount(): number {
        return this.clients.size;
    }

    buildMessage(state: Readonly<AvrState>): StateUpdateMessage {
        return {
            type: 'state_update',
            state: stateToJSON(state),
            connected: this.isConnected()
        };
    }

    async onStateChanged(state: Readonly<AvrState>): Promise<void> {
        if (this.clients.size === 0) return;

        const message = this.buildMessage(state);
        const disconnected: BroadcastClient[] = [];

        for (const client of this.clients) {
            try {
                await client.send(message);
            } catch (e) {
                this.logger.warn(`Dropping broadcast client: ${errorMessage(e)}`);
                disconnected.push(client);
            }
        }

        for (const client of disconnected) {
            this.clients.delete(client);
        }
    }
}

export default StateBroadcaster;
