import { StateBroadcaster, BroadcastClient } from '../src/state-broadcaster';
import { createInitialState, mergeState, stateToJSON } from '../src/device-state';
import { AvrLogger } from '../src/logger';

function silentLogger(): jest.Mocked<AvrLogger> {
    return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('StateBroadcaster', () => {
    const state = mergeState(createInitialState(new Date(0)), { volume: 45 }, new Date(1000)).state;

    test('does nothing without clients', async () => {
        const isConnected = jest.fn(() => true);
        const broadcaster = new StateBroadcaster(isConnected, silentLogger());

        await broadcaster.onStateChanged(state);
        expect(isConnected).not.toHaveBeenCalled();
    });

    test('sends a state_update message to every client', async () => {
        const broadcaster = new StateBroadcaster(() => true, silentLogger());
        const a: BroadcastClient = { send: jest.fn() };
        const b: BroadcastClient = { send: jest.fn() };
        broadcaster.addClient(a);
        broadcaster.addClient(b);

        await broadcaster.onStateChanged(state);

        const expected = { type: 'state_update', state: stateToJSON(state), connected: true };
        expect(a.send).toHaveBeenCalledWith(expected);
        expect(b.send).toHaveBeenCalledWith(expected);
    });

    test('drops a failing client after the pass', async () => {
        const logger = silentLogger();
        const broadcaster = new StateBroadcaster(() => false, logger);
        const failing: BroadcastClient = { send: jest.fn(() => { throw new Error('gone'); }) };
        const healthy: BroadcastClient = { send: jest.fn() };
        broadcaster.addClient(failing);
        broadcaster.addClient(healthy);

        await broadcaster.onStateChanged(state);

        expect(healthy.send).toHaveBeenCalledTimes(1);
        expect(broadcaster.clientCount).toBe(1);
        expect(logger.warn).toHaveBeenCalledWith('Dropping broadcast client: gone');

        await broadcaster.onStateChanged(state);
        expect(failing.send).toHaveBeenCalledTimes(1);
        expect(healthy.send).toHaveBeenCalledTimes(2);
    });

    test('removeClient stops delivery', async () => {
        const broadcaster = new StateBroadcaster(() => true, silentLogger());
        const client: BroadcastClient = { send: jest.fn() };
        broadcaster.addClient(client);
        broadcaster.removeClient(client);

        await broadcaster.onStateChanged(state);
        expect(client.send).not.toHaveBeenCalled();
        expect(broadcaster.clientCount).toBe(0);
    });
});
