import { NodeMessageInFlow } from 'node-red';
import { AvrController, CommandResolver } from '../src/avr-controller';
import { handleMessage } from '../src/message-router';
import { AvrLogger } from '../src/logger';

describe('handleMessage', () => {
    const table: CommandResolver = { resolve: (name) => (name === 'power_on' ? 'PWON' : undefined) };
    let controller: AvrController;

    const message = (fields: Omit<NodeMessageInFlow, '_msgid'>): NodeMessageInFlow => ({ _msgid: 'msg-1', ...fields });

    beforeEach(() => {
        const logger: AvrLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
        controller = new AvrController({
            host: 'avr.test',
            port: 23,
            debugMode: true,
            commandWaitMs: 0,
            pollIntervalMs: 60000,
            logger
        });
    });

    afterEach(async () => {
        await controller.disconnect();
    });

    test('connect and disconnect topics', async () => {
        await expect(handleMessage(controller, table, message({ topic: 'connect' }))).resolves.toMatchObject({
            success: true,
            response: 'Connected',
            connected: true
        });
        await expect(handleMessage(controller, table, message({ topic: 'disconnect' }))).resolves.toMatchObject({
            success: true,
            response: 'Disconnected',
            connected: false
        });
    });

    test('preset topic sends a table entry', async () => {
        const result = await handleMessage(controller, table, message({ topic: 'preset', payload: 'power_on' }));

        expect(result.success).toBe(true);
        expect(result.response).toBe('DEBUG: Simulated response');
        expect(result.state.power).toBe(true);
    });

    test('preset object payload sends a table entry', async () => {
        const result = await handleMessage(controller, table, message({ payload: { preset: 'power_on' } }));
        expect(result.state.power).toBe(true);
    });

    test('unknown presets are reported', async () => {
        await expect(handleMessage(controller, table, message({ payload: { preset: 'power_cycle' } }))).resolves.toMatchObject({
            success: false,
            response: 'Unknown command'
        });
    });

    test('string payloads are custom commands', async () => {
        const result = await handleMessage(controller, table, message({ payload: 'mv30' }));

        expect(result.success).toBe(true);
        expect(result.state.volume).toBe(30);
    });

    test('other payloads are not commands', async () => {
        await expect(handleMessage(controller, table, message({ payload: 42 }))).resolves.toMatchObject({
            success: false,
            response: 'No command provided',
            connected: false
        });
    });
});
