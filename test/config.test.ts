import { resolveReceiverConfig } from '../src/config';
import { AvrConfigError } from '../src/errors';

describe('resolveReceiverConfig', () => {
    test('parses the node settings', () => {
        expect(resolveReceiverConfig({
            host: ' avr.local ',
            port: '23',
            timeout: '3',
            debugMode: false,
            pollInterval: '5'
        }, {})).toEqual({
            host: 'avr.local',
            port: 23,
            connectTimeoutMs: 3000,
            debugMode: false,
            pollIntervalMs: 5000,
            maxRetries: 3
        });
    });

    test('applies defaults', () => {
        expect(resolveReceiverConfig({ host: 'avr.local' }, {})).toEqual({
            host: 'avr.local',
            port: 60128,
            connectTimeoutMs: 5000,
            debugMode: false,
            pollIntervalMs: 2000,
            maxRetries: 3
        });
    });

    test('falls back to the environment for blank settings', () => {
        const env = { AVR_HOST: '10.0.0.5', AVR_PORT: '2323', AVR_TIMEOUT: '10', AVR_DEBUG: 'true' };
        expect(resolveReceiverConfig({ host: '', port: '', timeout: '' }, env)).toMatchObject({
            host: '10.0.0.5',
            port: 2323,
            connectTimeoutMs: 10000,
            debugMode: true
        });
    });

    test('node settings win over the environment', () => {
        const env = { AVR_HOST: '10.0.0.5', AVR_PORT: '2323', AVR_DEBUG: '1' };
        expect(resolveReceiverConfig({ host: 'avr.local', port: '23', debugMode: false }, env)).toMatchObject({
            host: 'avr.local',
            port: 23,
            debugMode: false
        });
    });

    test('out of range or unparsable ports use the default', () => {
        expect(resolveReceiverConfig({ host: 'avr.local', port: '70000' }, {}).port).toBe(60128);
        expect(resolveReceiverConfig({ host: 'avr.local', port: '0' }, {}).port).toBe(60128);
        expect(resolveReceiverConfig({ host: 'avr.local', port: 'telnet' }, {}).port).toBe(60128);
    });

    test('timeouts are at least one second', () => {
        expect(resolveReceiverConfig({ host: 'avr.local', timeout: '0', pollInterval: 0 }, {})).toMatchObject({
            connectTimeoutMs: 1000,
            pollIntervalMs: 1000
        });
    });

    test('accepts string flags', () => {
        expect(resolveReceiverConfig({ host: 'avr.local', debugMode: 'true' }, {}).debugMode).toBe(true);
        expect(resolveReceiverConfig({ host: 'avr.local', debugMode: 'no' }, {}).debugMode).toBe(false);
    });

    test('requires a host', () => {
        expect(() => resolveReceiverConfig({ host: '  ' }, {})).toThrow(AvrConfigError);
        expect(() => resolveReceiverConfig({}, {})).toThrow('AVR host is required');
    });
});
