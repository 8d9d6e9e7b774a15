/**
 * Receiver configuration.
 *
 * Node-RED stores node settings as strings; these are parsed here with
 * the constants as defaults. Environment variables fill in values the
 * node leaves blank, which is handy for headless deployments.
 */

import * as CONST from './constants';
import { AvrControllerOptions } from './avr-controller';
import { parseIntOr } from './utils';
import { AvrConfigError } from './errors';

export interface RawReceiverConfig {
    host?: string;
    port?: string | number;
    timeout?: string | number;
    debugMode?: boolean | string;
    pollInterval?: string | number;
    maxRetries?: string | number;
}

export type ReceiverSettings = Required<Pick<AvrControllerOptions,
    'host' | 'port' | 'connectTimeoutMs' | 'debugMode' | 'pollIntervalMs' | 'maxRetries'>>;

function parseBool(value: boolean | string | undefined, fallback: boolean): boolean {
    if (typeof value === 'boolean') return value;
    if (value === undefined || value === '') return fallback;
    return value === '1' || value.toLowerCase() === 'true';
}

function pick(value: string | number | undefined, envValue: string | undefined): string | number | undefined {
    if (value === undefined || value === '') return envValue;
    return value;
}

/**
 * Resolve raw settings (plus AVR_HOST, AVR_PORT, AVR_TIMEOUT, AVR_DEBUG)
 * into controller settings. Timeouts are given in seconds.
 *
 * @throws AvrConfigError when no host is configured anywhere
 */
export function resolveReceiverConfig(raw: RawReceiverConfig, env: NodeJS.ProcessEnv = process.env): ReceiverSettings {
    const host = (raw.host || env.AVR_HOST || '').trim();
    if (!host) {
        throw new AvrConfigError('AVR host is required');
    }

    const port = parseIntOr(pick(raw.port, env.AVR_PORT), CONST.DEFAULT_TELNET_PORT);
    const timeoutSec = parseIntOr(pick(raw.timeout, env.AVR_TIMEOUT), CONST.CONNECTION_TIMEOUT / 1000);
    const pollSec = parseIntOr(raw.pollInterval, CONST.POLL_INTERVAL / 1000);

    return {
        host,
        port: port > 0 && port <= 65535 ? port : CONST.DEFAULT_TELNET_PORT,
        connectTimeoutMs: Math.max(1, timeoutSec) * 1000,
        debugMode: parseBool(raw.debugMode, parseBool(env.AVR_DEBUG, false)),
        pollIntervalMs: Math.max(1, pollSec) * 1000,
        maxRetries: parseIntOr(raw.maxRetries, CONST.MAX_RETRIES)
    };
}
