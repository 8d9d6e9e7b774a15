import * as CONST from './constants';
import * as utils from './utils';
import { AvrState, AvrStateUpdate, createInitialState, mergeState } from './device-state';
import { interpretResponse, simulateCommand } from './response-interpreter';
import { SubscriberRegistry, StateSubscriber } from './subscriber-registry';
import { AvrTransport, TelnetTransport } from './telnet-transport';
import { AvrTimeoutError, AvrValidationError, errorMessage } from './errors';
import { validateCustomCommand } from './command-validator';
import { AvrLogger, consoleLogger } from './logger';
import { SerialQueue } from './serial-queue';

export type ConnectionPhase = 'disconnected' | 'connecting' | 'connected';

export interface CommandResult {
    success: boolean;
    message: string;
}

/** Anything that maps a symbolic command name to a command string */
export interface CommandResolver {
    resolve(name: string): string | undefined;
}

export interface AvrControllerOptions {
    host: string;
    port: number;
    connectTimeoutMs?: number;
    readTimeoutMs?: number;
    responseTimeoutMs?: number;
    debugMode?: boolean;
    maxRetries?: number;
    initialRetryDelayMs?: number;
    maxRetryDelayMs?: number;
    pollIntervalMs?: number;
    pollWindowMs?: number;
    pollReadTimeoutMs?: number;
    queryGapMs?: number;
    commandWaitMs?: number;
    transport?: AvrTransport;
    logger?: AvrLogger;
}

const ok = (message: string): CommandResult => ({ success: true, message });
const fail = (message: string): CommandResult => ({ success: false, message });

/**
 * Controller for one AV receiver session.
 *
 * Owns the transport, the receiver state and the subscriber registry.
 * Transport I/O is serialized by the transport itself; state merges and
 * the notification that follows them are serialized by `stateLock`, so
 * observers never see a partially applied update and notifications never
 * overlap. A background poller re-queries the receiver while connected.
 */
export class AvrController {
    readonly host: string;
    readonly port: number;
    readonly debugMode: boolean;

    private transport: AvrTransport;
    private logger: AvrLogger;
    private registry: SubscriberRegistry;
    private stateLock = new SerialQueue();
    private state: Readonly<AvrState> = createInitialState();

    private maxRetries: number;
    private initialRetryDelay: number;
    private maxRetryDelay: number;
    private readTimeout: number;
    private responseTimeout: number;
    private pollInterval: number;
    private pollWindow: number;
    private pollReadTimeout: number;
    private queryGap: number;
    private commandWait: number;

    private _phase: ConnectionPhase = 'disconnected';
    private _retryCount = 0;
    private _lastError: string | undefined;
    private connecting: Promise<boolean> | null = null;

    private pollTask: Promise<void> | null = null;
    private pollAbort: AbortController | null = null;
    private connectAbort: AbortController | null = null;

    constructor(options: AvrControllerOptions) {
        this.host = options.host;
        this.port = options.port;
        this.debugMode = options.debugMode ?? false;
        this.logger = options.logger ?? consoleLogger;
        this.registry = new SubscriberRegistry(this.logger);

        this.maxRetries = options.maxRetries ?? CONST.MAX_RETRIES;
        this.initialRetryDelay = options.initialRetryDelayMs ?? CONST.BASE_RETRY_DELAY;
        this.maxRetryDelay = options.maxRetryDelayMs ?? CONST.MAX_RETRY_DELAY;
        this.readTimeout = options.readTimeoutMs ?? CONST.DEFAULT_READ_TIMEOUT;
        this.responseTimeout = options.responseTimeoutMs ?? CONST.RESPONSE_TIMEOUT;
        this.pollInterval = options.pollIntervalMs ?? CONST.POLL_INTERVAL;
        this.pollWindow = options.pollWindowMs ?? CONST.POLL_WINDOW;
        this.pollReadTimeout = options.pollReadTimeoutMs ?? CONST.POLL_READ_TIMEOUT;
        this.queryGap = options.queryGapMs ?? CONST.QUERY_GAP;
        this.commandWait = options.commandWaitMs ?? CONST.COMMAND_WAIT;

        this.transport = options.transport ?? new TelnetTransport({
            host: options.host,
            port: options.port,
            connectTimeout: options.connectTimeoutMs,
            readTimeout: this.readTimeout,
            logger: this.logger
        });
    }

    get connected(): boolean {
        return this._phase === 'connected';
    }

    get phase(): ConnectionPhase {
        return this._phase;
    }

    /** Attempts made by the last failed connect sequence; 0 after a success */
    get retryCount(): number {
        return this._retryCount;
    }

    get lastError(): string | undefined {
        return this._lastError;
    }

    get isPolling(): boolean {
        return this.pollTask !== null;
    }

    getState(): Readonly<AvrState> {
        return this.state;
    }

    subscribe(subscriber: StateSubscriber): void {
        this.registry.subscribe(subscriber);
    }

    unsubscribe(subscriber: StateSubscriber): boolean {
        return this.registry.unsubscribe(subscriber);
    }

    // ========================================================================
    // Connection lifecycle
    // ========================================================================

    /**
     * Connect to the receiver. With `retry`, failed attempts are repeated up
     * to `maxRetries` more times with exponential backoff. Calls made while
     * an attempt is running share its outcome, whatever their own `retry`
     * flag: a `connect(false)` issued during a retrying attempt waits for
     * that attempt's full backoff sequence.
     */
    connect(retry = true): Promise<boolean> {
        if (!this.connecting) {
            this.connecting = this.runConnect(retry).finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    private async runConnect(retry: boolean): Promise<boolean> {
        if (this.debugMode) {
            this._phase = 'connected';
            this._retryCount = 0;
            this._lastError = undefined;
            this.logger.info(`[DEBUG] Simulating connection to AVR at ${this.host}:${this.port}`);
            this.startPolling();
            return true;
        }

        const abort = new AbortController();
        this.connectAbort = abort;
        try {
            return await this.connectWithRetry(retry, abort.signal);
        } finally {
            if (this.connectAbort === abort) {
                this.connectAbort = null;
            }
        }
    }

    /**
     * The attempt loop. `signal` is aborted by disconnect(); it is checked
     * after every await, and a session opened after the abort is closed again.
     */
    private async connectWithRetry(retry: boolean, signal: AbortSignal): Promise<boolean> {
        // A poller left over from a dropped session must be gone before a new one starts
        await this.stopPolling();

        const maxAttempts = retry ? this.maxRetries + 1 : 1;
        let attempts = 0;

        while (attempts < maxAttempts) {
            if (signal.aborted) return this.abandonConnect();

            this._phase = 'connecting';
            try {
                await this.transport.open();
            } catch (e) {
                attempts++;
                this._phase = 'disconnected';
                this._lastError = errorMessage(e);
                this.logger.error(`Failed to connect to AVR (attempt ${attempts}/${maxAttempts}): ${this._lastError}`);

                if (attempts < maxAttempts) {
                    const wait = utils.retryDelay(attempts - 1, this.initialRetryDelay, this.maxRetryDelay);
                    this.logger.info(`Retrying in ${wait}ms...`);
                    await utils.delay(wait, signal);
                }
                continue;
            }

            if (signal.aborted) return this.abandonConnect();

            this._phase = 'connected';
            this._retryCount = 0;
            this._lastError = undefined;
            this.logger.info(`Connected to AVR at ${this.host}:${this.port}`);

            this.startPolling();
            await this.queryState(signal);
            return !signal.aborted;
        }

        this._retryCount = attempts;
        return false;
    }

    private async abandonConnect(): Promise<boolean> {
        this._phase = 'disconnected';
        this.logger.info('Connect cancelled by disconnect');
        try {
            await this.transport.close();
        } catch (e) {
            this.logger.debug(`Error closing cancelled connection: ${errorMessage(e)}`);
        }
        return false;
    }

    /**
     * Cancel a running connect and wait for it, then stop the poller and
     * close the session. A read the poller is blocked on is failed by the
     * close, so the poller ends without waiting out its read timeout.
     * Always ends disconnected; once this resolves nothing more is written.
     */
    async disconnect(): Promise<void> {
        this.connectAbort?.abort();
        const pending = this.connecting;
        if (pending) {
            await pending;
        }

        this.pollAbort?.abort();

        if (this.debugMode) {
            await this.stopPolling();
            this._phase = 'disconnected';
            this.logger.info('[DEBUG] Simulating disconnect from AVR');
            return;
        }

        try {
            await this.transport.close();
            this.logger.info('Disconnected from AVR');
        } catch (e) {
            this.logger.error(`Error disconnecting: ${errorMessage(e)}`);
        } finally {
            await this.stopPolling();
            this._phase = 'disconnected';
        }
    }

    /**
     * Discard the session after a send or read failure. The poller is told
     * to stop but not awaited, since this may run on the poller itself.
     */
    private async dropConnection(error: string): Promise<void> {
        this._phase = 'disconnected';
        this._lastError = error;
        this.pollAbort?.abort();
        try {
            await this.transport.close();
        } catch (e) {
            this.logger.debug(`Error closing dropped connection: ${errorMessage(e)}`);
        }
    }

    // ========================================================================
    // Commands
    // ========================================================================

    /**
     * Send one command token, connecting first if needed. A failed write
     * drops the session and, if allowed, reconnects and resends once.
     */
    async sendCommand(command: string, retryOnFailure = true): Promise<CommandResult> {
        if (!this.connected) {
            if (!await this.connect(retryOnFailure)) {
                return fail(`Not connected to AVR: ${this._lastError ?? CONST.MSG_UNKNOWN_ERROR}`);
            }
        }

        if (this.debugMode) {
            this.logger.info(`[DEBUG] Would send command: ${command}`);
            await this.applyUpdate(current => simulateCommand(command, current), command);
            return ok(CONST.MSG_SIMULATED_COMMAND);
        }

        try {
            await this.transport.write(Buffer.from(command + CONST.COMMAND_TERMINATOR, 'ascii'));
        } catch (e) {
            const message = errorMessage(e);
            this.logger.error(`Failed to send command '${command}': ${message}`);
            await this.dropConnection(message);

            if (retryOnFailure && this._retryCount < this.maxRetries) {
                this.logger.info('Attempting to reconnect and resend command...');
                if (await this.connect(true)) {
                    return this.sendCommand(command, false);
                }
            }
            return fail(message);
        }

        this.logger.info(`Sent command: ${command}`);

        // Best effort: pick up the receiver's echo to refresh state
        const response = await this.readResponse(this.responseTimeout);
        if (!response) {
            this.logger.debug(`No response received for '${command}'`);
        }

        return ok(CONST.MSG_COMMAND_SENT);
    }

    /**
     * Send a command that may hold several newline-separated tokens, one at
     * a time. After each token, wait `waitMs` and collect one response. The
     * first failing token ends the sequence and its failure is returned.
     */
    async sendAndWait(command: string, waitMs: number = this.commandWait): Promise<CommandResult> {
        const responses: string[] = [];

        for (const token of utils.splitCommandSequence(command)) {
            const result = await this.sendCommand(token);
            if (!result.success) {
                return result;
            }

            await utils.delay(waitMs);
            const response = await this.readResponse();
            if (response) {
                responses.push(response);
            }
        }

        return ok(responses.length > 0 ? responses.join(CONST.RESPONSE_JOINER) : CONST.MSG_COMMANDS_SENT);
    }

    /**
     * Validate and send user-supplied text. Rejected input never reaches the transport.
     */
    async sendCustomCommand(command: string): Promise<CommandResult> {
        const result = validateCustomCommand(command, true);
        if (!result.valid) {
            const error = new AvrValidationError(command, result.error ?? 'rejected');
            this.logger.warn(`Invalid custom command rejected: ${JSON.stringify(command)} - ${error.reason}`);
            return fail(error.message);
        }
        return this.sendAndWait(result.sanitized);
    }

    /**
     * Send a command from a name table (presets are trusted, not validated)
     */
    async sendNamedCommand(name: string, table: CommandResolver): Promise<CommandResult> {
        const command = table.resolve(name);
        if (command === undefined) {
            return fail('Unknown command');
        }
        return this.sendAndWait(command);
    }

    /**
     * Read one response token and fold it into the state.
     * A timeout means nothing arrived and yields undefined; any other
     * failure drops the session.
     */
    async readResponse(timeoutMs: number = this.readTimeout): Promise<string | undefined> {
        if (!this.connected) {
            return undefined;
        }

        if (this.debugMode) {
            return CONST.MSG_SIMULATED_RESPONSE;
        }

        let raw: Buffer;
        try {
            raw = await this.transport.readUntil(CONST.RESPONSE_DELIMITER, timeoutMs);
        } catch (e) {
            if (e instanceof AvrTimeoutError) {
                return undefined;
            }
            const message = errorMessage(e);
            this.logger.error(`Failed to read response: ${message}`);
            await this.dropConnection(message);
            return undefined;
        }

        const token = raw.toString('ascii').trim();
        if (!token) {
            return undefined;
        }

        this.logger.info(`Received response: ${token}`);
        await this.applyUpdate(interpretResponse(token), token);
        return token;
    }

    // ========================================================================
    // State
    // ========================================================================

    /**
     * Merge an update under the state lock and notify subscribers before
     * releasing it. The update may be computed from the current snapshot,
     * which is then read inside the lock.
     */
    private applyUpdate(update: AvrStateUpdate | ((current: Readonly<AvrState>) => AvrStateUpdate), source: string): Promise<boolean> {
        return this.stateLock.run(async () => {
            const changes = typeof update === 'function' ? update(this.state) : update;
            const { state, changed } = mergeState(this.state, changes);
            if (!changed) {
                return false;
            }

            this.state = state;
            this.logger.debug(`State updated from '${source}', notifying ${this.registry.size} subscribers`);
            await this.registry.notify(state);
            return true;
        });
    }

    // ========================================================================
    // Polling
    // ========================================================================

    private startPolling(): void {
        if (this.pollTask) {
            return;
        }

        const abort = new AbortController();
        this.pollAbort = abort;
        this.pollTask = this.pollLoop(abort.signal).finally(() => {
            if (this.pollAbort === abort) {
                this.pollAbort = null;
                this.pollTask = null;
            }
        });
    }

    private async stopPolling(): Promise<void> {
        const task = this.pollTask;
        if (!task) {
            return;
        }
        this.pollAbort?.abort();
        await task;
    }

    private async pollLoop(signal: AbortSignal): Promise<void> {
        this.logger.debug('State polling started');

        while (this.connected && !signal.aborted) {
            await utils.delay(this.pollInterval, signal);
            if (signal.aborted || !this.connected) {
                break;
            }
            this.logger.debug('Polling receiver state...');
            await this.queryState(signal);
        }

        this.logger.debug('State polling stopped');
    }

    /**
     * Write the state queries, then drain responses for up to the poll
     * window, stopping at the first read that times out. Nothing is written
     * once `signal` is aborted.
     */
    private async queryState(signal?: AbortSignal): Promise<void> {
        if (!this.connected || this.debugMode) {
            return;
        }

        try {
            for (const query of CONST.STATE_QUERIES) {
                if (signal?.aborted) return;
                await this.transport.write(Buffer.from(query + CONST.COMMAND_TERMINATOR, 'ascii'));
                this.logger.debug(`Sent query: ${query}`);
                await utils.delay(this.queryGap, signal);
            }

            const deadline = Date.now() + this.pollWindow;
            while (Date.now() < deadline && !signal?.aborted) {
                let raw: Buffer;
                try {
                    raw = await this.transport.readUntil(CONST.RESPONSE_DELIMITER, this.pollReadTimeout);
                } catch (e) {
                    if (e instanceof AvrTimeoutError) break;
                    throw e;
                }

                const token = raw.toString('ascii').trim();
                if (token) {
                    this.logger.debug(`Poll response: ${token}`);
                    await this.applyUpdate(interpretResponse(token), token);
                }
            }
        } catch (e) {
            // Session closed under us by disconnect()
            if (signal?.aborted) return;
            const message = errorMessage(e);
            this.logger.warn(`State query failed: ${message}`);
            await this.dropConnection(message);
        }
    }
}

export default AvrController;
