import { Telnet } from 'telnet-client';
import * as CONST from './constants';
import { AvrConnectionError, AvrTimeoutError, errorMessage } from './errors';
import { AvrLogger, consoleLogger } from './logger';
import { SerialQueue } from './serial-queue';
import { withTimeout } from './utils';

/**
 * Delimiter-framed byte stream to the receiver. No protocol knowledge.
 */
export interface AvrTransport {
    readonly isOpen: boolean;
    open(): Promise<void>;
    close(): Promise<void>;
    write(data: Buffer): Promise<void>;
    readUntil(delimiter: Buffer | string, timeoutMs?: number): Promise<Buffer>;
}

export interface TelnetTransportOptions {
    host: string;
    port: number;
    connectTimeout?: number;
    writeTimeout?: number;
    readTimeout?: number;
    maxBufferLength?: number;
    logger?: AvrLogger;
}

interface PendingRead {
    delimiter: Buffer;
    resolve: (data: Buffer) => void;
    reject: (error: Error) => void;
}

/**
 * AvrTransport over a single telnet-client session.
 *
 * open/close/write/readUntil are serialized through one queue: the session
 * is a single ordered byte stream and interleaved operations would corrupt
 * framing. Bytes arriving while no read is pending stay buffered for the
 * next read.
 */
export class TelnetTransport implements AvrTransport {
    readonly host: string;
    readonly port: number;
    private connectTimeout: number;
    private writeTimeout: number;
    private readTimeout: number;
    private maxBufferLength: number;
    private logger: AvrLogger;

    private connection: Telnet | null = null;
    private buffer: Buffer = Buffer.alloc(0);
    private pendingRead: PendingRead | null = null;
    private queue = new SerialQueue();

    constructor(options: TelnetTransportOptions) {
        this.host = options.host;
        this.port = options.port;
        this.connectTimeout = options.connectTimeout ?? CONST.CONNECTION_TIMEOUT;
        this.writeTimeout = options.writeTimeout ?? CONST.WRITE_TIMEOUT;
        this.readTimeout = options.readTimeout ?? CONST.DEFAULT_READ_TIMEOUT;
        this.maxBufferLength = options.maxBufferLength ?? CONST.MAX_READ_BUFFER;
        this.logger = options.logger ?? consoleLogger;
    }

    get isOpen(): boolean {
        return this.connection !== null;
    }

    /**
     * Open the session. An already open session is closed first.
     *
     * @throws AvrConnectionError on refusal or when the connect timeout elapses
     */
    open(): Promise<void> {
        return this.queue.run(() => this.openSession());
    }

    /**
     * Release the session. No-op when already closed; close errors are not rethrown.
     * A read waiting on the queue head is failed right away rather than
     * left to run into its timeout.
     */
    close(): Promise<void> {
        if (this.connection) {
            this.pendingRead?.reject(this.connectionError('Connection closed'));
        }
        return this.queue.run(() => this.closeSession());
    }

    /**
     * Send all bytes. Resolves once the socket has accepted them.
     *
     * @throws AvrConnectionError when not open, on socket error or write timeout
     */
    write(data: Buffer): Promise<void> {
        return this.queue.run(async () => {
            const connection = this.connection;
            const socket = connection?.getSocket();
            if (!connection || !socket) {
                throw this.connectionError('Not connected');
            }

            try {
                await withTimeout(new Promise<void>((resolve, reject) => {
                    socket.write(data, (err?: Error | null) => (err ? reject(err) : resolve()));
                }), this.writeTimeout, 'write');
                this.logger.debug(`TX ${JSON.stringify(data.toString('ascii'))}`);
            } catch (e) {
                throw this.connectionError(`Write failed: ${errorMessage(e)}`);
            }
        });
    }

    /**
     * Read until `delimiter` appears; the result includes the delimiter.
     * If the buffer grows past its limit without a delimiter, everything
     * read so far is returned instead.
     *
     * @throws AvrTimeoutError when no delimiter arrives within the timeout
     * @throws AvrConnectionError when not open or the peer closes
     */
    readUntil(delimiter: Buffer | string, timeoutMs?: number): Promise<Buffer> {
        const delim = typeof delimiter === 'string' ? Buffer.from(delimiter, 'ascii') : delimiter;
        const timeout = timeoutMs ?? this.readTimeout;

        return this.queue.run(() => {
            if (!this.connection) {
                throw this.connectionError('Not connected');
            }

            const ready = this.extract(delim);
            if (ready) return ready;

            return new Promise<Buffer>((resolve, reject) => {
                const timer = setTimeout(() => {
                    this.pendingRead = null;
                    reject(new AvrTimeoutError('read', timeout));
                }, timeout);

                this.pendingRead = {
                    delimiter: delim,
                    resolve: (data) => {
                        clearTimeout(timer);
                        this.pendingRead = null;
                        resolve(data);
                    },
                    reject: (error) => {
                        clearTimeout(timer);
                        this.pendingRead = null;
                        reject(error);
                    }
                };
            });
        });
    }

    private async openSession(): Promise<void> {
        if (this.connection) {
            await this.closeSession();
        }

        const connection = new Telnet();
        const reader = (chunk: Buffer | string) => {
            if (connection !== this.connection) return;
            this.onData(typeof chunk === 'string' ? Buffer.from(chunk, 'ascii') : chunk);
        };
        this.attachHandlers(connection, reader);

        try {
            await withTimeout(connection.connect({
                host: this.host,
                port: this.port,
                timeout: this.connectTimeout,
                negotiationMandatory: false
            }), this.connectTimeout, 'connect');
        } catch (e) {
            await this.destroy(connection);
            if (e instanceof AvrTimeoutError) {
                throw this.connectionError(`Connection timed out after ${this.connectTimeout}ms`);
            }
            throw this.connectionError(errorMessage(e));
        }

        this.claimDataEvents(connection, reader);
        this.buffer = Buffer.alloc(0);
        this.connection = connection;
        this.logger.debug(`Session open to ${this.host}:${this.port}`);
    }

    private async closeSession(): Promise<void> {
        const connection = this.connection;
        if (!connection) return;

        this.connection = null;
        this.buffer = Buffer.alloc(0);
        this.pendingRead?.reject(this.connectionError('Connection closed'));
        await this.destroy(connection);
        this.logger.debug(`Session to ${this.host}:${this.port} closed`);
    }

    private async destroy(connection: Telnet): Promise<void> {
        try {
            await connection.destroy();
        } catch (e) {
            this.logger.debug(`Error closing connection: ${errorMessage(e)}`);
        }
    }

    private attachHandlers(connection: Telnet, reader: (chunk: Buffer | string) => void): void {
        this.claimDataEvents(connection, reader);
        connection.on('close', () => this.onSessionLost(connection, 'Connection closed by remote host'));
        connection.on('end', () => this.onSessionLost(connection, 'Connection ended by remote host'));
        connection.on('error', (err: unknown) => this.onSessionLost(connection, `Socket error: ${errorMessage(err)}`));
    }

    /**
     * telnet-client queues every 'data' chunk for its own nextData() reader,
     * which this transport never drains. Leave `reader` as the only listener.
     */
    private claimDataEvents(connection: Telnet, reader: (chunk: Buffer | string) => void): void {
        connection.removeAllListeners('data');
        connection.on('data', reader);
    }

    private onData(chunk: Buffer): void {
        this.buffer = Buffer.concat([this.buffer, chunk]);
        this.logger.debug(`RX ${chunk.length} bytes (buffered ${this.buffer.length})`);

        const pending = this.pendingRead;
        if (!pending) return;

        const data = this.extract(pending.delimiter);
        if (data) pending.resolve(data);
    }

    private onSessionLost(connection: Telnet, reason: string): void {
        if (connection !== this.connection) return;
        this.logger.warn(reason);
        this.connection = null;
        this.buffer = Buffer.alloc(0);
        this.pendingRead?.reject(this.connectionError(reason));
    }

    /**
     * Take one frame (up to and including the delimiter) off the buffer,
     * or the whole buffer on overrun; null when neither applies.
     */
    private extract(delimiter: Buffer): Buffer | null {
        const idx = this.buffer.indexOf(delimiter);
        if (idx >= 0) {
            const end = idx + delimiter.length;
            const frame = Buffer.from(this.buffer.subarray(0, end));
            this.buffer = Buffer.from(this.buffer.subarray(end));
            return frame;
        }

        if (this.buffer.length > this.maxBufferLength) {
            const partial = this.buffer;
            this.buffer = Buffer.alloc(0);
            this.logger.warn(`Read buffer exceeded ${this.maxBufferLength} bytes without delimiter`);
            return partial;
        }

        return null;
    }

    private connectionError(message: string): AvrConnectionError {
        return new AvrConnectionError(this.host, this.port, message);
    }
}

export default TelnetTransport;
