/**
 * AVR Constants
 * Centralized definitions for protocol values and timing defaults
 */

// Wire Format
export const COMMAND_TERMINATOR = '\r';        // Appended to every outgoing token
export const RESPONSE_DELIMITER = '\r';        // Responses are split on this
export const COMMAND_SEPARATOR = '\n';         // Joins tokens of a multi-step command
export const RESPONSE_JOINER = '; ';           // Joins collected responses of a sequence
export const MAX_READ_BUFFER = 8192;           // Bytes buffered before a partial read is returned

// Default Ports
export const DEFAULT_TELNET_PORT = 60128;      // Receiver control port

// Default Timeouts (ms)
export const CONNECTION_TIMEOUT = 5000;        // TCP connection timeout
export const WRITE_TIMEOUT = 5000;             // Socket write acceptance
export const DEFAULT_READ_TIMEOUT = 2000;      // Explicit response read
export const RESPONSE_TIMEOUT = 1000;          // Opportunistic read after a send
export const COMMAND_WAIT = 500;               // Pause between tokens of a sequence

// Retry Configuration
export const MAX_RETRIES = 3;                  // Additional attempts after the first
export const BASE_RETRY_DELAY = 500;           // Initial retry delay (ms)
export const MAX_RETRY_DELAY = 5000;           // Maximum retry backoff (ms)

// Polling
export const POLL_INTERVAL = 2000;             // Time between query bursts
export const POLL_WINDOW = 1000;               // Drain window after a burst
export const POLL_READ_TIMEOUT = 200;          // Per-read timeout while draining
export const QUERY_GAP = 50;                   // Pause between queries of a burst
export const STATE_QUERIES = ['MV?', 'MU?', 'PW?', 'SI?'] as const;

// Volume Range (Denon scale 00-98)
export const MIN_VOLUME = 0;
export const MAX_VOLUME = 98;
export const SIMULATED_DEFAULT_VOLUME = 50;    // Starting point for MVUP/MVDOWN when volume is unknown

// Command Validation
export const MAX_COMMAND_LENGTH = 50;
export const MAX_SEQUENCE_LENGTH = MAX_COMMAND_LENGTH * 10;

// Messages
export const MSG_COMMAND_SENT = 'Command sent';
export const MSG_COMMANDS_SENT = 'Commands sent';
export const MSG_SIMULATED_COMMAND = 'Debug mode - command simulated';
export const MSG_SIMULATED_RESPONSE = 'DEBUG: Simulated response';
export const MSG_UNKNOWN_ERROR = 'Unknown error';
