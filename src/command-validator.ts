/**
 * Command validation and sanitization for user-supplied AVR commands.
 * Preset table entries are trusted and do not pass through here.
 */

import * as CONST from './constants';

// 2-10 uppercase letters (or the Z2 zone prefix), optionally followed by up to 3 digits or a step/toggle suffix
export const VALID_COMMAND_PATTERN = /^(?:[A-Z]{2,10}|Z2[A-Z]{0,8})(?:\d{0,3}|UP|DOWN|ON|OFF)?$/;

export const FORBIDDEN_CHARS: ReadonlySet<string> = new Set('\x00\r\n;|&$`\\<>()[]{}'.split(''));

export interface ValidationResult {
    valid: boolean;
    error?: string;
}

export interface SanitizedResult extends ValidationResult {
    sanitized: string;
}

function forbiddenIn(command: string): string[] {
    return [...new Set(command.split('').filter(c => FORBIDDEN_CHARS.has(c)))];
}

function describeChars(chars: string[]): string {
    return chars.map(c => JSON.stringify(c)).join(', ');
}

/**
 * Validate a single AVR command token
 */
export function validateCommand(command: string): ValidationResult {
    if (!command) {
        return { valid: false, error: 'Command cannot be empty' };
    }

    if (command.length > CONST.MAX_COMMAND_LENGTH) {
        return { valid: false, error: `Command exceeds maximum length of ${CONST.MAX_COMMAND_LENGTH} characters` };
    }

    const forbidden = forbiddenIn(command);
    if (forbidden.length > 0) {
        return { valid: false, error: `Command contains forbidden characters: ${describeChars(forbidden)}` };
    }

    if (!VALID_COMMAND_PATTERN.test(command)) {
        return { valid: false, error: `Command '${command}' does not match expected pattern` };
    }

    return { valid: true };
}

/**
 * Trim, drop control and forbidden characters, uppercase
 */
export function sanitizeCommand(command: string): string {
    return command
        .trim()
        .split('')
        .filter(c => c.charCodeAt(0) >= 32 && !FORBIDDEN_CHARS.has(c))
        .join('')
        .toUpperCase();
}

export function validateAndSanitize(command: string): SanitizedResult {
    const sanitized = sanitizeCommand(command);
    return { ...validateCommand(sanitized), sanitized };
}

/**
 * Validate a custom command that may hold several tokens, one per line.
 *
 * Each line is trimmed and checked for forbidden characters and length
 * before it is uppercased and matched against the token pattern, so shell
 * metacharacters are rejected rather than silently stripped. `sanitized`
 * holds the uppercased tokens joined by the command separator.
 */
export function validateCustomCommand(command: string, allowMultiline = true): SanitizedResult {
    if (!command || !command.trim()) {
        return { valid: false, sanitized: '', error: 'Command cannot be empty' };
    }

    if (command.length > CONST.MAX_SEQUENCE_LENGTH) {
        return { valid: false, sanitized: '', error: 'Command sequence is too long' };
    }

    const lines = allowMultiline
        ? command.split(CONST.COMMAND_SEPARATOR).map(s => s.trim()).filter(s => s.length > 0)
        : [command.trim()];

    const tokens: string[] = [];
    for (const line of lines) {
        const precheck = validateCommand(line);
        if (!precheck.valid && (line.length > CONST.MAX_COMMAND_LENGTH || forbiddenIn(line).length > 0)) {
            return { valid: false, sanitized: '', error: `'${line}': ${precheck.error}` };
        }

        const token = line.toUpperCase();
        const result = validateCommand(token);
        if (!result.valid) {
            return { valid: false, sanitized: '', error: `'${line}': ${result.error}` };
        }
        tokens.push(token);
    }

    return { valid: true, sanitized: tokens.join(CONST.COMMAND_SEPARATOR) };
}
