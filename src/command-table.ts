import fs from 'fs-extra';
import path from 'path';
import { AvrLogger, consoleLogger } from './logger';
import { AvrValidationError, errorMessage } from './errors';
import { validateCustomCommand } from './command-validator';

export const USER_COMMANDS_FILE = 'avr-commands.json';
export const BUNDLED_COMMANDS_PATH = path.join(__dirname, '..', 'commands', 'index.json');

export interface CommandTableData {
    commands: Record<string, string>;
    groups: Record<string, string[]>;
    labels: Record<string, string>;
}

function isStringRecord(value: unknown): value is Record<string, string> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    return Object.values(value).every(v => typeof v === 'string');
}

function isGroupRecord(value: unknown): value is Record<string, string[]> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    return Object.values(value).every(v => Array.isArray(v) && v.every(item => typeof item === 'string'));
}

export function isCommandTableData(value: unknown): value is CommandTableData {
    if (typeof value !== 'object' || value === null) return false;
    if (!('commands' in value) || !('groups' in value) || !('labels' in value)) return false;
    return isStringRecord(value.commands) && isGroupRecord(value.groups) && isStringRecord(value.labels);
}

/**
 * Symbolic command names mapped to literal command strings.
 *
 * The bundled table ships with the package. Users can add or override
 * entries in `avr-commands.json` inside their Node-RED user directory
 * (e.g. ~/.node-red/avr-commands.json), a flat `{ name: command }` object.
 * User entries pass through the custom command validator and are stored
 * sanitized; only the bundled entries are trusted as they are.
 */
export class CommandTable {
    private filePath: string | null;
    private bundled: CommandTableData;
    private overrides: Record<string, string>;
    private logger: AvrLogger;

    constructor(userDir?: string, logger: AvrLogger = consoleLogger, bundledPath: string = BUNDLED_COMMANDS_PATH) {
        this.filePath = userDir ? path.join(userDir, USER_COMMANDS_FILE) : null;
        this.logger = logger;
        this.bundled = this.loadBundled(bundledPath);
        this.overrides = {};
        this.load();
    }

    private loadBundled(bundledPath: string): CommandTableData {
        const data: unknown = fs.readJsonSync(bundledPath);
        if (!isCommandTableData(data)) {
            throw new Error(`Malformed command table: ${bundledPath}`);
        }
        return data;
    }

    load(): void {
        if (!this.filePath) return;
        try {
            if (fs.existsSync(this.filePath)) {
                const data: unknown = fs.readJsonSync(this.filePath);
                if (!isStringRecord(data)) {
                    throw new Error('expected an object of command strings');
                }
                this.overrides = this.validOverrides(data);
            }
        } catch (e) {
            this.logger.error(`Failed to load user commands: ${errorMessage(e)}`);
            this.overrides = {};
        }
    }

    private validOverrides(data: Record<string, string>): Record<string, string> {
        const valid: Record<string, string> = {};
        for (const [name, command] of Object.entries(data)) {
            const result = validateCustomCommand(command, true);
            if (result.valid) {
                valid[name] = result.sanitized;
            } else {
                this.logger.warn(`Ignoring user command '${name}': ${result.error}`);
            }
        }
        return valid;
    }

    save(): void {
        if (!this.filePath) return;
        try {
            fs.writeJsonSync(this.filePath, this.overrides, { spaces: 2 });
        } catch (e) {
            this.logger.error(`Failed to save user commands: ${errorMessage(e)}`);
        }
    }

    /**
     * Command string for a symbolic name, or undefined when unknown
     */
    resolve(name: string): string | undefined {
        if (Object.prototype.hasOwnProperty.call(this.overrides, name)) return this.overrides[name];
        if (Object.prototype.hasOwnProperty.call(this.bundled.commands, name)) return this.bundled.commands[name];
        return undefined;
    }

    list(): Record<string, string> {
        return { ...this.bundled.commands, ...this.overrides };
    }

    groups(): Record<string, string[]> {
        const groups: Record<string, string[]> = { ...this.bundled.groups };
        const custom = Object.keys(this.overrides).filter(name => !(name in this.bundled.commands));
        if (custom.length > 0) groups.custom = custom;
        return groups;
    }

    label(name: string): string {
        return this.bundled.labels[name] ?? name;
    }

    /**
     * Validate, add or replace a user command and persist the overrides.
     * Returns the sanitized command as stored.
     *
     * @throws AvrValidationError when the command fails validation
     */
    set(name: string, command: string): string {
        if (!name) throw new Error('Command name is required');
        if (!command) throw new Error('Command string is required');

        const result = validateCustomCommand(command, true);
        if (!result.valid) {
            throw new AvrValidationError(command, result.error ?? 'rejected');
        }
        this.overrides[name] = result.sanitized;
        this.save();
        return result.sanitized;
    }

    delete(name: string): boolean {
        if (!Object.prototype.hasOwnProperty.call(this.overrides, name)) return false;
        delete this.overrides[name];
        this.save();
        return true;
    }
}

export default CommandTable;
