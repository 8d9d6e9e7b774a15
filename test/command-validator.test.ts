import {
    validateCommand,
    sanitizeCommand,
    validateAndSanitize,
    validateCustomCommand
} from '../src/command-validator';

describe('command-validator', () => {
    describe('validateCommand', () => {
        test('accepts receiver tokens', () => {
            for (const cmd of ['PWON', 'PWSTANDBY', 'MV45', 'MVUP', 'MUOFF', 'SIPHONO', 'Z2ON', 'Z267', 'Z2MUOFF']) {
                expect(validateCommand(cmd)).toEqual({ valid: true });
            }
        });

        test('rejects empty input', () => {
            expect(validateCommand('')).toEqual({ valid: false, error: 'Command cannot be empty' });
        });

        test('rejects overlong input', () => {
            expect(validateCommand('A'.repeat(51))).toEqual({
                valid: false,
                error: 'Command exceeds maximum length of 50 characters'
            });
        });

        test('names each forbidden character once', () => {
            expect(validateCommand('PW|ON&|')).toEqual({
                valid: false,
                error: 'Command contains forbidden characters: "|", "&"'
            });
        });

        test('rejects tokens outside the pattern', () => {
            expect(validateCommand('pwon')).toEqual({ valid: false, error: "Command 'pwon' does not match expected pattern" });
            expect(validateCommand('MV1234').valid).toBe(false);
            expect(validateCommand('P').valid).toBe(false);
        });
    });

    describe('sanitizeCommand', () => {
        test('trims, strips forbidden characters and uppercases', () => {
            expect(sanitizeCommand('  pw;on\t ')).toBe('PWON');
        });

        test('validateAndSanitize checks the sanitized form', () => {
            expect(validateAndSanitize('mv45')).toEqual({ valid: true, sanitized: 'MV45' });
        });
    });

    describe('validateCustomCommand', () => {
        test('uppercases each line and joins them with newlines', () => {
            expect(validateCustomCommand('mvup\n mvup \n\nmuoff')).toEqual({
                valid: true,
                sanitized: 'MVUP\nMVUP\nMUOFF'
            });
        });

        test('rejects empty and whitespace-only input', () => {
            const expected = { valid: false, sanitized: '', error: 'Command cannot be empty' };
            expect(validateCustomCommand('')).toEqual(expected);
            expect(validateCustomCommand('  \n ')).toEqual(expected);
        });

        test('rejects sequences over 500 characters', () => {
            expect(validateCustomCommand('A'.repeat(501)).error).toBe('Command sequence is too long');
        });

        test('rejects a line with shell metacharacters instead of stripping them', () => {
            expect(validateCustomCommand('PWON\nSICD; reboot')).toEqual({
                valid: false,
                sanitized: '',
                error: `'SICD; reboot': Command contains forbidden characters: ";"`
            });
        });

        test('rejects a line that does not match after uppercasing', () => {
            expect(validateCustomCommand('PWON\nhello world').error)
                .toBe(`'hello world': Command 'HELLO WORLD' does not match expected pattern`);
        });

        test('treats newlines as forbidden when multiline is off', () => {
            expect(validateCustomCommand('PWON\nMUOFF', false).error)
                .toBe(`'PWON\nMUOFF': Command contains forbidden characters: "\\n"`);
        });
    });
});
