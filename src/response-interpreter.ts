/**
 * Maps receiver protocol tokens to state updates.
 *
 * Pure functions only: no I/O, no shared state.
 */

import * as CONST from './constants';
import { AvrState, AvrStateUpdate } from './device-state';
import { clampVolume } from './utils';

const DIGITS = /^[0-9]+$/;

/**
 * Two-character numeric argument at positions 2-3 of a token ("MV45" -> 45).
 * Tokens shorter than 3 characters carry no argument; a 3-character token
 * yields its single trailing digit.
 */
function levelArgument(token: string): number | undefined {
    if (token.length < 3) return undefined;
    const arg = token.slice(2, 4);
    return DIGITS.test(arg) ? parseInt(arg, 10) : undefined;
}

/**
 * Derive a partial state update from one decoded, trimmed response token.
 *
 * Rules are checked in a fixed order and are independent of each other;
 * a later match overwrites an earlier one. Zone 2 mute tokens are checked
 * before the generic zone 2 level rule.
 */
export function interpretResponse(token: string): AvrStateUpdate {
    const update: AvrStateUpdate = {};

    if (token === 'PWON') update.power = true;
    else if (token === 'PWSTANDBY') update.power = false;

    if (token.startsWith('MV')) {
        const level = levelArgument(token);
        if (level !== undefined) update.volume = level;
    }

    if (token === 'MUON') update.muted = true;
    else if (token === 'MUOFF') update.muted = false;

    if (token.startsWith('SI')) update.inputSource = token.slice(2);

    if (token.startsWith('MS')) update.surroundMode = token.slice(2);

    if (token === 'Z2ON') update.zone2Power = true;
    else if (token === 'Z2OFF') update.zone2Power = false;

    if (token === 'Z2MUON') update.zone2Muted = true;
    else if (token === 'Z2MUOFF') update.zone2Muted = false;
    else if (token.startsWith('Z2')) {
        const level = levelArgument(token);
        if (level !== undefined) update.zone2Volume = level;
    }

    return update;
}

/**
 * The state change a command would cause on a real receiver, for
 * simulation mode. Step commands start from the middle of the scale
 * when the current level is unknown.
 */
export function simulateCommand(command: string, current: Readonly<AvrState>): AvrStateUpdate {
    switch (command) {
        case 'PWON':
            return { power: true };
        case 'PWSTANDBY':
            return { power: false };
        case 'MVUP':
            return { volume: clampVolume((current.volume ?? CONST.SIMULATED_DEFAULT_VOLUME) + 1) };
        case 'MVDOWN':
            return { volume: clampVolume((current.volume ?? CONST.SIMULATED_DEFAULT_VOLUME) - 1) };
        case 'MUON':
            return { muted: true };
        case 'MUOFF':
            return { muted: false };
        case 'Z2ON':
            return { zone2Power: true };
        case 'Z2OFF':
            return { zone2Power: false };
        case 'Z2MUON':
            return { zone2Muted: true };
        case 'Z2MUOFF':
            return { zone2Muted: false };
        case 'Z2UP':
            return { zone2Volume: clampVolume((current.zone2Volume ?? CONST.SIMULATED_DEFAULT_VOLUME) + 1) };
        case 'Z2DOWN':
            return { zone2Volume: clampVolume((current.zone2Volume ?? CONST.SIMULATED_DEFAULT_VOLUME) - 1) };
    }

    if (command.startsWith('MV')) {
        const level = levelArgument(command);
        return level === undefined ? {} : { volume: level };
    }
    if (command.startsWith('SI')) return { inputSource: command.slice(2) };
    if (command.startsWith('MS')) return { surroundMode: command.slice(2) };
    if (command.startsWith('Z2')) {
        const level = levelArgument(command);
        return level === undefined ? {} : { zone2Volume: level };
    }

    return {};
}
