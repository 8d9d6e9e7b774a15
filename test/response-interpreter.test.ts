import { interpretResponse, simulateCommand } from '../src/response-interpreter';
import { createInitialState, mergeState } from '../src/device-state';

describe('interpretResponse', () => {
    test('power tokens', () => {
        expect(interpretResponse('PWON')).toEqual({ power: true });
        expect(interpretResponse('PWSTANDBY')).toEqual({ power: false });
    });

    test('main volume takes the two digits after MV', () => {
        expect(interpretResponse('MV45')).toEqual({ volume: 45 });
        expect(interpretResponse('MV07')).toEqual({ volume: 7 });
        expect(interpretResponse('MV09')).toEqual({ volume: 9 });
        expect(interpretResponse('MV455')).toEqual({ volume: 45 });
    });

    test('three-character volume token yields its single digit', () => {
        expect(interpretResponse('MV5')).toEqual({ volume: 5 });
    });

    test('volume tokens without a numeric argument change nothing', () => {
        expect(interpretResponse('MV')).toEqual({});
        expect(interpretResponse('MV9X')).toEqual({});
        expect(interpretResponse('MVMAX 98')).toEqual({});
    });

    test('mute tokens', () => {
        expect(interpretResponse('MUON')).toEqual({ muted: true });
        expect(interpretResponse('MUOFF')).toEqual({ muted: false });
    });

    test('input source and surround mode take the rest of the token', () => {
        expect(interpretResponse('SIDVD')).toEqual({ inputSource: 'DVD' });
        expect(interpretResponse('SIPHONO')).toEqual({ inputSource: 'PHONO' });
        expect(interpretResponse('SI')).toEqual({ inputSource: '' });
        expect(interpretResponse('MSSTEREO')).toEqual({ surroundMode: 'STEREO' });
    });

    test('zone 2 power, mute and volume', () => {
        expect(interpretResponse('Z2ON')).toEqual({ zone2Power: true });
        expect(interpretResponse('Z2OFF')).toEqual({ zone2Power: false });
        expect(interpretResponse('Z2MUON')).toEqual({ zone2Muted: true });
        expect(interpretResponse('Z2MUOFF')).toEqual({ zone2Muted: false });
        expect(interpretResponse('Z245')).toEqual({ zone2Volume: 45 });
    });

    test('unrecognised tokens yield an empty update', () => {
        expect(interpretResponse('XYZ')).toEqual({});
        expect(interpretResponse('')).toEqual({});
    });

    test('the same token applied twice leaves field values unchanged', () => {
        const once = mergeState(createInitialState(new Date(0)), interpretResponse('MV45'), new Date(1)).state;
        const twice = mergeState(once, interpretResponse('MV45'), new Date(2)).state;
        expect(twice.volume).toBe(45);
        expect(twice.lastUpdated).toEqual(new Date(2));
    });
});

describe('simulateCommand', () => {
    const unknown = createInitialState(new Date(0));

    test('power and mute toggles', () => {
        expect(simulateCommand('PWON', unknown)).toEqual({ power: true });
        expect(simulateCommand('PWSTANDBY', unknown)).toEqual({ power: false });
        expect(simulateCommand('MUON', unknown)).toEqual({ muted: true });
        expect(simulateCommand('MUOFF', unknown)).toEqual({ muted: false });
        expect(simulateCommand('Z2ON', unknown)).toEqual({ zone2Power: true });
        expect(simulateCommand('Z2MUOFF', unknown)).toEqual({ zone2Muted: false });
    });

    test('volume steps start from 50 when the level is unknown', () => {
        expect(simulateCommand('MVUP', unknown)).toEqual({ volume: 51 });
        expect(simulateCommand('MVDOWN', unknown)).toEqual({ volume: 49 });
        expect(simulateCommand('Z2UP', unknown)).toEqual({ zone2Volume: 51 });
    });

    test('volume steps are clamped to the scale', () => {
        const loud = mergeState(unknown, { volume: 98, zone2Volume: 0 }).state;
        expect(simulateCommand('MVUP', loud)).toEqual({ volume: 98 });
        expect(simulateCommand('Z2DOWN', loud)).toEqual({ zone2Volume: 0 });
    });

    test('absolute levels, inputs and surround modes', () => {
        expect(simulateCommand('MV30', unknown)).toEqual({ volume: 30 });
        expect(simulateCommand('Z240', unknown)).toEqual({ zone2Volume: 40 });
        expect(simulateCommand('SICD', unknown)).toEqual({ inputSource: 'CD' });
        expect(simulateCommand('MSMOVIE', unknown)).toEqual({ surroundMode: 'MOVIE' });
    });

    test('commands with no known effect change nothing', () => {
        expect(simulateCommand('MVX', unknown)).toEqual({});
        expect(simulateCommand('ECOON', unknown)).toEqual({});
    });
});
