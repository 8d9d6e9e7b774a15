/**
 * Receiver state snapshot and merge.
 *
 * Snapshots are frozen; a merge always produces a new object so that
 * subscribers holding an older snapshot never see it change.
 */

export interface AvrState {
    power?: boolean;
    volume?: number;        // 0-98 (Denon scale: 00-98)
    muted?: boolean;
    inputSource?: string;
    surroundMode?: string;
    zone2Power?: boolean;
    zone2Volume?: number;
    zone2Muted?: boolean;
    lastUpdated: Date;
}

/** Fields a single response token (or simulated command) can determine */
export type AvrStateUpdate = Partial<Omit<AvrState, 'lastUpdated'>>;

export type AvrStateField = keyof AvrStateUpdate;

export const STATE_FIELDS: readonly AvrStateField[] = [
    'power',
    'volume',
    'muted',
    'inputSource',
    'surroundMode',
    'zone2Power',
    'zone2Volume',
    'zone2Muted'
];

export interface MergeResult {
    state: Readonly<AvrState>;
    changed: boolean;
}

/** Wire form, as sent to node outputs and admin API clients */
export interface AvrStateJSON {
    power: boolean | null;
    volume: number | null;
    muted: boolean | null;
    input_source: string | null;
    surround_mode: string | null;
    zone2_power: boolean | null;
    zone2_volume: number | null;
    zone2_muted: boolean | null;
    last_updated: string;
}

export function createInitialState(now: Date = new Date()): Readonly<AvrState> {
    return Object.freeze({ lastUpdated: now });
}

/**
 * Apply an update to a snapshot.
 *
 * Only keys present in `update` are written. `lastUpdated` moves to `now`
 * whenever the update determined at least one field, even if the value is
 * the same as before. An empty update returns the input snapshot untouched.
 */
export function mergeState(state: Readonly<AvrState>, update: AvrStateUpdate, now: Date = new Date()): MergeResult {
    const keys = STATE_FIELDS.filter(field => update[field] !== undefined);
    if (keys.length === 0) {
        return { state, changed: false };
    }

    const picked: AvrStateUpdate = {};
    for (const key of keys) {
        copyField(picked, update, key);
    }
    return { state: Object.freeze({ ...state, ...picked, lastUpdated: now }), changed: true };
}

function copyField<K extends AvrStateField>(target: AvrStateUpdate, source: AvrStateUpdate, key: K): void {
    target[key] = source[key];
}

export function stateToJSON(state: Readonly<AvrState>): AvrStateJSON {
    return {
        power: state.power ?? null,
        volume: state.volume ?? null,
        muted: state.muted ?? null,
        input_source: state.inputSource ?? null,
        surround_mode: state.surroundMode ?? null,
        zone2_power: state.zone2Power ?? null,
        zone2_volume: state.zone2Volume ?? null,
        zone2_muted: state.zone2Muted ?? null,
        last_updated: state.lastUpdated.toISOString()
    };
}
