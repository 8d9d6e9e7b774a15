import { NodeMessageInFlow } from 'node-red';
import { AvrController, CommandResult, CommandResolver } from './avr-controller';
import { AvrStateJSON, stateToJSON } from './device-state';
import * as CONST from './constants';

export interface AvrControlResult {
    success: boolean;
    response: string;
    connected: boolean;
    state: AvrStateJSON;
}

export function toResult(controller: AvrController, result: CommandResult): AvrControlResult {
    return {
        success: result.success,
        response: result.message,
        connected: controller.connected,
        state: stateToJSON(controller.getState())
    };
}

function presetName(payload: unknown): string | undefined {
    if (typeof payload === 'object' && payload !== null && 'preset' in payload && typeof payload.preset === 'string') {
        return payload.preset;
    }
    return undefined;
}

/**
 * Route one flow message to the controller.
 *
 * - topic "connect" / "disconnect": lifecycle
 * - topic "preset" with a string payload, or payload `{ preset: name }`: command table entry
 * - any other string payload: custom command (validated)
 */
export async function handleMessage(controller: AvrController, table: CommandResolver, msg: NodeMessageInFlow): Promise<AvrControlResult> {
    if (msg.topic === 'connect') {
        const connected = await controller.connect();
        return toResult(controller, connected
            ? { success: true, message: 'Connected' }
            : { success: false, message: `Not connected to AVR: ${controller.lastError ?? CONST.MSG_UNKNOWN_ERROR}` });
    }

    if (msg.topic === 'disconnect') {
        await controller.disconnect();
        return toResult(controller, { success: true, message: 'Disconnected' });
    }

    const preset = msg.topic === 'preset' && typeof msg.payload === 'string' ? msg.payload : presetName(msg.payload);
    if (preset !== undefined) {
        return toResult(controller, await controller.sendNamedCommand(preset, table));
    }

    if (typeof msg.payload === 'string') {
        return toResult(controller, await controller.sendCustomCommand(msg.payload));
    }

    return toResult(controller, { success: false, message: 'No command provided' });
}
