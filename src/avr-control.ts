import { Node, NodeAPI, NodeDef } from 'node-red';
import { AvrController } from './avr-controller';
import { CommandTable } from './command-table';
import { StateBroadcaster, BroadcastClient } from './state-broadcaster';
import { resolveReceiverConfig, ReceiverSettings } from './config';
import { stateToJSON } from './device-state';
import { nodeLogger } from './logger';
import { handleMessage, toResult } from './message-router';
import { errorMessage } from './errors';
import * as CONST from './constants';

interface AvrReceiverConfig extends NodeDef {
    host: string;
    port: string;
    timeout: string;
    debugMode: boolean;
    pollInterval: string;
}

interface AvrReceiverNode extends Node {
    receiverSettings: ReceiverSettings | null;
}

interface AvrControlConfig extends NodeDef {
    receiver: string;
}

interface ReceiverHandle {
    controller: AvrController;
    broadcaster: StateBroadcaster;
}

function showStatus(node: Node, connected: boolean): void {
    if (connected) {
        node.status({ fill: 'green', shape: 'dot', text: 'connected' });
    } else {
        node.status({ fill: 'red', shape: 'ring', text: 'disconnected' });
    }
}

export = function (RED: NodeAPI) {
    const commandTable = new CommandTable(RED.settings.userDir);
    const receivers = new Map<string, ReceiverHandle>();

    function withReceiver(id: string): AvrController | undefined {
        return receivers.get(id)?.controller;
    }

    // --- Admin API ---
    RED.httpAdmin.get('/avr-control/commands', RED.auth.needsPermission('avr-control.read'), function (req, res) {
        const commands = commandTable.list();
        const labels = Object.fromEntries(Object.keys(commands).map(name => [name, commandTable.label(name)]));
        res.json({ commands, groups: commandTable.groups(), labels });
    });

    RED.httpAdmin.post('/avr-control/commands', RED.auth.needsPermission('avr-control.write'), function (req, res) {
        const name: unknown = req.body?.name;
        const command: unknown = req.body?.command;
        if (typeof name !== 'string' || typeof command !== 'string') {
            res.status(400).send('name and command are required');
            return;
        }
        try {
            res.json({ name, command: commandTable.set(name, command) });
        } catch (e) {
            res.status(400).send(errorMessage(e));
        }
    });

    RED.httpAdmin.delete('/avr-control/commands/:name', RED.auth.needsPermission('avr-control.write'), function (req, res) {
        if (commandTable.delete(req.params.name as string)) res.sendStatus(200);
        else res.sendStatus(404);
    });

    RED.httpAdmin.get('/avr-control/:id/status', RED.auth.needsPermission('avr-control.read'), function (req, res) {
        const controller = withReceiver(req.params.id as string);
        if (!controller) {
            res.sendStatus(404);
            return;
        }
        res.json({ connected: controller.connected, state: stateToJSON(controller.getState()) });
    });

    RED.httpAdmin.post('/avr-control/:id/connect', RED.auth.needsPermission('avr-control.write'), async function (req, res) {
        const controller = withReceiver(req.params.id as string);
        if (!controller) {
            res.sendStatus(404);
            return;
        }
        const success = await controller.connect();
        res.json({ success, connected: controller.connected });
    });

    RED.httpAdmin.post('/avr-control/:id/disconnect', RED.auth.needsPermission('avr-control.write'), async function (req, res) {
        const controller = withReceiver(req.params.id as string);
        if (!controller) {
            res.sendStatus(404);
            return;
        }
        await controller.disconnect();
        res.json({ success: true, connected: controller.connected });
    });

    RED.httpAdmin.post('/avr-control/:id/command/:name', RED.auth.needsPermission('avr-control.write'), async function (req, res) {
        const controller = withReceiver(req.params.id as string);
        if (!controller) {
            res.sendStatus(404);
            return;
        }
        const command = commandTable.resolve(req.params.name as string);
        if (command === undefined) {
            res.json({ success: false, error: 'Unknown command' });
            return;
        }
        const result = await controller.sendAndWait(command);
        res.json({ ...toResult(controller, result), command });
    });

    RED.httpAdmin.post('/avr-control/:id/command', RED.auth.needsPermission('avr-control.write'), async function (req, res) {
        const controller = withReceiver(req.params.id as string);
        if (!controller) {
            res.sendStatus(404);
            return;
        }
        const command: unknown = req.body?.command;
        if (typeof command !== 'string' || !command) {
            res.json({ success: false, error: 'No command provided' });
            return;
        }
        res.json(toResult(controller, await controller.sendCustomCommand(command)));
    });

    // --- Receiver (config node): owns the controller for one AVR ---
    function AvrReceiverNode(this: AvrReceiverNode, config: AvrReceiverConfig) {
        RED.nodes.createNode(this, config);
        const node = this;
        const logger = nodeLogger(node);

        let settings: ReceiverSettings;
        try {
            settings = resolveReceiverConfig(config);
        } catch (e) {
            node.receiverSettings = null;
            node.status({ fill: 'red', shape: 'ring', text: 'invalid config' });
            node.error(errorMessage(e));
            return;
        }
        node.receiverSettings = settings;

        const controller = new AvrController({ ...settings, logger });
        const broadcaster = new StateBroadcaster(() => controller.connected, logger);
        controller.subscribe(broadcaster);
        receivers.set(node.id, { controller, broadcaster });

        controller.connect().then((connected) => {
            if (!connected) node.warn(`Not connected to AVR: ${controller.lastError ?? CONST.MSG_UNKNOWN_ERROR}`);
        }, (err: unknown) => node.error(`Connect failed: ${errorMessage(err)}`));

        node.on('close', function (done: () => void) {
            receivers.delete(node.id);
            controller.unsubscribe(broadcaster);
            controller.disconnect().then(() => done(), (err: unknown) => {
                node.error(`Disconnect failed: ${errorMessage(err)}`);
                done();
            });
        });
    }

    // --- Control (flow node): commands in, results and state updates out ---
    function AvrControlNode(this: Node, config: AvrControlConfig) {
        RED.nodes.createNode(this, config);
        const node = this;
        const receiver = receivers.get(config.receiver);

        if (!receiver) {
            node.status({ fill: 'red', shape: 'ring', text: 'no receiver' });
            node.warn('No AVR receiver configured');
            return;
        }

        const { controller, broadcaster } = receiver;
        showStatus(node, controller.connected);

        const client: BroadcastClient = {
            send: (message) => {
                showStatus(node, message.connected);
                node.send({ topic: 'state', payload: message });
            }
        };
        broadcaster.addClient(client);

        node.on('input', function (msg, send, done) {
            handleMessage(controller, commandTable, msg).then((result) => {
                showStatus(node, result.connected);
                send({ ...msg, payload: result });
                done();
            }, (err: unknown) => {
                done(err instanceof Error ? err : new Error(String(err)));
            });
        });

        node.on('close', function (done: () => void) {
            broadcaster.removeClient(client);
            done();
        });
    }

    RED.nodes.registerType('avr-receiver', AvrReceiverNode);
    RED.nodes.registerType('avr-control', AvrControlNode);
};
