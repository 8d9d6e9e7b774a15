import { SerialQueue } from '../src/serial-queue';

describe('SerialQueue', () => {
    test('runs tasks one at a time in submission order', async () => {
        const queue = new SerialQueue();
        const order: string[] = [];

        const p1 = queue.run(async () => {
            order.push('start1');
            await new Promise(r => setTimeout(r, 30));
            order.push('end1');
            return 'result1';
        });
        const p2 = queue.run(async () => {
            order.push('start2');
            await new Promise(r => setTimeout(r, 5));
            order.push('end2');
            return 'result2';
        });

        await expect(Promise.all([p1, p2])).resolves.toEqual(['result1', 'result2']);
        expect(order).toEqual(['start1', 'end1', 'start2', 'end2']);
    });

    test('a failing task rejects only its own caller', async () => {
        const queue = new SerialQueue();

        const failing = queue.run(async () => {
            throw new Error('write failed');
        });
        const next = queue.run(() => 'still running');

        await expect(failing).rejects.toThrow('write failed');
        await expect(next).resolves.toBe('still running');
    });

    test('counts queued and running tasks', async () => {
        const queue = new SerialQueue();
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => { release = resolve; });

        const first = queue.run(() => gate);
        const second = queue.run(() => undefined);
        expect(queue.size).toBe(2);

        release();
        await Promise.all([first, second]);
        expect(queue.size).toBe(0);
    });
});
