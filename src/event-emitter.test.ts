import assert from 'node:assert/strict';
import test from 'node:test';
import { EventEmitter } from './event-emitter.ts';

type TestEvents = {
    ping: [count: number, label: string];
    pong: [count: number, label: string];
};

test('on receives every emitted argument', () => {
    const emitter = new EventEmitter<TestEvents>();
    const received: Array<[number, string]> = [];

    emitter.on('ping', (count, label) => {
        received.push([count, label]);
    });
    emitter.emit('ping', 1, 'a');
    emitter.emit('ping', 2, 'b');

    assert.deepEqual(received, [[1, 'a'], [2, 'b']]);
});

test('off stops delivery', () => {
    const emitter = new EventEmitter<TestEvents>();
    let calls = 0;
    const listener = () => {
        calls++;
    };

    emitter.on('ping', listener);
    emitter.emit('ping', 1, 'a');
    emitter.off('ping', listener);
    emitter.emit('ping', 2, 'b');

    assert.equal(calls, 1);
});

test('once fires a single time', () => {
    const emitter = new EventEmitter<TestEvents>();
    const counts: number[] = [];

    emitter.once('ping', (count) => {
        counts.push(count);
    });
    emitter.emit('ping', 1, 'a');
    emitter.emit('ping', 2, 'b');

    assert.deepEqual(counts, [1]);
});

test('one listener can be registered for several events', () => {
    const emitter = new EventEmitter<TestEvents>();
    const labels: string[] = [];
    const listener = (_count: number, label: string) => {
        labels.push(label);
    };

    emitter.on('ping', listener);
    emitter.on('pong', listener);
    emitter.off('ping', listener);
    emitter.emit('ping', 1, 'a');
    emitter.emit('pong', 2, 'b');
    emitter.off('pong', listener);
    emitter.emit('pong', 3, 'c');

    assert.deepEqual(labels, ['b']);
});

test('once on a second event leaves the first registration in place', () => {
    const emitter = new EventEmitter<TestEvents>();
    const labels: string[] = [];
    const listener = (_count: number, label: string) => {
        labels.push(label);
    };

    emitter.on('ping', listener);
    emitter.once('pong', listener);
    emitter.emit('pong', 1, 'a');
    emitter.emit('pong', 2, 'b');
    emitter.emit('ping', 3, 'c');
    emitter.off('ping', listener);
    emitter.emit('ping', 4, 'd');

    assert.deepEqual(labels, ['a', 'c']);
});

test('registering a listener again for the same event replaces it', () => {
    const emitter = new EventEmitter<TestEvents>();
    let calls = 0;
    const listener = () => {
        calls++;
    };

    emitter.on('ping', listener);
    emitter.on('ping', listener);
    emitter.emit('ping', 1, 'a');
    emitter.off('ping', listener);
    emitter.emit('ping', 2, 'b');

    assert.equal(calls, 1);
});
