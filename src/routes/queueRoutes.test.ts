import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { silentLogger } from '../__tests__/config';
import { createApp } from '../app';
import { TriageSession } from '../session/triageSession';

describe('queue routes', () => {
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
        const app = createApp(new TriageSession(2), silentLogger);
        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('expected a TCP address');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
        });
    });

    const post = (path: string, body?: unknown) =>
        fetch(`${baseUrl}${path}`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body)
        });

    const get = (path: string) => fetch(`${baseUrl}${path}`);

    it('should run the capacity scenario end to end', async () => {
        const a = await post('/queue/patients', { id: 1, name: 'A', severity: 2 });
        expect(a.status).toBe(201);
        expect(await a.json()).toEqual({ patient: { id: 1, name: 'A', severity: 2, arrivalTime: 1 }, size: 1 });

        expect((await post('/queue/patients', { id: 2, name: 'B', severity: 3 })).status).toBe(201);

        const full = await post('/queue/patients', { id: 3, name: 'C', severity: 4 });
        expect(full.status).toBe(409);
        expect(await full.json()).toEqual({ error: 'Queue is at full capacity', reason: 'QUEUE_FULL', capacity: 2 });

        const served = await post('/queue/serve');
        expect(served.status).toBe(200);
        expect(await served.json()).toEqual({ patient: { id: 1, name: 'A', severity: 2, arrivalTime: 1 }, size: 1 });

        expect((await post('/queue/patients', { id: 3, name: 'C', severity: 4 })).status).toBe(201);

        const forward = await get('/queue');
        expect(await forward.json()).toEqual({
            direction: 'forward',
            size: 2,
            patients: [
                { position: 1, id: 2, name: 'B', severity: 3, severityBar: '[***  ]', arrivalTime: 2 },
                { position: 2, id: 3, name: 'C', severity: 4, severityBar: '[**** ]', arrivalTime: 4 }
            ]
        });

        const backward = await get('/queue?direction=backward');
        expect(await backward.json()).toEqual({
            direction: 'backward',
            size: 2,
            patients: [
                { position: 1, id: 3, name: 'C', severity: 4, severityBar: '[**** ]', arrivalTime: 4 },
                { position: 2, id: 2, name: 'B', severity: 3, severityBar: '[***  ]', arrivalTime: 2 }
            ]
        });
    });

    it('should reject invalid patient input with the failing fields', async () => {
        const res = await post('/queue/patients', { id: 1, name: '', severity: 9 });
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
            error: 'Invalid patient input',
            issues: [
                { field: 'name', message: 'Patient name cannot be empty' },
                { field: 'severity', message: 'Severity must be at most 5' }
            ]
        });
    });

    it('should answer a malformed JSON body with 400', async () => {
        const res = await fetch(`${baseUrl}/queue/patients`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: '{bad'
        });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'Malformed JSON body' });
        expect(await (await get('/queue/status')).json()).toMatchObject({ size: 0 });
    });

    it('should return 404 when serving or peeking an empty queue', async () => {
        const serve = await post('/queue/serve');
        expect(serve.status).toBe(404);
        expect(await serve.json()).toEqual({ error: 'Queue is empty', reason: 'QUEUE_EMPTY' });

        expect((await get('/queue/front')).status).toBe(404);
        expect((await get('/queue/rear')).status).toBe(404);
    });

    it('should peek at the front and rear patients', async () => {
        await post('/queue/patients', { id: 1, name: 'A', severity: 2 });
        await post('/queue/patients', { id: 2, name: 'B', severity: 5 });

        expect(await (await get('/queue/front')).json()).toEqual({
            patient: { id: 1, name: 'A', severity: 2, arrivalTime: 1 }
        });
        expect(await (await get('/queue/rear')).json()).toEqual({
            patient: { id: 2, name: 'B', severity: 5, arrivalTime: 2 }
        });
    });

    it('should reject an unknown traversal direction', async () => {
        const res = await get('/queue?direction=sideways');
        expect(res.status).toBe(400);
    });

    it('should report status and statistics', async () => {
        expect(await (await get('/queue/stats')).json()).toEqual({
            capacity: { size: 0, capacity: 2, condition: 'EMPTY', isFull: false, isEmpty: true, usagePercent: 0 },
            severity: null
        });

        await post('/queue/patients', { id: 1, name: 'A', severity: 2 });
        await post('/queue/patients', { id: 2, name: 'B', severity: 5 });

        expect(await (await get('/queue/status')).json()).toEqual({
            size: 2,
            capacity: 2,
            condition: 'FULL',
            isFull: true,
            isEmpty: false,
            usagePercent: 100
        });
        expect(await (await get('/queue/stats')).json()).toEqual({
            capacity: { size: 2, capacity: 2, condition: 'FULL', isFull: true, isEmpty: false, usagePercent: 100 },
            severity: { count: 2, average: 3.5, min: 2, max: 5 }
        });
    });

    it('should report health with the queue size', async () => {
        await post('/queue/patients', { id: 1, name: 'A', severity: 2 });
        expect(await (await get('/health')).json()).toEqual({ status: 'healthy', queueSize: 1, capacity: 2 });
    });
});
