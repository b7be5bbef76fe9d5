import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { buildApp } from '../app';
import { loadConfig } from '../config';
import { MemoryStore } from '../store/db';

const config = loadConfig({ LOG_PRETTY: 'false' });

describe('Seat booking API', () => {
    const store = new MemoryStore();
    const { app } = buildApp({
        config: { ...config, rateLimit: { max: 1000, timeWindow: '1 minute' } },
        store,
        logger: false
    });

    beforeAll(async () => {
        await app.ready();
    });

    beforeEach(() => {
        store.reset();
    });

    afterAll(async () => {
        await app.close();
    });

    const initialize = (seatCount: number) =>
        app.inject({ method: 'POST', url: '/seats/initialize', payload: { seatCount } });

    const reserve = (userId: number, priority: number, headers: Record<string, string> = {}) =>
        app.inject({ method: 'POST', url: '/seats/reservations', payload: { userId, priority }, headers });

    it('POST /seats/initialize - should open seats', async () => {
        const response = await initialize(3);

        expect(response.statusCode).toBe(201);
        expect(response.json()).toEqual({
            kind: 'initialized',
            seatCount: 3,
            lines: ['3 Seats are made available for reservation']
        });
    });

    it('POST /seats/initialize - should reject a zero seat count', async () => {
        const response = await initialize(0);

        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({
            error: 'invalid_input',
            detail: 'Invalid input. Please provide a valid number of seats.'
        });
    });

    it('POST /seats/initialize - should reject a malformed body', async () => {
        const response = await app.inject({ method: 'POST', url: '/seats/initialize', payload: { seatCount: 'ten' } });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('invalid_input');
    });

    it('POST /seats/reservations - should reserve, then waitlist', async () => {
        await initialize(1);

        const first = await reserve(1, 1);
        expect(first.statusCode).toBe(201);
        expect(first.json()).toEqual({ kind: 'reserved', userId: 1, seatId: 1, lines: ['User 1 reserved seat 1'] });

        const second = await reserve(2, 4);
        expect(second.statusCode).toBe(202);
        expect(second.json().kind).toBe('waitlisted');

        const available = await app.inject({ method: 'GET', url: '/seats/available' });
        expect(available.statusCode).toBe(200);
        expect(available.json()).toEqual({
            kind: 'availability',
            availableSeats: 0,
            waitlistLength: 1,
            lines: ['Total Seats Available : 0, Waitlist : 1']
        });
    });

    it('POST /seats/reservations - should reject a user who already holds a seat', async () => {
        await initialize(2);
        await reserve(1, 1);

        const response = await reserve(1, 1);
        expect(response.statusCode).toBe(409);
        expect(response.json()).toEqual({ error: 'already_holding', detail: 'User 1 already has a reservation' });
    });

    it('POST /seats/reservations - idempotency', async () => {
        await initialize(2);
        const key = 'test-idempotency-key';

        const res1 = await reserve(7, 1, { 'Idempotency-Key': key });
        expect(res1.statusCode).toBe(201);

        const res2 = await reserve(7, 1, { 'Idempotency-Key': key });
        expect(res2.statusCode).toBe(200); // Existing reply returned
        expect(res2.json()).toEqual(res1.json());

        const available = await app.inject({ method: 'GET', url: '/seats/available' });
        expect(available.json().availableSeats).toBe(1);
    });

    it('POST /seats/initialize - should forget idempotency keys of the previous state', async () => {
        await initialize(2);
        const key = 'test-reset-key';

        const first = await reserve(7, 1, { 'Idempotency-Key': key });
        expect(first.statusCode).toBe(201);

        expect((await initialize(2)).statusCode).toBe(201);

        const retry = await reserve(7, 1, { 'Idempotency-Key': key });
        expect(retry.statusCode).toBe(201);
        expect(retry.json()).toEqual({ kind: 'reserved', userId: 7, seatId: 1, lines: ['User 7 reserved seat 1'] });
        expect(store.engine.snapshot().reservations).toEqual([{ userId: 7, seatId: 1 }]);
    });

    it('POST /seats/initialize - should reject counts above the seat ceiling', async () => {
        const response = await initialize(1_000_001);

        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({
            error: 'invalid_input',
            detail: 'Invalid input. Please provide a valid number of seats.'
        });
    });

    it('API Hardening: should reject integers outside the safe range', async () => {
        await initialize(1);

        const huge = await app.inject({ method: 'POST', url: '/seats/add', payload: { count: 1e300 } });
        expect(huge.statusCode).toBe(400);
        expect(huge.json().error).toBe('invalid_input');

        const user = await reserve(Number.MAX_SAFE_INTEGER + 1, 1);
        expect(user.statusCode).toBe(400);

        const cancel = await app.inject({ method: 'DELETE', url: '/seats/reservations/9007199254740993?seatId=1' });
        expect(cancel.statusCode).toBe(400);

        expect(store.engine.snapshot()).toEqual({ totalSeats: 1, reservations: [], waitlist: [], freeSeats: [1] });
    });

    it('DELETE /seats/reservations/:userId - should cancel and reassign', async () => {
        await initialize(1);
        await reserve(1, 1);
        await reserve(2, 5);

        const response = await app.inject({ method: 'DELETE', url: '/seats/reservations/1?seatId=1' });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            kind: 'cancelled',
            userId: 1,
            seatId: 1,
            reassigned: { userId: 2, seatId: 1 },
            lines: ['User 1 canceled their reservation', 'User 2 reserved seat 1']
        });
    });

    it('DELETE /seats/reservations/:userId - should map not found and mismatch', async () => {
        await initialize(2);
        await reserve(1, 1);

        const missing = await app.inject({ method: 'DELETE', url: '/seats/reservations/9?seatId=1' });
        expect(missing.statusCode).toBe(404);
        expect(missing.json()).toEqual({ error: 'not_found', detail: 'User 9 has no reservation to cancel' });

        const mismatch = await app.inject({ method: 'DELETE', url: '/seats/reservations/1?seatId=2' });
        expect(mismatch.statusCode).toBe(409);
        expect(mismatch.json()).toEqual({ error: 'mismatch', detail: 'User 1 has no reservation for seat 2 to cancel' });

        const malformed = await app.inject({ method: 'DELETE', url: '/seats/reservations/1' });
        expect(malformed.statusCode).toBe(400);
    });

    it('POST /seats/add - should seat waiting users on new seats', async () => {
        await initialize(1);
        await reserve(1, 1);
        await reserve(2, 3);
        await reserve(3, 9);

        const response = await app.inject({ method: 'POST', url: '/seats/add', payload: { count: 1 } });

        expect(response.statusCode).toBe(200);
        expect(response.json().lines).toEqual([
            'Additional 1 Seats are made available for reservation',
            'User 3 reserved seat 2'
        ]);
    });

    it('PATCH and DELETE /seats/waitlist/:userId - should manage waiting users', async () => {
        await initialize(1);
        await reserve(1, 1);
        await reserve(2, 1);

        const updated = await app.inject({ method: 'PATCH', url: '/seats/waitlist/2', payload: { priority: 6 } });
        expect(updated.statusCode).toBe(200);
        expect(updated.json().lines).toEqual(['User 2 priority has been updated to 6']);

        const notWaiting = await app.inject({ method: 'PATCH', url: '/seats/waitlist/1', payload: { priority: 6 } });
        expect(notWaiting.statusCode).toBe(404);

        const exited = await app.inject({ method: 'DELETE', url: '/seats/waitlist/2' });
        expect(exited.statusCode).toBe(200);
        expect(exited.json()).toEqual({
            kind: 'waitlist_exited',
            userId: 2,
            lines: ['User 2 is removed from the waiting list']
        });

        const again = await app.inject({ method: 'DELETE', url: '/seats/waitlist/2' });
        expect(again.statusCode).toBe(404);
        expect(again.json()).toEqual({ error: 'not_found', detail: 'User 2 is not in waitlist' });
    });

    it('POST /seats/reservations/release - should release a range and list by seat', async () => {
        await initialize(3);
        await reserve(1, 1);
        await reserve(2, 1);
        await reserve(3, 1);
        await reserve(4, 2);

        const released = await app.inject({
            method: 'POST',
            url: '/seats/reservations/release',
            payload: { lo: 1, hi: 2 }
        });
        expect(released.statusCode).toBe(200);
        expect(released.json().lines).toEqual([
            'Reservations of the Users in the range [1, 2] are released',
            'User 4 reserved seat 1'
        ]);

        const list = await app.inject({ method: 'GET', url: '/seats/reservations' });
        expect(list.json().items).toEqual([
            { userId: 4, seatId: 1 },
            { userId: 3, seatId: 3 }
        ]);

        const inverted = await app.inject({
            method: 'POST',
            url: '/seats/reservations/release',
            payload: { lo: 5, hi: 1 }
        });
        expect(inverted.statusCode).toBe(400);
        expect(inverted.json().detail).toBe('Invalid input. Please provide a valid range of users.');
    });

    it('POST /seats/commands - should run a command script', async () => {
        const response = await app.inject({
            method: 'POST',
            url: '/seats/commands',
            headers: { 'content-type': 'text/plain' },
            payload: 'Initialize(2)\nReserve(1, 1)\nNope()\nAvailable()\nQuit()\nReserve(2, 1)\n'
        });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            lines: [
                '2 Seats are made available for reservation',
                'User 1 reserved seat 1',
                'Total Seats Available : 1, Waitlist : 0',
                'Program Terminated!!'
            ],
            terminated: true
        });
    });

    it('Concurrency: a held engine lock answers 409', async () => {
        await initialize(1);
        expect(store.acquireLock('engine')).toBe(true);

        const response = await reserve(1, 1);
        expect(response.statusCode).toBe(409);
        expect(response.json().error).toBe('conflict');

        store.releaseLock('engine');
        expect((await reserve(1, 1)).statusCode).toBe(201);
    });

    it('API Hardening: should expire idempotency keys', async () => {
        const key = 'expiring-key-test';
        const reply = { kind: 'reserved' as const, userId: 1, seatId: 1, lines: ['User 1 reserved seat 1'] };

        // Set with short TTL
        store.setIdempotency(key, reply, 10); // 10ms TTL

        // Should exist immediately
        expect(store.getIdempotency(key)).toEqual(reply);

        // Wait for expiration
        await new Promise(resolve => setTimeout(resolve, 20));

        // Should be gone
        expect(store.getIdempotency(key)).toBeUndefined();
    });
});

describe('Seat booking API startup and limits', () => {
    it('should initialize seats on boot when configured', async () => {
        const { app } = buildApp({ config: { ...config, initialSeats: 4 }, logger: false });
        await app.ready();

        const response = await app.inject({ method: 'GET', url: '/seats/available' });
        expect(response.json().availableSeats).toBe(4);

        await app.close();
    });

    it('API Hardening: should rate limit requests', async () => {
        const limit = 5;
        const { app } = buildApp({
            config: { ...config, rateLimit: { max: limit, timeWindow: '1 minute' } },
            logger: false
        });
        await app.ready();

        const responses = [];
        for (let i = 0; i < limit + 3; i++) {
            responses.push(await app.inject({ method: 'GET', url: '/seats/available' }));
        }
        const tooManyRequests = responses.filter(r => r.statusCode === 429);

        expect(tooManyRequests.length).toBe(3);
        await app.close();
    });
});
