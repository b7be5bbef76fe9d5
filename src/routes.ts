import type { FastifyReply, FastifyRequest } from 'fastify';
import {
    AddSeatsSchema,
    CancelParamsSchema,
    CancelQuerySchema,
    CommandScriptSchema,
    InitializeSchema,
    ReleaseSeatsSchema,
    ReserveSchema,
    UpdatePrioritySchema,
    WaitlistParamsSchema
} from './schemas';
import { renderResult, runScript } from './commands';
import type { BookingEngine } from './domain/booking-engine';
import type { MemoryStore } from './store/db';
import type { Outcome } from './types';

type Handler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;

export interface RouteOptions {
    lockTtlMs: number;
    idempotencyTtlMs: number;
}

const ENGINE_LOCK = 'engine';

/**
 * HTTP status for an outcome the engine rejected, or null for a successful one
 */
const rejectionStatus = (outcome: Outcome): number | null => {
    switch (outcome.kind) {
        case 'invalid_input': return 400;
        case 'not_found': return 404;
        case 'mismatch':
        case 'already_holding': return 409;
        default: return null;
    }
};

const sendOutcome = (reply: FastifyReply, outcome: Outcome, successStatus: number = 200) => {
    const lines = renderResult(outcome);
    const status = rejectionStatus(outcome);
    if (status !== null) {
        return reply.status(status).send({ error: outcome.kind, detail: lines.join('\n') });
    }
    return reply.status(successStatus).send({ ...outcome, lines });
};

const busy = (reply: FastifyReply) =>
    reply.status(409).send({ error: 'conflict', detail: 'System busy, please retry' });

/**
 * Route handlers bound to a store
 *
 * Every handler that mutates the engine runs inside the store's engine lock.
 */
export const bookingHandlers = (store: MemoryStore, options: RouteOptions) => {
    const locked = <T>(operation: (engine: BookingEngine) => T): { acquired: true; value: T } | { acquired: false } => {
        if (!store.acquireLock(ENGINE_LOCK, options.lockTtlMs)) return { acquired: false };
        try {
            return { acquired: true, value: operation(store.engine) };
        } finally {
            store.releaseLock(ENGINE_LOCK);
        }
    };

    /**
     * Reset the engine with a fresh set of seats
     *
     * Replies remembered for Idempotency-Key replays are dropped with the old state.
     *
     * @returns 201 with the initialized outcome
     * @throws {400} Invalid body, or seat count non-positive or above the ceiling
     */
    const initialize: Handler = async (request, reply) => {
        const body = InitializeSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const result = locked(engine => engine.initialize(body.data.seatCount));
        if (!result.acquired) return busy(reply);
        if (result.value.kind === 'initialized') store.forgetReplies();
        return sendOutcome(reply, result.value, 201);
    };

    /**
     * Count free seats and waiting users
     */
    const available: Handler = async (_request, reply) => {
        return sendOutcome(reply, store.engine.available());
    };

    /**
     * Open more seats, seating waiting users first
     *
     * @throws {400} Invalid body, or count non-positive or past the seat ceiling
     */
    const addSeats: Handler = async (request, reply) => {
        const body = AddSeatsSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const result = locked(engine => engine.addSeats(body.data.count));
        if (!result.acquired) return busy(reply);
        return sendOutcome(reply, result.value);
    };

    /**
     * Reserve the lowest free seat or join the waitlist
     *
     * Supports the Idempotency-Key header: a repeated key replays the first reply
     * with status 200 instead of reserving again.
     *
     * @returns 201 when a seat was assigned, 202 when the user was waitlisted
     * @throws {400} Invalid body
     * @throws {409} User already reserved or waiting, or engine busy
     */
    const reserve: Handler = async (request, reply) => {
        const header = request.headers['idempotency-key'];
        const idempotencyKey = typeof header === 'string' && header !== '' ? header : undefined;
        if (idempotencyKey) {
            const existing = store.getIdempotency(idempotencyKey);
            if (existing) return reply.status(200).send(existing);
        }

        const body = ReserveSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }

        const result = locked(engine => engine.reserve(body.data.userId, body.data.priority));
        if (!result.acquired) return busy(reply);

        const outcome = result.value;
        const statusCode = outcome.kind === 'waitlisted' ? 202 : 201;
        if (idempotencyKey && (outcome.kind === 'reserved' || outcome.kind === 'waitlisted')) {
            store.setIdempotency(
                idempotencyKey,
                { ...outcome, lines: renderResult(outcome) },
                options.idempotencyTtlMs
            );
        }
        return sendOutcome(reply, outcome, statusCode);
    };

    /**
     * Cancel a user's reservation of `seatId`
     *
     * @throws {400} Invalid user id or seat id
     * @throws {404} User holds no reservation
     * @throws {409} User holds a different seat, or engine busy
     */
    const cancel: Handler = async (request, reply) => {
        const params = CancelParamsSchema.safeParse(request.params);
        const query = CancelQuerySchema.safeParse(request.query);
        if (!params.success || !query.success) {
            const detail = !params.success ? params.error.format() : query.error?.format();
            return reply.status(400).send({ error: 'invalid_input', detail });
        }
        const result = locked(engine => engine.cancel(query.data.seatId, params.data.userId));
        if (!result.acquired) return busy(reply);
        return sendOutcome(reply, result.value);
    };

    /**
     * List reservations ordered by seat
     */
    const listReservations: Handler = async (_request, reply) => {
        return sendOutcome(reply, store.engine.printReservations());
    };

    /**
     * Release every reservation and waitlist entry of users in [lo, hi]
     *
     * @throws {400} Invalid body or lo > hi
     */
    const releaseSeats: Handler = async (request, reply) => {
        const body = ReleaseSeatsSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const result = locked(engine => engine.releaseSeats(body.data.lo, body.data.hi));
        if (!result.acquired) return busy(reply);
        return sendOutcome(reply, result.value);
    };

    /**
     * @throws {404} User is not waiting
     */
    const exitWaitlist: Handler = async (request, reply) => {
        const params = WaitlistParamsSchema.safeParse(request.params);
        if (!params.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: params.error.format() });
        }
        const result = locked(engine => engine.exitWaitlist(params.data.userId));
        if (!result.acquired) return busy(reply);
        return sendOutcome(reply, result.value);
    };

    /**
     * @throws {404} User is not waiting
     */
    const updatePriority: Handler = async (request, reply) => {
        const params = WaitlistParamsSchema.safeParse(request.params);
        const body = UpdatePrioritySchema.safeParse(request.body);
        if (!params.success || !body.success) {
            const detail = !params.success ? params.error.format() : body.error?.format();
            return reply.status(400).send({ error: 'invalid_input', detail });
        }
        const result = locked(engine => engine.updatePriority(params.data.userId, body.data.priority));
        if (!result.acquired) return busy(reply);
        return sendOutcome(reply, result.value);
    };

    /**
     * Run a plain-text command script, one command per line
     *
     * Lines that do not parse are logged and skipped.
     *
     * @returns Rendered output lines and whether the script reached Quit()
     */
    const commands: Handler = async (request, reply) => {
        const body = CommandScriptSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const result = locked(engine =>
            runScript(engine, body.data.split(/\r?\n/), (line, error) => {
                request.log.warn({ line, error }, 'skipped command line');
            })
        );
        if (!result.acquired) return busy(reply);
        return reply.status(200).send(result.value);
    };

    return {
        initialize,
        available,
        addSeats,
        reserve,
        cancel,
        listReservations,
        releaseSeats,
        exitWaitlist,
        updatePriority,
        commands
    };
};
