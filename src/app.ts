/**
 * Seat booking HTTP server
 *
 * Builds the Fastify application: rate limiting, logging and the routes under
 * /seats. Listening is left to the caller so tests can drive the app through
 * `inject` without opening a socket.
 */

import fastify, { type FastifyServerOptions } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { bookingHandlers } from './routes';
import { MemoryStore } from './store/db';
import { prettyTransport, type AppConfig } from './config';

export interface BuildAppOptions {
    config: AppConfig;
    /** Use an existing store instead of creating one wired to the app logger */
    store?: MemoryStore;
    /** Overrides the logger settings derived from config (tests pass false) */
    logger?: FastifyServerOptions['logger'];
}

export const buildApp = ({ config, store: providedStore, logger }: BuildAppOptions) => {
    const app = fastify({
        logger: logger ?? {
            level: config.logLevel,
            ...(config.logPretty ? { transport: prettyTransport } : {})
        }
    });

    const store = providedStore ?? new MemoryStore(app.log, config.maxSeats);
    if (config.initialSeats !== undefined) {
        store.engine.initialize(config.initialSeats);
    }

    app.register(rateLimit, {
        max: config.rateLimit.max,
        timeWindow: config.rateLimit.timeWindow
    });

    const handlers = bookingHandlers(store, {
        lockTtlMs: config.lockTtlMs,
        idempotencyTtlMs: config.idempotencyTtlMs
    });

    app.register(function (app, _, done) {
        app.post('/initialize', handlers.initialize);
        app.get('/available', handlers.available);
        app.post('/add', handlers.addSeats);
        app.post('/reservations', handlers.reserve);
        app.get('/reservations', handlers.listReservations);
        app.delete('/reservations/:userId', handlers.cancel);
        app.post('/reservations/release', handlers.releaseSeats);
        app.delete('/waitlist/:userId', handlers.exitWaitlist);
        app.patch('/waitlist/:userId', handlers.updatePriority);
        app.post('/commands', handlers.commands);

        done();
    }, { prefix: '/seats' });

    app.addHook('onClose', (_instance, done) => {
        store.close();
        done();
    });

    return { app, store };
};
