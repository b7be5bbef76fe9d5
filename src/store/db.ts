import { addMilliseconds, isAfter } from 'date-fns';
import type * as types from '../types';
import { BookingEngine } from '../domain/booking-engine';

/**
 * Reply remembered for a reserve request carrying an Idempotency-Key
 */
export type IdempotentReply = types.Outcome & { lines: string[] };

/**
 * In-memory state for the seat booking server
 *
 * Features:
 * - One long-lived booking engine shared by every request
 * - Exclusive lock around engine operations (key-based with TTL)
 * - Idempotency key support for reserve requests with automatic expiration
 * - Automatic cleanup of expired idempotency keys
 *
 * Nothing survives a restart.
 */
export class MemoryStore {
    engine: BookingEngine;

    private _locks: Map<string, Date> = new Map();
    private _idempotency: Map<string, { reply: IdempotentReply; expiresAt: Date }> = new Map();
    private _cleanup: NodeJS.Timeout;

    /**
     * @param logger - Receives the engine's transition logs
     * @param maxSeats - Seat ceiling of the engine
     */
    constructor(private readonly logger?: types.EngineLogger, private readonly maxSeats?: number) {
        this.engine = new BookingEngine(logger, maxSeats);

        // Cleanup expired idempotency keys periodically
        this._cleanup = setInterval(() => this.purgeExpired(), 60000);
        this._cleanup.unref(); // don't hold process open
    }

    /**
     * Replace the engine with a fresh, uninitialized one and forget idempotency keys
     */
    reset() {
        this.engine = new BookingEngine(this.logger, this.maxSeats);
        this._idempotency.clear();
        this._locks.clear();
    }

    /**
     * Drop every stored idempotent reply, e.g. once the engine state they describe is gone
     */
    forgetReplies() {
        this._idempotency.clear();
    }

    /**
     * Acquire the lock guarding an engine operation
     *
     * If the lock is held and not expired, acquisition fails. Expired locks are
     * replaced so a crashed request cannot block the engine forever.
     *
     * @param key - Lock key
     * @param ttlMs - Lock time-to-live in milliseconds (default: 5000)
     * @returns true if lock acquired, false if lock is held by another request
     */
    acquireLock(key: string, ttlMs: number = 5000): boolean {
        const now = new Date();
        const existing = this._locks.get(key);
        if (existing && isAfter(existing, now)) {
            return false;
        }
        this._locks.set(key, addMilliseconds(now, ttlMs));
        return true;
    }

    releaseLock(key: string) {
        this._locks.delete(key);
    }

    /**
     * Retrieve the reply stored under an idempotency key
     *
     * @returns Stored reply if found and not expired, undefined otherwise
     */
    getIdempotency(key: string): IdempotentReply | undefined {
        const entry = this._idempotency.get(key);
        if (!entry) return undefined;

        if (!isAfter(entry.expiresAt, new Date())) {
            this._idempotency.delete(key);
            return undefined;
        }

        return entry.reply;
    }

    /**
     * Store a reply under an idempotency key
     *
     * @param ttlMs - Time-to-live in milliseconds (default: 24 hours)
     */
    setIdempotency(key: string, reply: IdempotentReply, ttlMs: number = 24 * 60 * 60 * 1000) {
        this._idempotency.set(key, {
            reply,
            expiresAt: addMilliseconds(new Date(), ttlMs)
        });
    }

    /** Stop the cleanup timer */
    close() {
        clearInterval(this._cleanup);
    }

    private purgeExpired() {
        const now = new Date();
        for (const [key, value] of this._idempotency.entries()) {
            if (!isAfter(value.expiresAt, now)) {
                this._idempotency.delete(key);
            }
        }
    }
}
