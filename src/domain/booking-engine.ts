import type * as types from '../types';
import { ReservationIndex } from './reservation-index';
import { SeatPool } from './seat-pool';
import { WaitlistQueue } from './waitlist-queue';

const silentLogger: types.EngineLogger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined
};

/** Seat ceiling used when the caller does not configure one */
export const DEFAULT_MAX_SEATS = 1_000_000;

/**
 * Seat booking engine
 *
 * Owns the reservation index, the waitlist and the free seat pool, and moves
 * seats and users between them. Every operation runs to completion synchronously
 * and returns an `Outcome`; rejected operations leave the state untouched.
 *
 * Between operations:
 * - every seat in [1, totalSeats] is either reserved by exactly one user or free
 * - no user is both reserved and waiting
 *
 * The venue never grows past `maxSeats`; requests that would are rejected
 * as `invalid_input` before any seat is opened.
 *
 * Seats handed out in bulk (addSeats, releaseSeats) go to waiting users in
 * waitlist order, the lowest seat to the highest-priority user.
 */
export class BookingEngine {
    private reservations = new ReservationIndex();
    private waitlist = new WaitlistQueue();
    private seats = new SeatPool();
    private totalSeats = 0;

    constructor(
        private readonly logger: types.EngineLogger = silentLogger,
        private readonly maxSeats: number = DEFAULT_MAX_SEATS
    ) {}

    /**
     * Reset every structure and open seats 1..seatCount
     */
    initialize(seatCount: number): types.Outcome {
        if (seatCount <= 0 || seatCount > this.maxSeats) {
            return this.reject({ kind: 'invalid_input', reason: 'seat_count' });
        }

        this.reservations = new ReservationIndex();
        this.waitlist = new WaitlistQueue();
        this.seats = new SeatPool();
        this.totalSeats = seatCount;
        for (let seatId = 1; seatId <= seatCount; seatId++) {
            this.seats.insert(seatId);
        }

        this.logger.debug({ seatCount }, 'engine initialized');
        return { kind: 'initialized', seatCount };
    }

    available(): types.Outcome {
        return {
            kind: 'availability',
            availableSeats: this.seats.size(),
            waitlistLength: this.waitlist.size()
        };
    }

    /**
     * Give the user the lowest free seat, or queue them when none is free
     */
    reserve(userId: number, priority: number): types.Outcome {
        if (this.reservations.has(userId)) {
            return this.reject({ kind: 'already_holding', userId, holding: 'reservation' });
        }
        if (this.waitlist.has(userId)) {
            return this.reject({ kind: 'already_holding', userId, holding: 'waitlist' });
        }

        const seatId = this.seats.extractMin();
        if (seatId === null) {
            this.waitlist.insert(userId, priority);
            this.logger.debug({ userId, priority }, 'user waitlisted');
            return { kind: 'waitlisted', userId, priority };
        }

        this.reservations.insert(userId, seatId);
        this.logger.debug({ userId, seatId }, 'seat reserved');
        return { kind: 'reserved', userId, seatId };
    }

    /**
     * Cancel a reservation and pass the seat to the next waiting user, if any
     *
     * The user must hold exactly `seatId`.
     */
    cancel(seatId: number, userId: number): types.Outcome {
        const heldSeat = this.reservations.search(userId);
        if (heldSeat === null) {
            return this.reject({ kind: 'not_found', operation: 'cancel', userId });
        }
        if (heldSeat !== seatId) {
            return this.reject({ kind: 'mismatch', userId, seatId, actualSeatId: heldSeat });
        }

        this.reservations.delete(userId);
        const next = this.waitlist.extractTop();
        if (next === null) {
            this.seats.insert(seatId);
            this.logger.debug({ userId, seatId }, 'reservation cancelled, seat freed');
            return { kind: 'cancelled', userId, seatId, reassigned: null };
        }

        this.reservations.insert(next.userId, seatId);
        this.logger.debug({ userId, seatId, reassignedTo: next.userId }, 'reservation cancelled, seat reassigned');
        return { kind: 'cancelled', userId, seatId, reassigned: { userId: next.userId, seatId } };
    }

    /**
     * Grow the venue by `count` seats numbered after the current last seat
     *
     * Up to `count` waiting users are seated right away; the remaining new seats
     * become free.
     */
    addSeats(count: number): types.Outcome {
        if (count <= 0 || count > this.maxSeats - this.totalSeats) {
            return this.reject({ kind: 'invalid_input', reason: 'seat_count' });
        }

        const firstSeat = this.totalSeats + 1;
        this.totalSeats += count;

        const assignments: types.SeatAssignment[] = [];
        let seatId = firstSeat;
        while (seatId <= this.totalSeats) {
            const next = this.waitlist.extractTop();
            if (next === null) break;
            this.reservations.insert(next.userId, seatId);
            assignments.push({ userId: next.userId, seatId });
            seatId++;
        }
        for (; seatId <= this.totalSeats; seatId++) {
            this.seats.insert(seatId);
        }

        this.logger.debug({ count, totalSeats: this.totalSeats, seated: assignments.length }, 'seats added');
        return { kind: 'seats_added', count, assignments };
    }

    exitWaitlist(userId: number): types.Outcome {
        if (!this.waitlist.remove(userId)) {
            return this.reject({ kind: 'not_found', operation: 'exit_waitlist', userId });
        }
        this.logger.debug({ userId }, 'user left the waitlist');
        return { kind: 'waitlist_exited', userId };
    }

    updatePriority(userId: number, priority: number): types.Outcome {
        if (!this.waitlist.updatePriority(userId, priority)) {
            return this.reject({ kind: 'not_found', operation: 'update_priority', userId });
        }
        this.logger.debug({ userId, priority }, 'waitlist priority updated');
        return { kind: 'priority_updated', userId, priority };
    }

    /**
     * Drop every reservation and waitlist entry of users in [lo, hi]
     *
     * Freed seats are sorted ascending and paired one by one with the current
     * top of the waitlist (which may include users outside the range) until
     * either side runs out. Seats left over return to the pool.
     */
    releaseSeats(lo: number, hi: number): types.Outcome {
        if (lo > hi) return this.reject({ kind: 'invalid_input', reason: 'user_range' });

        const released = this.reservations.entriesInRange(lo, hi);
        for (const { userId } of released) {
            this.reservations.delete(userId);
        }

        const dequeuedUsers = this.waitlist
            .toArray()
            .map(entry => entry.userId)
            .filter(userId => userId >= lo && userId <= hi)
            .sort((a, b) => a - b);
        for (const userId of dequeuedUsers) {
            this.waitlist.remove(userId);
        }

        if (released.length === 0 && dequeuedUsers.length === 0) {
            return this.reject({ kind: 'nothing_released', lo, hi });
        }

        const releasedSeats = released.map(r => r.seatId).sort((a, b) => a - b);
        const assignments: types.SeatAssignment[] = [];
        let i = 0;
        for (; i < releasedSeats.length; i++) {
            const next = this.waitlist.extractTop();
            if (next === null) break;
            this.reservations.insert(next.userId, releasedSeats[i]);
            assignments.push({ userId: next.userId, seatId: releasedSeats[i] });
        }
        for (; i < releasedSeats.length; i++) {
            this.seats.insert(releasedSeats[i]);
        }

        this.logger.debug(
            { lo, hi, releasedSeats, dequeuedUsers, reassigned: assignments.length },
            'range released'
        );
        return { kind: 'seats_released', lo, hi, releasedSeats, dequeuedUsers, assignments };
    }

    /**
     * Current reservations, ascending by seat
     */
    printReservations(): types.Outcome {
        const items = this.reservations.entries().sort((a, b) => a.seatId - b.seatId);
        return { kind: 'reservations', items };
    }

    snapshot(): types.EngineSnapshot {
        return {
            totalSeats: this.totalSeats,
            reservations: this.reservations.entries(),
            waitlist: this.waitlist.toArray(),
            freeSeats: this.seats.toArray()
        };
    }

    /** Diagnostic hook for tests: red-black rules of the reservation index */
    isIndexBalanced(): boolean {
        return this.reservations.isBalanced();
    }

    private reject<T extends types.Outcome>(outcome: T): T {
        this.logger.info({ outcome }, 'operation rejected');
        return outcome;
    }
}
