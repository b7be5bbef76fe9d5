/**
 * A user holding a seat
 *
 * Used both for entries of the reservation index and for the seat assignments
 * reported by operations that hand seats to waiting users.
 */
export interface SeatAssignment {
    userId: number;
    seatId: number;
}

/**
 * Pending request for a seat
 *
 * Served by priority (higher first), then by sequence (earlier first).
 */
export interface WaitlistEntry {
    userId: number;
    priority: number;
    /** Monotonic insertion counter, only used to break priority ties */
    sequence: number;
}

/**
 * Minimal logger surface the engine writes to
 *
 * Satisfied by pino loggers and by Fastify's `app.log`.
 */
export interface EngineLogger {
    debug(obj: object, msg?: string): void;
    info(obj: object, msg?: string): void;
    warn(obj: object, msg?: string): void;
}

export type NotFoundOperation = 'cancel' | 'exit_waitlist' | 'update_priority';

/**
 * Result of a booking engine operation, discriminated on `kind`
 *
 * Rejections (`invalid_input`, `not_found`, `mismatch`, `already_holding`) leave
 * the engine state unchanged.
 */
export type Outcome =
    | { kind: 'initialized'; seatCount: number }
    | { kind: 'availability'; availableSeats: number; waitlistLength: number }
    | { kind: 'reserved'; userId: number; seatId: number }
    | { kind: 'waitlisted'; userId: number; priority: number }
    | { kind: 'cancelled'; userId: number; seatId: number; reassigned: SeatAssignment | null }
    | { kind: 'seats_added'; count: number; assignments: SeatAssignment[] }
    | { kind: 'waitlist_exited'; userId: number }
    | { kind: 'priority_updated'; userId: number; priority: number }
    | {
        kind: 'seats_released';
        lo: number;
        hi: number;
        /** Seats taken back from users in the range, ascending */
        releasedSeats: number[];
        /** Users in the range removed from the waitlist */
        dequeuedUsers: number[];
        /** Released seats handed to waiting users, ascending by seat */
        assignments: SeatAssignment[];
    }
    | { kind: 'nothing_released'; lo: number; hi: number }
    | { kind: 'reservations'; items: SeatAssignment[] }
    | { kind: 'invalid_input'; reason: 'seat_count' | 'user_range' }
    | { kind: 'not_found'; operation: NotFoundOperation; userId: number }
    | { kind: 'mismatch'; userId: number; seatId: number; actualSeatId: number }
    | { kind: 'already_holding'; userId: number; holding: 'reservation' | 'waitlist' };

export type OutcomeKind = Outcome['kind'];

/**
 * Point-in-time copy of the engine state
 *
 * `freeSeats` and `waitlist` are in heap layout order, so two snapshots compare
 * equal only when the underlying structures are laid out identically.
 */
export interface EngineSnapshot {
    totalSeats: number;
    reservations: SeatAssignment[];
    waitlist: WaitlistEntry[];
    freeSeats: number[];
}

/**
 * One parsed line of a command script
 */
export type Command =
    | { name: 'initialize'; seatCount: number }
    | { name: 'available' }
    | { name: 'reserve'; userId: number; priority: number }
    | { name: 'cancel'; seatId: number; userId: number }
    | { name: 'exitWaitlist'; userId: number }
    | { name: 'updatePriority'; userId: number; priority: number }
    | { name: 'addSeats'; count: number }
    | { name: 'printReservations' }
    | { name: 'releaseSeats'; lo: number; hi: number }
    | { name: 'quit' };
