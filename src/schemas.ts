import { z } from 'zod';

/** Integer path/query parameter (automatically coerced from string) */
const IntParam = z.coerce.number().int().safe();

/** Integer body field, exact in a double */
const Int = z.number().int().safe();

/**
 * Validation schema for POST /seats/initialize request body
 */
export const InitializeSchema = z.object({
    /** Non-positive counts and counts above the seat ceiling are rejected by the engine */
    seatCount: Int
});

/**
 * Validation schema for POST /seats/add request body
 */
export const AddSeatsSchema = z.object({
    count: Int
});

/**
 * Validation schema for POST /seats/reservations request body
 */
export const ReserveSchema = z.object({
    userId: Int,
    /** Higher values are served first when seats run out */
    priority: Int
});

/**
 * Validation schema for DELETE /seats/reservations/:userId
 */
export const CancelParamsSchema = z.object({
    userId: IntParam
});

export const CancelQuerySchema = z.object({
    seatId: IntParam
});

/**
 * Validation schema for POST /seats/reservations/release request body
 *
 * Both bounds are inclusive.
 */
export const ReleaseSeatsSchema = z.object({
    lo: Int,
    hi: Int
});

/**
 * Validation schema for /seats/waitlist/:userId path parameters
 */
export const WaitlistParamsSchema = z.object({
    userId: IntParam
});

/**
 * Validation schema for PATCH /seats/waitlist/:userId request body
 */
export const UpdatePrioritySchema = z.object({
    priority: Int
});

/**
 * Validation schema for POST /seats/commands request body (a command script)
 */
export const CommandScriptSchema = z.string();

/** One integer argument of a command line, e.g. the ` 12 ` in `Reserve( 12 , 3)` */
const CommandArg = z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, 'expected an integer')
    .transform(Number)
    .refine(Number.isSafeInteger, 'integer out of range');

/**
 * Argument lists accepted by each command name of a command script
 */
export const CommandArgsSchemas = {
    Initialize: z.tuple([CommandArg]),
    Available: z.tuple([]),
    Reserve: z.tuple([CommandArg, CommandArg]),
    Cancel: z.tuple([CommandArg, CommandArg]),
    ExitWaitlist: z.tuple([CommandArg]),
    UpdatePriority: z.tuple([CommandArg, CommandArg]),
    AddSeats: z.tuple([CommandArg]),
    PrintReservations: z.tuple([]),
    ReleaseSeats: z.tuple([CommandArg, CommandArg]),
    Quit: z.tuple([])
};

export type CommandName = keyof typeof CommandArgsSchemas;
