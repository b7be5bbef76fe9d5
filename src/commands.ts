import { extname } from 'node:path';
import type * as types from './types';
import type { BookingEngine } from './domain/booking-engine';
import { CommandArgsSchemas, type CommandName } from './schemas';

export type ParseResult =
    | { success: true; command: types.Command }
    | { success: false; error: string };

export type CommandResult = types.Outcome | { kind: 'terminated' };

const LINE_PATTERN = /^([A-Za-z]+)\s*\((.*)\)$/;

const isCommandName = (name: string): name is CommandName => Object.hasOwn(CommandArgsSchemas, name);

/**
 * Parse one line of a command script, e.g. `Reserve(4, 2)`
 *
 * Arguments are comma-separated integers; surrounding whitespace is ignored.
 * Never throws: failures come back as `{ success: false, error }`.
 */
export const parseCommand = (line: string): ParseResult => {
    const match = LINE_PATTERN.exec(line.trim());
    if (!match) return { success: false, error: `Unrecognized command line: ${line}` };

    const [, name, rawArgs] = match;
    if (!isCommandName(name)) return { success: false, error: `Unknown command: ${name}` };

    const args = rawArgs.trim() === '' ? [] : rawArgs.split(',');
    const parsed = CommandArgsSchemas[name].safeParse(args);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return { success: false, error: `Invalid arguments for ${name}: ${issue?.message ?? 'malformed'}` };
    }

    // Arity was checked by the tuple schema.
    const values: number[] = parsed.data;
    const [first = 0, second = 0] = values;
    switch (name) {
        case 'Initialize': return { success: true, command: { name: 'initialize', seatCount: first } };
        case 'Available': return { success: true, command: { name: 'available' } };
        case 'Reserve': return { success: true, command: { name: 'reserve', userId: first, priority: second } };
        case 'Cancel': return { success: true, command: { name: 'cancel', seatId: first, userId: second } };
        case 'ExitWaitlist': return { success: true, command: { name: 'exitWaitlist', userId: first } };
        case 'UpdatePriority': return { success: true, command: { name: 'updatePriority', userId: first, priority: second } };
        case 'AddSeats': return { success: true, command: { name: 'addSeats', count: first } };
        case 'PrintReservations': return { success: true, command: { name: 'printReservations' } };
        case 'ReleaseSeats': return { success: true, command: { name: 'releaseSeats', lo: first, hi: second } };
        case 'Quit': return { success: true, command: { name: 'quit' } };
    }
};

/**
 * Apply a parsed command to the engine
 */
export const executeCommand = (engine: BookingEngine, command: types.Command): CommandResult => {
    switch (command.name) {
        case 'initialize': return engine.initialize(command.seatCount);
        case 'available': return engine.available();
        case 'reserve': return engine.reserve(command.userId, command.priority);
        case 'cancel': return engine.cancel(command.seatId, command.userId);
        case 'exitWaitlist': return engine.exitWaitlist(command.userId);
        case 'updatePriority': return engine.updatePriority(command.userId, command.priority);
        case 'addSeats': return engine.addSeats(command.count);
        case 'printReservations': return engine.printReservations();
        case 'releaseSeats': return engine.releaseSeats(command.lo, command.hi);
        case 'quit': return { kind: 'terminated' };
    }
};

const reservedLine = ({ userId, seatId }: types.SeatAssignment) => `User ${userId} reserved seat ${seatId}`;

const notFoundLine = (operation: types.NotFoundOperation, userId: number): string => {
    switch (operation) {
        case 'cancel': return `User ${userId} has no reservation to cancel`;
        case 'exit_waitlist': return `User ${userId} is not in waitlist`;
        case 'update_priority': return `User ${userId} priority is not updated`;
    }
};

/**
 * Render a command result as output lines
 */
export const renderResult = (result: CommandResult): string[] => {
    switch (result.kind) {
        case 'initialized':
            return [`${result.seatCount} Seats are made available for reservation`];
        case 'availability':
            return [`Total Seats Available : ${result.availableSeats}, Waitlist : ${result.waitlistLength}`];
        case 'reserved':
            return [reservedLine(result)];
        case 'waitlisted':
            return [`User ${result.userId} is added to the waiting list`];
        case 'cancelled': {
            const lines = [`User ${result.userId} canceled their reservation`];
            if (result.reassigned) lines.push(reservedLine(result.reassigned));
            return lines;
        }
        case 'seats_added':
            return [
                `Additional ${result.count} Seats are made available for reservation`,
                ...result.assignments.map(reservedLine)
            ];
        case 'waitlist_exited':
            return [`User ${result.userId} is removed from the waiting list`];
        case 'priority_updated':
            return [`User ${result.userId} priority has been updated to ${result.priority}`];
        case 'seats_released':
            return [
                `Reservations of the Users in the range [${result.lo}, ${result.hi}] are released`,
                ...result.assignments.map(reservedLine)
            ];
        case 'nothing_released':
            return [`Reservations/waitlist of the users in the range [${result.lo}, ${result.hi}] have been released`];
        case 'reservations':
            return result.items.map(({ seatId, userId }) => `Seat ${seatId}, User ${userId}`);
        case 'invalid_input':
            return result.reason === 'seat_count'
                ? ['Invalid input. Please provide a valid number of seats.']
                : ['Invalid input. Please provide a valid range of users.'];
        case 'not_found':
            return [notFoundLine(result.operation, result.userId)];
        case 'mismatch':
            return [`User ${result.userId} has no reservation for seat ${result.seatId} to cancel`];
        case 'already_holding':
            return result.holding === 'reservation'
                ? [`User ${result.userId} already has a reservation`]
                : [`User ${result.userId} is already in the waiting list`];
        case 'terminated':
            return ['Program Terminated!!'];
    }
};

/**
 * Run a command script line by line against the engine
 *
 * Blank lines are skipped. Lines that fail to parse are reported through
 * `onParseError` and produce no output. Processing stops after `Quit()`.
 *
 * @returns Rendered output lines and whether `Quit()` was reached
 */
export const runScript = (
    engine: BookingEngine,
    lines: Iterable<string>,
    onParseError: (line: string, error: string) => void = () => undefined
): { lines: string[]; terminated: boolean } => {
    const output: string[] = [];

    for (const line of lines) {
        if (line.trim() === '') continue;

        const parsed = parseCommand(line);
        if (!parsed.success) {
            onParseError(line, parsed.error);
            continue;
        }

        const result = executeCommand(engine, parsed.command);
        output.push(...renderResult(result));
        if (result.kind === 'terminated') return { lines: output, terminated: true };
    }

    return { lines: output, terminated: false };
};

/**
 * Output path for a command file: `shows/day1.txt` → `shows/day1_output_file.txt`
 */
export const outputPathFor = (inputPath: string): string => {
    const extension = extname(inputPath);
    const base = extension === '' ? inputPath : inputPath.slice(0, -extension.length);
    return `${base}_output_file.txt`;
};

export const CLI_USAGE = 'Usage: seat-engine <input_file>';

export type CliArgs =
    | { success: true; inputPath: string; outputPath: string }
    | { success: false; usage: string; exitCode: number };

/**
 * Check the runner's arguments: exactly one input file
 */
export const parseCliArgs = (args: string[]): CliArgs => {
    if (args.length !== 1) return { success: false, usage: CLI_USAGE, exitCode: 1 };
    const [inputPath] = args;
    return { success: true, inputPath, outputPath: outputPathFor(inputPath) };
};
