import { z } from 'zod';

const BooleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

/**
 * Environment variables understood by the server
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('127.0.0.1'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Pretty-print logs through pino-pretty instead of emitting JSON lines */
    LOG_PRETTY: BooleanFlag.default('true'),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW: z.string().default('1 minute'),
    IDEMPOTENCY_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
    LOCK_TTL_MS: z.coerce.number().int().positive().default(5000),
    /** Ceiling on the total number of seats the engine will open */
    MAX_SEATS: z.coerce.number().int().positive().safe().default(1_000_000),
    /** When set, the engine is initialized with this many seats on boot */
    INITIAL_SEATS: z.coerce.number().int().positive().optional()
});

export interface AppConfig {
    port: number;
    host: string;
    logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    logPretty: boolean;
    rateLimit: { max: number; timeWindow: string };
    idempotencyTtlMs: number;
    lockTtlMs: number;
    maxSeats: number;
    initialSeats?: number;
}

/**
 * Read the server configuration from environment variables
 *
 * @throws {z.ZodError} when a variable is present but malformed
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = EnvSchema.parse(env);
    return {
        port: parsed.PORT,
        host: parsed.HOST,
        logLevel: parsed.LOG_LEVEL,
        logPretty: parsed.LOG_PRETTY,
        rateLimit: { max: parsed.RATE_LIMIT_MAX, timeWindow: parsed.RATE_LIMIT_WINDOW },
        idempotencyTtlMs: parsed.IDEMPOTENCY_TTL_MS,
        lockTtlMs: parsed.LOCK_TTL_MS,
        maxSeats: parsed.MAX_SEATS,
        initialSeats: parsed.INITIAL_SEATS
    };
};

/**
 * pino-pretty transport shared by the server and the CLI
 */
export const prettyTransport = {
    target: 'pino-pretty',
    options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:dd-mm-yyyy HH:MM:ss'
    }
};
