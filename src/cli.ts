#!/usr/bin/env tsx
/**
 * Command file runner
 *
 * Usage: seat-engine <input_file>
 *
 * Executes one command per line (e.g. `Initialize(5)`, `Reserve(1, 2)`) and
 * writes the result lines next to the input as `<name>_output_file.txt`.
 */

import { readFile, writeFile } from 'node:fs/promises';
import pino from 'pino';
import { BookingEngine } from './domain/booking-engine';
import { parseCliArgs, runScript } from './commands';
import { loadConfig, prettyTransport } from './config';

const main = async (args: string[]): Promise<number> => {
    const logger = pino({ level: process.env.LOG_LEVEL ?? 'info', transport: prettyTransport });

    const cliArgs = parseCliArgs(args);
    if (!cliArgs.success) {
        logger.error(cliArgs.usage);
        return cliArgs.exitCode;
    }

    const { inputPath, outputPath } = cliArgs;

    try {
        const { maxSeats } = loadConfig();
        const script = await readFile(inputPath, 'utf8');
        const engine = new BookingEngine(logger, maxSeats);
        const result = runScript(engine, script.split(/\r?\n/), (line, error) => {
            logger.warn({ line, error }, 'Error processing command');
        });

        await writeFile(outputPath, result.lines.map(line => `${line}\n`).join(''));
        logger.info({ outputPath, lines: result.lines.length, terminated: result.terminated }, 'output written');
        return 0;
    } catch (err) {
        logger.error({ err, inputPath }, 'command file could not be processed');
        return 1;
    }
};

main(process.argv.slice(2)).then(
    code => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    }
);
