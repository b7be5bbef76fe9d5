/**
 * Seat booking server entry point
 *
 * Reads configuration from the environment and starts listening.
 */

import { buildApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const { app } = buildApp({ config });

app.listen({ port: config.port, host: config.host }).catch((err: unknown) => {
    app.log.error(err, 'server failed to start');
    process.exit(1);
});
