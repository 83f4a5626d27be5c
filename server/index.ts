/**
 * Realtime gateway for the stock dashboard.
 *
 * Serves the three dashboard channels (prices, trading, notifications) over
 * WebSocket, plus a liveness endpoint and bearer-guarded publish endpoints
 * that backend jobs use to push updates.
 */

import 'dotenv/config';

import { createServer } from 'http';
import { createGatewayApp } from './app';
import { createTokenVerifier } from './auth/token';
import { loadGatewayConfig } from './config';
import { PriceBook } from './prices/PriceBook';
import { logger, serializeError } from './utils/logger';
import { ChannelHub } from './ws/ChannelHub';
import { attachChannelUpgrade } from './ws/upgrade';

const config = loadGatewayConfig();
const startedAt = Date.now();

const hub = new ChannelHub({
    priceBook: new PriceBook(),
    log: logger.child({ component: 'channel_hub' }),
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    staleConnectionMs: config.staleConnectionMs,
    maxWatchedSymbols: config.maxWatchedSymbols,
});

const app = createGatewayApp({ config, hub, startedAt });
const server = createServer(app);
const wss = attachChannelUpgrade(server, {
    hub,
    verifier: createTokenVerifier(config.sessionTokenSecret),
    log: logger.child({ component: 'ws_upgrade' }),
});

server.listen(config.port, config.host, () => {
    logger.info('SERVER_UP', { port: config.port, host: config.host });
});

server.on('error', (error) => {
    logger.error('SERVER_ERROR', { error: serializeError(error) });
    process.exitCode = 1;
});

function shutdown(signal: string): void {
    logger.info('SERVER_SHUTDOWN', { signal });
    hub.shutdown();
    wss.close();
    server.close(() => {
        process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
