import { IncomingMessage, Server } from 'http';
import { Duplex } from 'stream';
import { WebSocketServer } from 'ws';
import { TokenVerifier } from '../auth/token';
import { Logger } from '../utils/logger';
import { ChannelHub, GatewayChannel, isGatewayChannel } from './ChannelHub';

export const POLICY_VIOLATION_CODE = 1008;

export type ChannelRoute = { channel: GatewayChannel; token: string };

/** `/ws/{channel}/{token}` → route; anything else → null. */
export function parseChannelPath(rawUrl: string | undefined): ChannelRoute | null {
    const { pathname } = new URL(rawUrl || '/', 'http://gateway.local');
    const parts = pathname.split('/');
    if (parts.length !== 4 || parts[0] !== '' || parts[1] !== 'ws') {
        return null;
    }
    const [, , channel, encodedToken] = parts;
    if (!isGatewayChannel(channel) || !encodedToken) {
        return null;
    }
    try {
        return { channel, token: decodeURIComponent(encodedToken) };
    } catch {
        return null;
    }
}

type UpgradeDeps = {
    hub: ChannelHub;
    verifier: TokenVerifier;
    log: Logger;
};

/**
 * Routes upgrades on `/ws/{channel}/{token}` into the hub.  Unknown paths
 * get a 404 before the handshake; bad tokens complete the handshake and are
 * closed with 1008 so the browser sees the reason.
 */
export function attachChannelUpgrade(server: Server, { hub, verifier, log }: UpgradeDeps): WebSocketServer {
    const wss = new WebSocketServer({ noServer: true });

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
        const route = parseChannelPath(req.url);
        if (!route) {
            log.warn('WS_UPGRADE_UNKNOWN_PATH', { path: req.url || null });
            socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
            socket.destroy();
            return;
        }

        wss.handleUpgrade(req, socket, head, (ws) => {
            const remoteAddress = req.socket.remoteAddress || null;
            const check = verifier.verify(route.token);
            if (!check.ok) {
                log.warn('WS_AUTH_REJECTED', { channel: route.channel, reason: check.reason, remoteAddress });
                ws.close(POLICY_VIOLATION_CODE, check.closeReason);
                return;
            }
            hub.registerClient(route.channel, ws, { subject: check.subject, remoteAddress });
        });
    });

    return wss;
}
