import cors, { CorsOptions } from 'cors';
import express, { Express, Request, Response } from 'express';
import { createApiKeyMiddleware } from './auth/apiKey';
import { GatewayConfig } from './config';
import { QuoteInput } from './prices/PriceBook';
import { ChannelHub, GatewayChannel, isGatewayChannel } from './ws/ChannelHub';
import { requestLogger } from './utils/logger';

export type PayloadResult =
    | { ok: true; payload: Record<string, unknown> }
    | { ok: false; error: string };

const NOTIFICATION_TYPES = new Set(['info', 'success', 'warning', 'error']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
    return typeof value === 'string' && value.trim() ? value.trim() : null;
}

/** Request body of `POST /api/realtime/:channel` → the frame broadcast on that channel. */
export function buildChannelPayload(channel: GatewayChannel, body: unknown, timestamp: string): PayloadResult {
    if (!isRecord(body)) {
        return { ok: false, error: 'body_must_be_object' };
    }

    if (channel === 'trading') {
        const updateType = nonEmptyString(body.update_type);
        if (!updateType) {
            return { ok: false, error: 'update_type_required' };
        }
        return {
            ok: true,
            payload: {
                type: 'trading_update',
                update_type: updateType,
                data: isRecord(body.data) ? body.data : {},
                timestamp,
            },
        };
    }

    if (channel === 'notifications') {
        const message = nonEmptyString(body.message);
        if (!message) {
            return { ok: false, error: 'message_required' };
        }
        const kind = nonEmptyString(body.notification_type);
        return {
            ok: true,
            payload: {
                type: 'notification',
                message,
                notification_type: kind && NOTIFICATION_TYPES.has(kind) ? kind : 'info',
                data: isRecord(body.data) ? body.data : null,
                timestamp,
            },
        };
    }

    return { ok: false, error: 'prices_use_quote_endpoint' };
}

/** `{ quotes: [{ symbol, price, prevClose?, volume? }] }` → quote inputs, or null when malformed. */
export function parseQuoteInputs(body: unknown): QuoteInput[] | null {
    if (!isRecord(body) || !Array.isArray(body.quotes) || body.quotes.length === 0) {
        return null;
    }

    const inputs: QuoteInput[] = [];
    for (const raw of body.quotes) {
        if (!isRecord(raw)) {
            return null;
        }
        const symbol = nonEmptyString(raw.symbol);
        const price = raw.price;
        if (!symbol || typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
            return null;
        }
        const input: QuoteInput = { symbol, price };
        if (typeof raw.prevClose === 'number' && Number.isFinite(raw.prevClose)) {
            input.prevClose = raw.prevClose;
        }
        if (typeof raw.volume === 'number' && Number.isFinite(raw.volume)) {
            input.volume = raw.volume;
        }
        inputs.push(input);
    }
    return inputs;
}

export function createCorsOptions(config: GatewayConfig): CorsOptions {
    return {
        origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
            // Allow requests with no origin (curl, server-to-server publishers)
            if (!origin || config.allowedOrigins.includes(origin) || !config.production) {
                callback(null, true);
                return;
            }
            callback(new Error('Not allowed by CORS'));
        },
        credentials: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    };
}

type AppDeps = {
    config: GatewayConfig;
    hub: ChannelHub;
    startedAt: number;
};

export function createGatewayApp({ config, hub, startedAt }: AppDeps): Express {
    const app = express();
    app.use(express.json());
    app.use(requestLogger);
    app.use(cors(createCorsOptions(config)));

    const requireApiKey = createApiKeyMiddleware(config.apiKeySecret);

    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            ts: new Date().toISOString(),
            uptime: Math.floor((Date.now() - startedAt) / 1000),
            clients: {
                prices: hub.getClientCount('prices'),
                trading: hub.getClientCount('trading'),
                notifications: hub.getClientCount('notifications'),
            },
            watchedSymbols: hub.getRequiredSymbols().length,
        });
    });

    app.post('/api/realtime/:channel', requireApiKey, (req: Request, res: Response) => {
        const channel = req.params.channel;
        if (!isGatewayChannel(channel)) {
            res.status(404).json({ ok: false, error: 'unknown_channel' });
            return;
        }
        const result = buildChannelPayload(channel, req.body, new Date().toISOString());
        if (!result.ok) {
            res.status(400).json({ ok: false, error: result.error });
            return;
        }
        res.json({ ok: true, delivered: hub.broadcast(channel, result.payload) });
    });

    app.post('/api/prices', requireApiKey, (req: Request, res: Response) => {
        const inputs = parseQuoteInputs(req.body);
        if (!inputs) {
            res.status(400).json({ ok: false, error: 'invalid_quotes' });
            return;
        }
        res.json({ ok: true, accepted: inputs.length, delivered: hub.publishPrices(inputs) });
    });

    return app;
}
