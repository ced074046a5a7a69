import { createServer, type Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { handleHealth } from './handlers/health.js';
import {
    handleHistoryClear,
    handleQueueClear,
    handleQueueMode,
    handleQueueStart,
    handleQueueStatus,
    handleQueueStop,
    handleSubmitItem,
    type QueueEngine,
} from './handlers/queue.js';
import { mapError, requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';
import { logThought } from '../utils/logger.js';

/** Body-parser failures carry a 4xx `status`; everything else goes through mapError. */
const handleUncaughtError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500) {
        sendError(res, 'Malformed request body.', err.status);
        return;
    }
    const { status, message } = mapError(err);
    console.error('[API] Unhandled error:', message);
    sendError(res, message, status);
};

export interface ApiServerDeps {
    engine: QueueEngine;
    /** HMAC secret for mutating routes; empty disables signing. */
    apiSecret: string;
}

/**
 * Build the control-plane express app.
 *
 * Endpoints:
 *   GET  /health               Process, dispatcher and persistence summary
 *   GET  /queue/status         Queue snapshot
 *   POST /queue/items          Submit a downloaded payload (signed)
 *   POST /queue/clear          Remove queued items (signed)
 *   POST /queue/history/clear  Remove finished items from history (signed)
 *   POST /queue/start          Start dispatching (signed)
 *   POST /queue/stop           Stop dispatching (signed)
 *   POST /queue/mode           Switch immediate/queued mode (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const signed = requireSignature(deps.apiSecret);
    const queueDeps = { engine: deps.engine };

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(queueDeps));
    app.get('/queue/status', handleQueueStatus(queueDeps));

    app.post('/queue/items', signed, handleSubmitItem(queueDeps));
    app.post('/queue/clear', signed, handleQueueClear(queueDeps));
    app.post('/queue/history/clear', signed, handleHistoryClear(queueDeps));
    app.post('/queue/start', signed, handleQueueStart(queueDeps));
    app.post('/queue/stop', signed, handleQueueStop(queueDeps));
    app.post('/queue/mode', signed, handleQueueMode(queueDeps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });
    app.use(handleUncaughtError);

    return app;
}

/** Create the app and listen on `port`. Resolves once the server is accepting connections. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            console.log(`[API] Control plane listening on http://localhost:${port}`);
            void logThought(`[API] HTTP server started on port ${port}.`);
            resolve(server);
        });
    });
}
