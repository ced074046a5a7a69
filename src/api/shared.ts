import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { ConfigValidationError, EnqueueRejectedError, PersistenceFailureError } from '../types/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

/** `express.json({ verify })` hook that keeps the exact bytes for signature checks. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    Object.assign(req, { rawBody: buffer.toString('utf8') });
}

function readRawBody(req: Request): string {
    return 'rawBody' in req && typeof req.rawBody === 'string' ? req.rawBody : '';
}

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Build a middleware validating the `X-Signature` header of mutating requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(raw body, secret)>`.
 * With an empty secret the API is unsigned and every request passes.
 */
export function requireSignature(secret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!secret) {
            next();
            return;
        }

        const signatureHeader = req.headers['x-signature'];
        if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
            void logThought('[API] Signed request rejected: missing or malformed X-Signature header.');
            sendError(res, 'Missing or malformed X-Signature header.', 401);
            return;
        }

        const providedHex = signatureHeader.slice('sha256='.length);
        if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
            void logThought('[API] Signed request rejected: malformed signature digest.');
            sendError(res, 'Malformed signature digest.', 401);
            return;
        }

        const provided = Buffer.from(providedHex, 'hex');
        const expected = createHmac('sha256', secret).update(readRawBody(req)).digest();
        if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
            void logThought('[API] Signed request rejected: signature mismatch.');
            sendError(res, 'Invalid signature.', 403);
            return;
        }

        next();
    };
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof EnqueueRejectedError) {
        return {
            status: err.reason === 'capacity_exceeded' ? 429 : 503,
            message: scrubSensitiveText(err.message),
        };
    }
    if (err instanceof PersistenceFailureError) {
        return { status: 503, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof ConfigValidationError) {
        return { status: 400, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
