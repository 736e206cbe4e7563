import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { config } from '../config';
import { getDatabase } from '../db';
import {
    ExpiredError,
    InvalidTransitionError,
    NotFoundError,
    ValidationError,
    WorkflowError,
    errorMessage,
} from '../core/errors';
import { WorkflowOrchestrator } from '../core/orchestrator';
import { getCompanyFilterValues } from '../core/repositories';
import { MessageBroker } from '../messaging/broker';
import { logError, logInfo } from '../telemetry/logger';
import { resolveCorrelationId, runWithCorrelationId } from '../telemetry/correlation';
import { getLiveEventSubscribersCount, subscribeLiveEvents, type LiveEventMessage } from '../telemetry/liveEvents';

export interface ApiDeps {
    orchestrator: WorkflowOrchestrator;
    broker: MessageBroker;
    activeTasks: () => number;
    /** Requests per minute per IP; defaults to 120. */
    rateLimitPerMinute?: number;
}

const STATUS_BY_ERROR: ReadonlyArray<[new (...args: never[]) => WorkflowError, number]> = [
    [ValidationError, 400],
    [NotFoundError, 404],
    [ExpiredError, 410],
    [InvalidTransitionError, 409],
];

export function handleApiError(res: Response, err: unknown, context: string): void {
    if (err instanceof WorkflowError) {
        const match = STATUS_BY_ERROR.find(([type]) => err instanceof type);
        if (match) {
            const body: Record<string, unknown> = { error: err.kind, reason: err.message };
            if (err instanceof ValidationError) {
                body.issues = err.issues;
            }
            res.status(match[1]).json(body);
            return;
        }
    }
    // internal details stay in the logs
    void logError(context, { error: errorMessage(err) });
    res.status(500).json({ error: 'InternalError', reason: 'internal server error' });
}

function writeSseEvent(res: Response, eventType: string, data: unknown): void {
    res.write(`event: ${eventType}\n`);
    res.write(`data: ${JSON.stringify(data)}\n\n`);
}

async function isDatabaseReachable(): Promise<boolean> {
    try {
        const db = await getDatabase();
        await db.get('SELECT 1 AS ok');
        return true;
    } catch (error) {
        await logError('api.health.database_unreachable', { error: errorMessage(error) });
        return false;
    }
}

export function createApp(deps: ApiDeps): Express {
    const app = express();
    app.set('trust proxy', false);

    app.use(cors({
        origin: (origin, callback) => {
            if (!origin) return callback(null, true);
            const allowedOrigins = [
                'http://localhost',
                `http://localhost:${config.port}`,
                'http://127.0.0.1',
                `http://127.0.0.1:${config.port}`,
            ];
            return callback(null, allowedOrigins.includes(origin));
        },
        methods: ['GET', 'POST'],
        allowedHeaders: ['Content-Type', 'x-correlation-id'],
        credentials: false,
    }));

    app.use(express.json({ limit: '256kb' }));

    app.use((req, res, next) => {
        const incomingCorrelation = req.header('x-correlation-id') ?? req.header('x-request-id');
        const correlationId = resolveCorrelationId(incomingCorrelation);
        res.setHeader('x-correlation-id', correlationId);
        runWithCorrelationId(correlationId, () => {
            res.locals.correlationId = correlationId;
            next();
        });
    });

    app.use(rateLimit({
        windowMs: 60_000,
        limit: deps.rateLimitPerMinute ?? 120,
        standardHeaders: true,
        legacyHeaders: false,
        skip: (req) => req.path === '/events',
        message: { error: 'RateLimited', reason: 'too many requests, retry later' },
    }));

    app.use((_req, res, next) => {
        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('X-Frame-Options', 'DENY');
        res.setHeader('Referrer-Policy', 'no-referrer');
        next();
    });

    app.get('/health', async (_req, res) => {
        try {
            const [brokerOk, databaseOk] = await Promise.all([deps.broker.ping(), isDatabaseReachable()]);
            res.json({
                status: 'ok',
                broker: { name: deps.broker.name, reachable: brokerOk },
                database: { reachable: databaseOk },
                active_tasks: deps.activeTasks(),
            });
        } catch (err) {
            handleApiError(res, err, 'api.health');
        }
    });

    app.post('/jobs/apply', async (req, res) => {
        try {
            const { taskId } = await deps.orchestrator.submitJobApply(req.body);
            res.status(202).json({ task_id: taskId });
        } catch (err) {
            handleApiError(res, err, 'api.jobs.apply');
        }
    });

    app.post('/outreach/search', async (req, res) => {
        try {
            const { taskId, sessionId } = await deps.orchestrator.submitOutreachSearch(req.body);
            res.status(202).json({ task_id: taskId, session_id: sessionId });
        } catch (err) {
            handleApiError(res, err, 'api.outreach.search');
        }
    });

    app.post('/outreach/send', async (req, res) => {
        try {
            const { taskId } = await deps.orchestrator.submitOutreachSend(req.body);
            res.status(202).json({ task_id: taskId });
        } catch (err) {
            handleApiError(res, err, 'api.outreach.send');
        }
    });

    app.get('/outreach/filters', async (_req, res) => {
        try {
            res.json(await getCompanyFilterValues());
        } catch (err) {
            handleApiError(res, err, 'api.outreach.filters');
        }
    });

    app.get('/tasks/:id', async (req, res) => {
        try {
            res.json(await deps.orchestrator.getTask(req.params.id));
        } catch (err) {
            handleApiError(res, err, 'api.tasks.get');
        }
    });

    app.post('/tasks/:id/cancel', async (req, res) => {
        try {
            const task = await deps.orchestrator.cancel(req.params.id);
            res.status(202).json({ task_id: task.id, state: task.state });
        } catch (err) {
            handleApiError(res, err, 'api.tasks.cancel');
        }
    });

    app.get('/events', (req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();
        writeSseEvent(res, 'connected', { subscribers: getLiveEventSubscribersCount() + 1 });
        const unsubscribe = subscribeLiveEvents((event: LiveEventMessage) => writeSseEvent(res, event.type, event));
        const heartbeat = setInterval(() => res.write(': heartbeat\n\n'), 25_000);
        heartbeat.unref();
        req.on('close', () => {
            clearInterval(heartbeat);
            unsubscribe();
        });
    });

    app.use((_req, res) => {
        res.status(404).json({ error: 'NotFound', reason: 'endpoint not found' });
    });

    // body-parser rejects malformed JSON before any route runs
    app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        if (err instanceof SyntaxError) {
            handleApiError(res, new ValidationError('request body is not valid JSON', [err.message]), 'api.body');
            return;
        }
        handleApiError(res, err, 'api.unhandled');
    });

    return app;
}

export function startServer(port: number, deps: ApiDeps): Server {
    const app = createApp(deps);
    const server = app.listen(port, () => {
        const address = server.address();
        const effectivePort = typeof address === 'object' && address ? address.port : port;
        void logInfo('api.listening', { port: effectivePort });
    });
    return server;
}
