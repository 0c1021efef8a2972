/**
 * Express application exposing the JSON-RPC endpoint and service routes.
 */

import { randomUUID } from 'node:crypto';
import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { HTTP_DEFAULTS, SERVER_NAME, SERVER_VERSION } from '../constants.js';
import type { GatewaySettings } from '../config/settings.js';
import { GatewayError } from '../errors/index.js';
import { createAuthMiddleware, getAuthContext, type Authenticator } from '../http/auth.js';
import { deriveSessionId } from '../http/session.js';
import {
  JsonRpcError,
  JsonRpcErrorCode,
  JsonRpcRequestSchema,
  createError,
  errorResponse,
  extractRequestId,
  isNotification,
  successResponse
} from '../rpc/jsonrpc.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import type { GatewayProtocolHandler } from './protocol-handler.js';

export interface AppDependencies {
  handler: GatewayProtocolHandler;
  authenticator: Authenticator;
  settings: Pick<GatewaySettings, 'allowedOrigins' | 'maxBodySize' | 'transport'>;
}

function isBodyParserError(err: unknown, type: string): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === type;
}

export function createApp({ handler, authenticator, settings }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({
    origin: settings.allowedOrigins.includes('*') ? true : settings.allowedOrigins,
    credentials: true
  }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', version: SERVER_VERSION, transport: settings.transport });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      transport: settings.transport,
      endpoints: { mcp: HTTP_DEFAULTS.MCP_PATH, health: '/health', metrics: '/metrics' }
    });
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.json({
      server: metrics.getAll(),
      sessions: { cached: handler.sessions.size }
    });
  });

  app.post(
    HTTP_DEFAULTS.MCP_PATH,
    createAuthMiddleware(authenticator),
    express.json({ limit: settings.maxBodySize }),
    async (req: Request, res: Response) => {
      const body: unknown = req.body;
      const requestId = randomUUID();
      const sessionId = deriveSessionId(req.headers);

      const parsed = JsonRpcRequestSchema.safeParse(body);
      if (!parsed.success) {
        metrics.increment(MetricNames.RPC_ERRORS);
        const issue = parsed.error.issues[0];
        logger.warn('Invalid JSON-RPC envelope', { request_id: requestId, issue: issue.message });
        res.json(errorResponse(
          extractRequestId(body),
          createError(JsonRpcErrorCode.INVALID_REQUEST, 'Invalid Request', {
            path: issue.path,
            reason: issue.message
          })
        ));
        return;
      }

      const rpcRequest = parsed.data;
      const notification = isNotification(rpcRequest);
      logger.info(`JSON-RPC ${rpcRequest.method} (${notification ? 'notification' : 'request'})`, {
        request_id: requestId,
        session_id: sessionId
      });

      if (notification) {
        logger.debug('Dropping notification response', { request_id: requestId });
        res.status(200).type('application/json').end();
        return;
      }

      const id = rpcRequest.id ?? null;
      const auth = getAuthContext(req);
      try {
        const result = await handler.dispatch(rpcRequest.method, rpcRequest.params, {
          requestId,
          sessionId,
          scopes: auth?.scopes ?? new Set<string>(),
          taskTypeHeader: req.get('X-Task-Type') || undefined
        });
        res.json(successResponse(id, result));
      } catch (error) {
        metrics.increment(MetricNames.RPC_ERRORS);
        if (error instanceof JsonRpcError) {
          res.json(errorResponse(id, error.toErrorObject()));
          return;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Unhandled MCP error', {
          request_id: requestId,
          session_id: sessionId,
          method: rpcRequest.method,
          error: message
        });
        res.json(errorResponse(
          id,
          createError(JsonRpcErrorCode.INTERNAL_ERROR, `Internal server error: ${message}`)
        ));
      }
    }
  );

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isBodyParserError(err, 'entity.parse.failed')) {
      metrics.increment(MetricNames.RPC_ERRORS);
      res.json(errorResponse(null, createError(JsonRpcErrorCode.PARSE_ERROR, 'Parse error')));
      return;
    }
    if (isBodyParserError(err, 'entity.too.large')) {
      res.status(413).json({ error: 'Request body too large', max_size: settings.maxBodySize });
      return;
    }
    if (res.headersSent) {
      next(err);
      return;
    }
    const error = GatewayError.fromError(err);
    logger.error('Unhandled request error', { code: error.code, error: error.message });
    res.status(error.httpStatus).json(error.toJSON());
  });

  return app;
}
