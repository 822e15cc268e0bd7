/**
 * flowgraph - Request Server
 *
 * Thin HTTP adapter over a WorkflowStore. Holds no engine logic: it looks a
 * workflow up by name and calls execute() or export() on it.
 *
 * Endpoints:
 * - GET /health - Health check
 * - POST /execute/:workflow - Run a workflow with `{ param }` as payload
 * - GET /export/:workflow - DOT description of a workflow
 *
 * @module @flowgraph/api/server
 */

import type { Server } from 'http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import { z } from 'zod';
import {
  WorkflowNotFoundError,
  createContext,
  createLogger,
  generateRequestId,
  getLogger,
  loadConfig,
  runWithContext,
  type Logger,
} from '@flowgraph/core';
import { fromBytes, toBytes, type WorkflowStore } from '@flowgraph/engine';

// =============================================================================
// Request Schemas
// =============================================================================

export const ExecuteRequestSchema = z.object({
  param: z.string().default(''),
});

export type ExecuteRequest = z.infer<typeof ExecuteRequestSchema>;

// =============================================================================
// Server
// =============================================================================

export interface WorkflowServerOptions {
  logger?: Logger;
  /** Maximum accepted request body (express size string) */
  bodyLimit?: string;
}

export interface WorkflowServer {
  app: Express;
  /** Listen on `port`; resolves once the socket is bound */
  start(port: number): Promise<Server>;
  stop(): Promise<void>;
}

function statusFor(error: unknown): number {
  return error instanceof WorkflowNotFoundError ? 404 : 500;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the express app for a store
 *
 * @example
 * ```typescript
 * const store = new InMemoryWorkflowStore();
 * await store.save(workflow);
 * const server = createWorkflowServer(store);
 * await server.start(8080);
 * ```
 */
export function createWorkflowServer(
  store: WorkflowStore,
  options: WorkflowServerOptions = {}
): WorkflowServer {
  const logger = (options.logger ?? getLogger()).child({ component: 'api' });
  const app = express();
  let server: Server | undefined;

  app.use(helmet());

  // Request logging with request ID correlation
  app.use((req, res, next) => {
    const startTime = Date.now();
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header ? header : generateRequestId();

    res.setHeader('X-Request-ID', requestId);
    res.on('finish', () => {
      logger.requestEnd(req.method, req.path, res.statusCode, Date.now() - startTime, { requestId });
    });

    runWithContext(createContext('api', { requestId }), () => next());
  });

  // Parsed after correlation: rejected bodies still carry a request id
  app.use(express.json({ limit: options.bodyLimit ?? '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: options.bodyLimit ?? '1mb' }));

  app.get('/health', async (_req, res) => {
    try {
      const workflows = await store.list();
      res.json({ status: 'healthy', workflows: workflows.length });
    } catch (error) {
      logger.error('Health check failed', error);
      res.status(500).json({ message: messageOf(error) });
    }
  });

  app.post('/execute/:workflow', async (req, res) => {
    const parsed = ExecuteRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ message: 'invalid request.' });
      return;
    }

    try {
      const workflow = await store.get(req.params.workflow);
      const result = await workflow.execute(toBytes(parsed.data.param));
      res.status(200).json({ result: fromBytes(result) });
    } catch (error) {
      const status = statusFor(error);
      if (status === 500) {
        logger.error('Workflow execution failed', error, { workflow: req.params.workflow });
      }
      res.status(status).json({ message: messageOf(error) });
    }
  });

  app.get('/export/:workflow', async (req, res) => {
    try {
      const workflow = await store.get(req.params.workflow);
      res.status(200).json({ dot: fromBytes(workflow.export()) });
    } catch (error) {
      res.status(statusFor(error)).json({ message: messageOf(error) });
    }
  });

  // Malformed bodies surface here from the body parsers
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 400 && status < 500) {
      res.status(400).json({ message: 'invalid request.' });
      return;
    }
    logger.error('Unhandled error', err);
    res.status(500).json({ message: err.message });
  });

  return {
    app,

    start(port: number): Promise<Server> {
      return new Promise((resolve, reject) => {
        const listening = app.listen(port, () => {
          server = listening;
          logger.info('Server listening', { eventName: 'server.start', port });
          resolve(listening);
        });
        listening.once('error', reject);
      });
    },

    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        if (!server) {
          resolve();
          return;
        }
        server.close(err => (err ? reject(err) : resolve()));
        server = undefined;
      });
    },
  };
}

/**
 * Start a server for `store` on the port and log level from the environment
 */
export async function startWorkflowServer(
  store: WorkflowStore,
  env: Record<string, string | undefined> = process.env
): Promise<WorkflowServer> {
  const config = loadConfig(env);
  const logger = createLogger(config.appName, {
    minSeverity: config.logLevel,
    prettyPrint: config.prettyLogs,
  });

  const server = createWorkflowServer(store, { logger });
  await server.start(config.port);
  return server;
}
