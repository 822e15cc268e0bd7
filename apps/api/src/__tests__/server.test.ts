/**
 * Request Server Tests
 *
 * Exercises execute, export and health against an in-memory store.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import { createLogger } from '@flowgraph/core';
import {
  InMemoryWorkflowStore,
  Node,
  Workflow,
  exportDot,
  fromBytes,
  toBytes,
} from '@flowgraph/engine';
import { createWorkflowServer, startWorkflowServer, type WorkflowServer } from '../server.js';

const logger = createLogger('api-test', { minSeverity: 'CRITICAL' });

function numeric(key: string, fn: (n: number) => number): Node {
  return new Node(key, ({ data }) => toBytes(String(fn(Number(fromBytes(data))))));
}

function buildCalculator(): Workflow {
  const input = new Node('get-input', ({ data }) => data);
  const double = numeric('double', n => n * 2);
  const isLarge = new Node('is-large', ({ data }) => toBytes(String(Number(fromBytes(data)) > 5)));
  const addOne = numeric('add-one', n => n + 1);
  const subOne = numeric('sub-one', n => n - 1);
  const workflow = new Workflow('calculator', { logger });
  workflow.addNode(input, double, isLarge, addOne, subOne);
  workflow.addEdge(input, double);
  workflow.addConditionalEdge(double, isLarge, addOne, subOne);
  return workflow;
}

function buildBroken(): Workflow {
  const start = new Node('start', ({ data }) => data);
  const save = new Node('save', () => {
    throw new Error('db down');
  });
  const workflow = new Workflow('broken', { logger });
  workflow.addNode(start, save);
  workflow.addEdge(start, save);
  return workflow;
}

describe('Workflow server', () => {
  let store: InMemoryWorkflowStore;
  let server: WorkflowServer;
  let calculator: Workflow;

  beforeEach(async () => {
    store = new InMemoryWorkflowStore();
    calculator = buildCalculator();
    await store.save(calculator);
    await store.save(buildBroken());
    server = createWorkflowServer(store, { logger });
  });

  describe('GET /health', () => {
    it('should report healthy with the stored workflow count', async () => {
      const res = await request(server.app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'healthy', workflows: 2 });
    });
  });

  describe('POST /execute/:workflow', () => {
    it('should run the workflow on a JSON param', async () => {
      const res = await request(server.app).post('/execute/calculator').send({ param: '5' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ result: '11' });
    });

    it('should accept a form-encoded param', async () => {
      const res = await request(server.app)
        .post('/execute/calculator')
        .type('form')
        .send('param=2');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ result: '3' });
    });

    it('should treat a missing param as empty input', async () => {
      const res = await request(server.app).post('/execute/calculator').send({});

      // '' -> 0 -> 0 -> false branch -> -1
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ result: '-1' });
    });

    it('should reject a non-string param', async () => {
      const res = await request(server.app).post('/execute/calculator').send({ param: 5 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'invalid request.' });
    });

    it('should reject malformed JSON', async () => {
      const res = await request(server.app)
        .post('/execute/calculator')
        .set('Content-Type', 'application/json')
        .send('{"param":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: 'invalid request.' });
    });

    it('should return 404 for an unknown workflow', async () => {
      const res = await request(server.app).post('/execute/missing').send({ param: '1' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: "workflow 'missing' not found" });
    });

    it('should return 500 with the failure message when a node fails', async () => {
      const res = await request(server.app).post('/execute/broken').send({ param: 'x' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ message: 'db down' });
    });
  });

  describe('GET /export/:workflow', () => {
    it('should return the DOT description', async () => {
      const res = await request(server.app).get('/export/calculator');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ dot: exportDot(calculator) });
      expect(res.body.dot.split('\n')[1]).toBe(
        '\tgraph [label="Calculator", bgcolor="lightgrey", labelloc="t"];'
      );
    });

    it('should return 404 for an unknown workflow', async () => {
      const res = await request(server.app).get('/export/missing');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: "workflow 'missing' not found" });
    });
  });

  describe('request ids', () => {
    it('should echo a supplied X-Request-ID', async () => {
      const res = await request(server.app).get('/health').set('X-Request-ID', 'req-123');

      expect(res.headers['x-request-id']).toBe('req-123');
    });

    it('should generate one when none is supplied', async () => {
      const res = await request(server.app).get('/health');

      expect(res.headers['x-request-id']).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
    });

    it('should correlate and log a request rejected by the body parser', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const loud = createWorkflowServer(store, {
        logger: createLogger('api-test', { minSeverity: 'WARNING', prettyPrint: false }),
      });

      const res = await request(loud.app)
        .post('/execute/calculator')
        .set('Content-Type', 'application/json')
        .set('X-Request-ID', 'req-bad-body')
        .send('{"param":');

      expect(res.status).toBe(400);
      expect(res.headers['x-request-id']).toBe('req-bad-body');
      await vi.waitFor(() => expect(warn).toHaveBeenCalledTimes(1));
      const entry = JSON.parse(String(warn.mock.calls[0]?.[0]));
      expect(entry).toMatchObject({
        severity: 'WARNING',
        eventName: 'request.end',
        httpMethod: 'POST',
        httpPath: '/execute/calculator',
        httpStatus: 400,
        requestId: 'req-bad-body',
        component: 'api',
      });
    });
  });

  describe('lifecycle', () => {
    it('should listen and close', async () => {
      const listening = await server.start(0);
      expect(listening.listening).toBe(true);

      await server.stop();

      expect(listening.listening).toBe(false);
    });

    it('should resolve stop() when never started', async () => {
      await expect(server.stop()).resolves.toBeUndefined();
    });

    it('should start from environment configuration', async () => {
      const started = await startWorkflowServer(store, { PORT: '0', LOG_LEVEL: 'CRITICAL' });

      const res = await request(started.app).get('/health');
      await started.stop();

      expect(res.status).toBe(200);
    });
  });
});
