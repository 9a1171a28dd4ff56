import express from 'express';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Stage } from '../../src/domain/pipeline';
import { PermanentStageError } from '../../src/engine/failure';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { createApp, createAppContext, AppContext } from '../../src/server';

interface RequestOptions {
  body?: unknown;
  /** Sent verbatim instead of a JSON-encoded body. */
  rawBody?: string;
}

async function request(
  app: express.Application,
  method: string,
  path: string,
  options: RequestOptions = {},
): Promise<{ status: number; body: unknown }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, () => {
      const address = server.address();
      if (typeof address !== 'object' || address === null) {
        server.close();
        reject(new Error('server has no port'));
        return;
      }
      const init: RequestInit = { method, headers: { 'Content-Type': 'application/json' } };
      if (options.rawBody !== undefined) init.body = options.rawBody;
      else if (options.body !== undefined) init.body = JSON.stringify(options.body);

      fetch(`http://127.0.0.1:${address.port}${path}`, init)
        .then(async (res) => {
          const body: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body });
        })
        .catch((err: unknown) => {
          server.close();
          reject(err);
        });
    });
  });
}

function hasResult(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'result' in body;
}

/** Poll GET /api/runs/:runId until the run has a stored result. */
async function waitForResult(app: express.Application, runId: string): Promise<unknown> {
  for (let i = 0; i < 50; i++) {
    const res = await request(app, 'GET', `/api/runs/${runId}`);
    if (hasResult(res.body)) return res.body;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(`run ${runId} did not finish`);
}

describe('Run API', () => {
  let app: express.Application;
  let ctx: AppContext;
  let written: string[];
  let releaseSlowRun: () => void;
  let slowRun: Promise<void>;

  function testStages(): Stage[] {
    return [
      {
        name: 'write',
        idempotent: false,
        async execute(artifact) {
          written.push(artifact.key);
          if (artifact.sourcePath === 'slow.txt') await slowRun;
          return {
            artifact,
            effect: { kind: 'record.written', description: `Wrote ${artifact.key}`, resource: { key: artifact.key } },
          };
        },
        async compensate(effect) {
          written = written.filter((key) => key !== effect.resource.key);
        },
      },
      {
        name: 'publish',
        idempotent: true,
        async execute(artifact) {
          if (artifact.sourcePath.endsWith('fail.txt')) throw new PermanentStageError('publish rejected');
          return { artifact };
        },
      },
    ];
  }

  beforeEach(() => {
    setLogHandler(() => undefined);
    written = [];
    slowRun = new Promise((resolve) => {
      releaseSlowRun = resolve;
    });
    ctx = createAppContext({ stages: testStages(), retry: { maxAttempts: 1 } });
    app = createApp(ctx);
  });

  afterEach(() => {
    releaseSlowRun();
    resetLogHandler();
  });

  it('reports health', async () => {
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0', storage: 'memory', pipelineConfigured: true, activeRuns: 0 });
  });

  describe('POST /api/runs', () => {
    it('runs to completion when asked to wait', async () => {
      const res = await request(app, 'POST', '/api/runs', {
        body: { sourcePath: 'docs/readme.txt', runId: 'run_a', wait: true },
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        result: {
          runId: 'run_a',
          status: 'succeeded',
          canceled: false,
          stages: [
            { stage: 'write', status: 'committed', attempts: 1 },
            { stage: 'publish', status: 'committed', attempts: 1 },
          ],
          artifact: { key: 'docs/readme.txt' },
        },
      });
      expect(written).toEqual(['docs/readme.txt']);
    });

    it('rolls back a failed run', async () => {
      const res = await request(app, 'POST', '/api/runs', { body: { sourcePath: 'fail.txt', runId: 'run_f', wait: true } });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        result: {
          status: 'rolled_back',
          failure: { code: 'STAGE.PERMANENT', message: 'publish rejected', stage: 'publish' },
          compensations: [{ stage: 'write', kind: 'record.written', status: 'compensated' }],
          remainingEffects: [],
        },
      });
      expect(written).toEqual([]);
    });

    it('accepts a run in the background', async () => {
      const res = await request(app, 'POST', '/api/runs', { body: { sourcePath: 'notes.txt', runId: 'run_bg' } });

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ runId: 'run_bg', status: 'running' });
      expect(await waitForResult(app, 'run_bg')).toMatchObject({ result: { runId: 'run_bg', status: 'succeeded' } });
    });

    it('rejects a run id that already exists', async () => {
      await request(app, 'POST', '/api/runs', { body: { sourcePath: 'a.txt', runId: 'run_dup', wait: true } });

      const res = await request(app, 'POST', '/api/runs', { body: { sourcePath: 'b.txt', runId: 'run_dup', wait: true } });

      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ error: { code: 'PIPELINE.ALREADY_RUNNING', runId: 'run_dup' } });
      expect(written).toEqual(['a.txt']);
    });

    it('validates the body', async () => {
      const missing = await request(app, 'POST', '/api/runs', { body: {} });
      expect(missing.status).toBe(400);
      expect(missing.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA' } });

      const badId = await request(app, 'POST', '/api/runs', { body: { sourcePath: 'a.txt', runId: 'bad id!' } });
      expect(badId.status).toBe(400);

      for (const key of ['../escape.txt', '/etc/passwd', 'a/./b.txt', 'a\\b.txt']) {
        const badKey = await request(app, 'POST', '/api/runs', { body: { sourcePath: 'a.txt', key } });
        expect(badKey.status).toBe(400);
      }
      expect(written).toEqual([]);

      const malformed = await request(app, 'POST', '/api/runs', { rawBody: '{"sourcePath":' });
      expect(malformed.status).toBe(400);
      expect(malformed.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA' } });
    });

    it('answers 503 without a configured pipeline', async () => {
      const bare = createApp(createAppContext());

      const res = await request(bare, 'POST', '/api/runs', { body: { sourcePath: 'a.txt' } });

      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({ error: { code: 'PIPELINE.NOT_CONFIGURED' } });
    });
  });

  describe('GET /api/runs', () => {
    beforeEach(async () => {
      await request(app, 'POST', '/api/runs', { body: { sourcePath: 'ok.txt', runId: 'run_ok', wait: true } });
      await request(app, 'POST', '/api/runs', { body: { sourcePath: 'fail.txt', runId: 'run_fail', wait: true } });
    });

    it('lists runs filtered by status', async () => {
      const res = await request(app, 'GET', '/api/runs?status=rolled_back');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ items: [{ runId: 'run_fail' }], total: 1, offset: 0, hasMore: false });
    });

    it('rejects an unknown status', async () => {
      const res = await request(app, 'GET', '/api/runs?status=exploded');
      expect(res.status).toBe(400);
    });

    it('returns a single run or 404', async () => {
      const found = await request(app, 'GET', '/api/runs/run_ok');
      expect(found.body).toMatchObject({ result: { runId: 'run_ok', status: 'succeeded' } });

      const missing = await request(app, 'GET', '/api/runs/run_missing');
      expect(missing.status).toBe(404);
      expect(missing.body).toMatchObject({ error: { code: 'VALIDATION.NOT_FOUND', message: 'Run not found: run_missing' } });
    });

    it('returns events filtered by type', async () => {
      const res = await request(app, 'GET', '/api/runs/run_ok/events?type=stage.committed');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        events: [
          { type: 'stage.committed', runId: 'run_ok', stage: 'write' },
          { type: 'stage.committed', runId: 'run_ok', stage: 'publish' },
        ],
      });

      const unknown = await request(app, 'GET', '/api/runs/run_ok/events?type=stage.exploded');
      expect(unknown.status).toBe(400);
    });

    it('aggregates statistics', async () => {
      const res = await request(app, 'GET', '/api/statistics');
      expect(res.body).toMatchObject({
        statistics: {
          totalRuns: 2,
          byStatus: { succeeded: 1, rolled_back: 1 },
          canceledRuns: 0,
          failedCompensations: 0,
          unresolvedEffects: 0,
        },
      });
    });
  });

  describe('POST /api/runs/:runId/cancel', () => {
    it('cancels an in-flight run at the next stage boundary', async () => {
      const started = await request(app, 'POST', '/api/runs', { body: { sourcePath: 'slow.txt', runId: 'run_slow' } });
      expect(started.status).toBe(202);

      const inFlight = await request(app, 'GET', '/api/runs/run_slow');
      expect(inFlight.body).toEqual({ runId: 'run_slow', status: 'running' });

      const cancel = await request(app, 'POST', '/api/runs/run_slow/cancel', { body: { reason: 'operator request' } });
      expect(cancel.status).toBe(202);
      expect(cancel.body).toEqual({ runId: 'run_slow', cancelRequested: true });

      releaseSlowRun();
      expect(await waitForResult(app, 'run_slow')).toMatchObject({
        result: {
          status: 'rolled_back',
          canceled: true,
          failure: { code: 'PIPELINE.CANCELED', message: 'Pipeline canceled: operator request' },
          stages: [
            { stage: 'write', status: 'rolled_back' },
            { stage: 'publish', status: 'skipped' },
          ],
        },
      });
      expect(written).toEqual([]);
    });

    it('answers 404 for a run that is not executing', async () => {
      const res = await request(app, 'POST', '/api/runs/run_nope/cancel', { body: {} });
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { message: 'Active run not found: run_nope' } });
    });
  });

  describe('POST /api/library', () => {
    it('answers 503 without media library stages', async () => {
      const res = await request(app, 'POST', '/api/library', { body: { imagePath: 'cat.png', wait: true } });

      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({ error: { code: 'PIPELINE.NOT_CONFIGURED' } });
      expect(written).toEqual([]);
    });

    it('runs the media library stages keyed by file name', async () => {
      const library = createApp(createAppContext({ stages: testStages(), libraryStages: testStages(), retry: { maxAttempts: 1 } }));

      const res = await request(library, 'POST', '/api/library', {
        body: { imagePath: 'photos/cat.png', runId: 'run_lib', wait: true },
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ result: { runId: 'run_lib', status: 'succeeded', artifact: { key: 'cat.png' } } });
      expect(written).toEqual(['cat.png']);
    });

    it('validates the key', async () => {
      const library = createApp(createAppContext({ stages: testStages(), libraryStages: testStages() }));

      const res = await request(library, 'POST', '/api/library', { body: { imagePath: 'cat.png', key: '../../cat.png' } });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA' } });
    });
  });

  describe('POST /api/deployments', () => {
    let siteDir: string;

    beforeEach(async () => {
      siteDir = await mkdtemp(join(tmpdir(), 'runs-api-site-'));
      await writeFile(join(siteDir, 'index.html'), '<html></html>');
      await writeFile(join(siteDir, 'style.css'), 'body{}');
    });

    afterEach(async () => {
      await rm(siteDir, { recursive: true, force: true });
    });

    it('deploys every file in the directory', async () => {
      const res = await request(app, 'POST', '/api/deployments', { body: { sourceDir: siteDir } });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ report: { sourceDir: siteDir, totalFiles: 2, succeeded: 2, rolledBack: 0, partial: 0 } });
      expect([...written].sort()).toEqual(['index.html', 'style.css']);
    });

    it('answers 404 for a missing directory', async () => {
      const missing = join(siteDir, 'nope');
      const res = await request(app, 'POST', '/api/deployments', { body: { sourceDir: missing } });

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { message: `Directory not found: ${missing}` } });
    });
  });
});
