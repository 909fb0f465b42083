import { createHash } from 'node:crypto';
import { type Context, Hono } from 'hono';
import { z } from 'zod';
import type { FetchLike } from '../src/types/request.js';
import { safeWrapAsync } from '../src/utils/wrap.js';

/** Request seen by the stand-in service. */
export type RecordedRequest = {
  method: string;
  path: string;
  apiKey: string | null;
  userAgent: string | null;
  contentType: string | null;
};

export type E2EService = {
  /** `fetch` that dispatches straight into the Hono app, no socket involved. */
  fetch: FetchLike;
  requests: RecordedRequest[];
  reset: () => void;
};

export const E2E_API_KEY = 'test-key';

/** Hash whose capability search answers with a body that is not JSON. */
export const BROKEN_HASH = 'not-json';

/** Job id the status endpoint does not know. */
export const UNKNOWN_JOB = 'unknown-job';

const datasets = [
  { cid: 'bafy-dataset-one', sha256: 'aaa111', label: 'malicious' },
  { cid: 'bafy-dataset-two', sha256: 'bbb222', label: 'benign' },
];

const statusSchema = z.object({ uuid: z.string().min(1) });
const hashSchema = z.object({ sha256: z.string().min(1) });
const cidSchema = z.object({ cid: z.string().min(1) });
const shaHashSchema = z.object({ sha_hash: z.string().min(1) });

/**
 * In-process stand-in for the Traceix service, built on Hono and driven through `app.request`.
 */
export function createE2EService(): E2EService {
  const requests: RecordedRequest[] = [];
  const app = new Hono();
  let jobs = 0;

  app.use('*', async (c, next) => {
    requests.push({
      method: c.req.method,
      path: c.req.path,
      apiKey: c.req.header('x-api-key') ?? null,
      userAgent: c.req.header('user-agent') ?? null,
      contentType: c.req.header('content-type') ?? null,
    });

    if (!c.req.path.includes('/ipfs/') && c.req.header('x-api-key') !== E2E_API_KEY) {
      return c.json({ error: 'invalid api key' }, 401);
    }

    await next();
  });

  async function readUpload(c: Context) {
    const [errBody, body] = await safeWrapAsync(() => c.req.parseBody());
    if (errBody) {
      return null;
    }

    const file = body.file;
    if (!file || typeof file === 'string' || Array.isArray(file)) {
      return null;
    }

    const contents = Buffer.from(await file.arrayBuffer());
    return {
      filename: file.name,
      type: file.type,
      size: contents.length,
      sha256: createHash('sha256').update(contents).digest('hex'),
    };
  }

  async function readJson<T>(c: Context, schema: z.ZodType<T>): Promise<T | null> {
    const [errJson, json] = await safeWrapAsync(() => c.req.json());
    if (errJson) {
      return null;
    }

    const parsed = schema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  app.post('/api/traceix/v1/upload', async (c) => {
    const upload = await readUpload(c);
    if (!upload) {
      return c.json({ error: 'missing file' }, 400);
    }

    jobs += 1;
    return c.json({ uuid: `job-${jobs}`, ...upload });
  });

  app.post('/api/traceix/v1/capa', async (c) => {
    const upload = await readUpload(c);
    if (!upload) {
      return c.json({ error: 'missing file' }, 400);
    }

    return c.json({ sha256: upload.sha256, capabilities: ['read file', 'create process'] });
  });

  app.post('/api/traceix/v1/exif', async (c) => {
    const upload = await readUpload(c);
    if (!upload) {
      return c.json({ error: 'missing file' }, 400);
    }

    return c.json({ sha256: upload.sha256, FileName: upload.filename, FileSize: upload.size });
  });

  app.post('/api/v1/traceix/status', async (c) => {
    const body = await readJson(c, statusSchema);
    if (!body) {
      return c.json({ error: 'invalid body' }, 400);
    }

    if (body.uuid === UNKNOWN_JOB) {
      return c.json({ error: 'job not found' }, 404);
    }

    return c.json({ uuid: body.uuid, status: 'complete' });
  });

  app.post('/api/traceix/v1/capa/search', async (c) => {
    const body = await readJson(c, hashSchema);
    if (!body) {
      return c.json({ error: 'invalid body' }, 400);
    }

    if (body.sha256 === BROKEN_HASH) {
      return c.text('internal error page', 200);
    }

    return c.json({ sha256: body.sha256, index: 'capa', results: [] });
  });

  app.post('/api/traceix/v1/exif/search', async (c) => {
    const body = await readJson(c, hashSchema);
    if (!body) {
      return c.json({ error: 'invalid body' }, 400);
    }

    return c.json({ sha256: body.sha256, index: 'exif', results: [] });
  });

  app.post('/api/traceix/v1/ipfs/listall', (c) => c.json(datasets.map(({ cid }) => cid)));

  app.post('/api/traceix/v1/ipfs/search', async (c) => {
    const body = await readJson(c, cidSchema);
    const dataset = datasets.find(({ cid }) => cid === body?.cid);
    return dataset ? c.json(dataset) : c.json({ error: 'dataset not found' }, 404);
  });

  app.post('/api/traceix/v1/ipfs/find', async (c) => {
    const body = await readJson(c, shaHashSchema);
    const dataset = datasets.find(({ sha256 }) => sha256 === body?.sha_hash);
    return c.json({ found: Boolean(dataset), cid: dataset?.cid ?? null });
  });

  return {
    fetch: async (input, init) => app.request(input, init),
    requests,
    reset: () => {
      requests.length = 0;
      jobs = 0;
    },
  };
}
