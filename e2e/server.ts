import { Hono } from 'hono';
import { z } from 'zod';
import type { Transport } from '../src/types/request.js';
import { validator } from '../src/utils/validator.js';
import { safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  transport: Transport;
  reset: () => void;
  getCounts: () => Record<string, number>;
};

const messageSchema = z.object({ message: z.string() });

/**
 * In-process HTTP server used as a transport: requests are answered by the app's
 * `fetch` handler, nothing listens on a socket.
 */
export function createE2EServer(): E2EServer {
  const counts: Record<string, number> = {};
  const app = new Hono();

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  app.post('/messages', async (c) => {
    increment('POST /messages');

    if (c.req.header('content-type') !== 'application/json') {
      return c.json({ error: 'expected a JSON body' }, 415);
    }

    const [errParse, parsed] = await safeWrapAsync(() => c.req.json());
    if (errParse) {
      return c.json({ error: 'invalid json', details: errParse.message }, 400);
    }

    const [errValidate, validated] = await validator(parsed, messageSchema);
    if (errValidate) {
      return c.json({ error: 'invalid request body', details: errValidate.message }, 400);
    }

    return c.json({ id: counts['POST /messages'], message: validated.message }, 201);
  });

  app.post('/messages.xml', async (c) => {
    increment('POST /messages.xml');

    const body = await c.req.text();
    return c.body(`<receipt><length>${body.length}</length></receipt>`, 201, { 'content-type': 'application/xml' });
  });

  app.get('/whoami', (c) => {
    increment('GET /whoami');

    const authorization = c.req.header('authorization');
    if (!authorization) {
      return c.json({ error: 'unauthorized' }, 401);
    }

    return c.json({ authorization, accept: c.req.header('accept') ?? null });
  });

  app.get('/slow', async (c) => {
    increment('GET /slow');

    const signal = c.req.raw.signal;
    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, 1_000);
      signal.addEventListener('abort', () => {
        clearTimeout(timer);
        resolve();
      });
    });

    return c.json({ ok: true });
  });

  return {
    transport: async (request) => app.fetch(request),
    reset: () => {
      for (const k of Object.keys(counts)) {
        delete counts[k];
      }
    },
    getCounts: () => structuredClone(counts),
  };
}
