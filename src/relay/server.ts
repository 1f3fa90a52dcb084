import { Hono } from 'hono';
import { logger } from '../utils/logger.js';
import {
  bearerToken,
  eventBodySchema,
  killBodySchema,
  statusReportSchema,
} from './protocol.js';
import type { CommandQueueStore } from './queue.js';
import type { TokenStore } from './tokens.js';
import type { Notification, Severity } from '../notifications/types.js';

const log = logger.child({ component: 'relay-server' });

export interface RelayServerDeps {
  tokens: TokenStore;
  queue: CommandQueueStore;
  /** Forwards a client's notification to the user over chat. */
  deliver: (userId: string, notification: Notification) => Promise<void>;
  now?: () => number;
}

const COLOR_SEVERITY: Record<string, Severity> = {
  '#00FF00': 'success',
  '#FF0000': 'error',
  '#FFA500': 'warning',
  '#00FFFF': 'info',
};

async function readJson(req: { json(): Promise<unknown> }): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await req.json() };
  } catch {
    return { ok: false };
  }
}

/**
 * HTTP surface between monitors and the chat bot:
 * POST /event, GET /poll/:userId, POST /status/:userId, POST /kill, GET /health.
 */
export function createRelayApp(deps: RelayServerDeps): Hono {
  const app = new Hono();
  const now = deps.now ?? Date.now;

  app.get('/health', (c) => c.json({ status: 'ok' }));

  /**
   * POST /event
   * A monitor reports a notification for its user.
   */
  app.post('/event', async (c) => {
    const json = await readJson(c.req);
    if (!json.ok) {
      return c.json({ error: 'Invalid JSON' }, 400);
    }

    const parsed = eventBodySchema.safeParse(json.body);
    if (!parsed.success) {
      return c.json({ error: 'Missing user_id or title' }, 400);
    }

    const event = parsed.data;
    if (!deps.tokens.verify(event.user_id, bearerToken(c.req.header('Authorization')))) {
      log.warn({ userId: event.user_id }, 'Rejected event with invalid token');
      return c.json({ error: 'Unauthorized' }, 401);
    }

    try {
      await deps.deliver(event.user_id, {
        title: event.title,
        body: event.description,
        severity: (event.color && COLOR_SEVERITY[event.color.toUpperCase()]) || 'info',
      });
    } catch (err) {
      log.error({ err, userId: event.user_id }, 'Failed to forward event');
      return c.json({ error: 'Delivery failed' }, 502);
    }
    return c.json({ status: 'success' });
  });

  /**
   * GET /poll/:userId
   * Drains the user's queued commands; each is handed out once.
   */
  app.get('/poll/:userId', async (c) => {
    const userId = c.req.param('userId');
    if (!deps.tokens.verify(userId, bearerToken(c.req.header('Authorization')))) {
      return c.json({ error: 'Unauthorized' }, 401);
    }

    const commands = await deps.queue.drain(userId);
    if (commands.length > 0) {
      log.info({ userId, count: commands.length }, 'Delivered queued commands');
    }
    return c.json({ commands: commands.map(({ action }) => ({ action })) });
  });

  /**
   * POST /status/:userId
   * The monitor answers a status request.
   */
  app.post('/status/:userId', async (c) => {
    const userId = c.req.param('userId');
    if (!deps.tokens.verify(userId, bearerToken(c.req.header('Authorization')))) {
      return c.json({ error: 'Unauthorized' }, 401);
    }

    const json = await readJson(c.req);
    const parsed = json.ok ? statusReportSchema.safeParse(json.body) : null;
    if (!parsed?.success) {
      return c.json({ error: 'Missing description' }, 400);
    }

    await deps.queue.setStatus(userId, { ...parsed.data, reported_at: now() });
    return c.json({ status: 'success' });
  });

  /**
   * POST /kill
   * Queues a kill for whoever owns the token.
   */
  app.post('/kill', async (c) => {
    const json = await readJson(c.req);
    const parsed = json.ok ? killBodySchema.safeParse(json.body) : null;
    if (!parsed?.success) {
      return c.json({ error: 'Missing auth_token' }, 400);
    }

    const userId = deps.tokens.userForToken(parsed.data.auth_token);
    if (!userId) {
      return c.json({ error: 'Invalid token' }, 403);
    }

    await deps.queue.push(userId, { action: 'kill', queued_at: now() });
    log.info({ userId }, 'Kill queued');
    return c.json({ status: 'success' });
  });

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, 'Relay request failed');
    return c.json({ error: 'Internal error' }, 500);
  });

  return app;
}
