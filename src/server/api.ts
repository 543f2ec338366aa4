/**
 * API routes for tact.
 *
 * Two audiences, two prefixes:
 *   /api/*        the bot's transport layer (messages in, replies out)
 *   /api/admin/*  pattern administration and stats (token-protected)
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { Responder } from '../core/responder.js';
import { EngineError, NotFoundError, ValidationError } from '../core/errors.js';
import { FeedbackSchema, InboundMessageSchema } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function parseDays(value: string | undefined, fallback: number): number {
  const days = Number(value ?? fallback);
  return Number.isFinite(days) && days > 0 ? days : fallback;
}

async function readJson(req: { json(): Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return null;
  }
}

export function createAPI(responder: Responder, adminToken: string) {
  const api = new Hono();
  const { registry, stats } = responder;

  api.onError((error, c) => {
    if (error instanceof EngineError) {
      const status = error.status === 400 || error.status === 404 || error.status === 503 ? error.status : 422;
      return c.json(error.toJSON(), status);
    }
    console.error('[tact] Unhandled API error:', error);
    return c.json({ error: 'Internal error' }, 500);
  });

  // ── Bot routes ─────────────────────────────────────────

  /** Decide on one inbound message. 200 either way; `status` says which. */
  api.post('/api/messages', async (c) => {
    const body = InboundMessageSchema.safeParse(await readJson(c.req));
    if (!body.success) {
      throw ValidationError.fromZod(body.error, 'Invalid message body');
    }

    // z.unknown() leaves `text` optional in the parsed type
    const result = responder.handle({ ...body.data, text: body.data.text });
    if (!result.ok) {
      return c.json(result.error.toJSON(), 400);
    }

    const reply = result.value;
    return c.json({
      status: reply.status,
      response: reply.status === 'responded' ? reply.content : null,
      decision: reply.decision,
      classification: reply.classification,
      statId: reply.stat.id,
    });
  });

  /** Classification only; no guard, no stats */
  api.post('/api/classify', async (c) => {
    const body = await readJson(c.req);
    const text = body !== null && typeof body === 'object' && 'text' in body ? body.text : undefined;

    const result = responder.classify(text);
    if (!result.ok) {
      return c.json(result.error.toJSON(), 400);
    }
    return c.json({ classification: result.value });
  });

  /** The caller answered through the external generator */
  api.post('/api/conversations/:conversationId/external', (c) => {
    responder.recordExternalReply(c.req.param('conversationId'));
    return c.json({ ok: true });
  });

  // ── Admin routes ───────────────────────────────────────

  const adminAuth: MiddlewareHandler = async (c, next) => {
    const token = c.req.header('Authorization')?.replace('Bearer ', '');
    if (!adminToken || token !== adminToken) {
      return c.json({ error: 'Unauthorized' }, 401);
    }
    await next();
  };

  api.use('/api/admin/*', adminAuth);

  /** List patterns (?enabled=true for active only) */
  api.get('/api/admin/patterns', (c) => {
    const patterns = registry.list({ enabledOnly: c.req.query('enabled') === 'true' });
    return c.json({
      total: patterns.length,
      version: registry.currentSnapshot().version,
      patterns,
    });
  });

  /** Re-read patterns from the store */
  api.post('/api/admin/patterns/reload', (c) => {
    const result = registry.reload();
    if (!result.ok) throw result.error;
    return c.json({ ok: true, version: result.value.version, count: result.value.patterns.length });
  });

  api.get('/api/admin/patterns/:id', (c) => {
    const pattern = registry.get(c.req.param('id'));
    if (!pattern) throw new NotFoundError('Pattern not found', { id: c.req.param('id') });
    return c.json({ pattern });
  });

  /** Create. The id must be new */
  api.post('/api/admin/patterns', async (c) => {
    const body = await readJson(c.req);
    const id = body !== null && typeof body === 'object' && 'id' in body ? body.id : undefined;
    if (typeof id === 'string' && registry.get(id)) {
      return c.json({ error: `Pattern ${id} already exists` }, 409);
    }

    const result = registry.upsert(body);
    if (!result.ok) throw result.error;

    console.log(`[tact] Pattern created: ${result.value.id}`);
    return c.json({ ok: true, pattern: result.value }, 201);
  });

  /** Replace. Fields missing from the body fall back to the current pattern */
  api.put('/api/admin/patterns/:id', async (c) => {
    const id = c.req.param('id');
    const existing = registry.get(id);
    if (!existing) throw new NotFoundError('Pattern not found', { id });

    const body = await readJson(c.req);
    const updates = body !== null && typeof body === 'object' ? body : {};

    const result = registry.upsert({ ...existing, ...updates, id });
    if (!result.ok) throw result.error;

    console.log(`[tact] Pattern updated: ${id}`);
    return c.json({ ok: true, pattern: result.value });
  });

  api.delete('/api/admin/patterns/:id', (c) => {
    const id = c.req.param('id');
    const removed = registry.remove(id);
    if (!removed.ok) throw removed.error;
    if (!removed.value) throw new NotFoundError('Pattern not found', { id });

    console.log(`[tact] Pattern removed: ${id}`);
    return c.json({ ok: true });
  });

  /** Pattern overview plus the last week of outcomes */
  api.get('/api/admin/summary', (c) => {
    return c.json({
      patterns: registry.summary(),
      recentStats: stats.summary(7 * DAY_MS),
      queuedWrites: stats.pending,
      droppedWrites: stats.dropped,
    });
  });

  api.get('/api/admin/stats', (c) => {
    const days = parseDays(c.req.query('days'), 7);
    return c.json({ days, ...stats.summary(days * DAY_MS) });
  });

  api.get('/api/admin/stats/patterns/:id', (c) => {
    const id = c.req.param('id');
    if (!registry.get(id)) throw new NotFoundError('Pattern not found', { id });

    const days = parseDays(c.req.query('days'), 30);
    return c.json({ days, ...stats.patternStats(id, days * DAY_MS) });
  });

  /** Attach user feedback to an outcome, once */
  api.post('/api/admin/stats/:id/feedback', async (c) => {
    const body = FeedbackSchema.safeParse(await readJson(c.req));
    if (!body.success) throw ValidationError.fromZod(body.error, 'Invalid feedback body');

    const result = stats.attachFeedback(c.req.param('id'), body.data.accepted, body.data.note);
    if (!result.ok) throw result.error;
    return c.json({ ok: true, record: result.value });
  });

  /** Health check */
  api.get('/api/health', (c) => {
    const snapshot = registry.currentSnapshot();
    return c.json({
      status: 'ok',
      patterns: snapshot.patterns.length,
      snapshotVersion: snapshot.version,
      version: '0.1.0',
    });
  });

  return api;
}
