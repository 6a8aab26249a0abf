/**
 * API routes
 * Read endpoints are open; everything under /admin needs an x-admin-id
 * header naming a configured admin, and each admin is rate limited.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { TradingCore } from '../trading/core.js';
import type { AdminContext } from '../admin/service.js';
import { parseSignal } from '../signals/types.js';
import { TradingCoreError, describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { RateLimiter } from './rate-limit.js';

const log = createLogger('api');

const ToggleBody = z.object({ enabled: z.boolean() });
const RiskBody = z.object({ param: z.string().min(1), value: z.number() });
const StrategyBody = z.object({ name: z.string().min(1), enabled: z.boolean() });
const WatchlistBody = z.object({ action: z.enum(['add', 'remove']), marketId: z.string().min(1) });
const PnlBody = z.object({ realized: z.number().finite(), unrealized: z.number().finite().optional().default(0) });
const SignalBody = z.object({ currentPrice: z.number().positive().optional() }).passthrough();
const AuditQuery = z.object({ limit: z.coerce.number().int().positive().max(500).optional().default(50) });

function header(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Send a fault as JSON. Internal messages never reach the client, only the code.
 */
function sendError(res: Response, error: unknown): void {
  log.error({ err: error }, 'request failed');
  res.status(500).json({ error: describeError(error) });
}

function badRequest(res: Response, issues: z.ZodError): void {
  res.status(400).json({ error: issues.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ') });
}

export function createRoutes(
  core: TradingCore,
  adminIds: ReadonlySet<string>,
  limiter: RateLimiter = new RateLimiter(),
): Router {
  const router = Router();
  const { admin, pipeline, ledger } = core;

  /**
   * Resolve the calling admin, answering 403 when the caller is not one
   * and 429 when they are over their request budget
   */
  function authorize(req: Request, res: Response): AdminContext | null {
    const actorId = header(req, 'x-admin-id');
    if (!actorId || !adminIds.has(actorId)) {
      log.warn({ actorId, path: req.path }, 'admin request denied');
      res.status(403).json({ error: 'unauthorized' });
      return null;
    }
    if (!limiter.isAllowed(actorId)) {
      log.warn({ actorId, path: req.path }, 'admin request rate limited');
      res.status(429).json({ error: 'rate_limited' });
      return null;
    }
    return { actorId, correlationId: header(req, 'x-correlation-id') ?? null };
  }

  // ============================================
  // Read endpoints
  // ============================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  router.get('/status', (_req: Request, res: Response) => {
    try {
      res.json(admin.status());
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/orders', (_req: Request, res: Response) => {
    try {
      res.json(core.execution.getOpenOrders());
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/audit', (req: Request, res: Response) => {
    const query = AuditQuery.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    try {
      res.json(ledger.getAuditLog(query.data.limit));
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============================================
  // Signals
  // ============================================

  /**
   * Evaluate and execute one signal. Policy rejections are 200s with a reason.
   */
  router.post('/signals', async (req: Request, res: Response) => {
    const body = SignalBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    const parsed = parseSignal(body.data);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const result = await pipeline.process(parsed.signal, body.data.currentPrice);
      res.json(result);
    } catch (error) {
      if (error instanceof TradingCoreError && error.code === 'needs_reconciliation') {
        log.error({ err: error }, 'signal needs manual reconciliation');
        res.status(409).json({ error: error.code });
        return;
      }
      sendError(res, error);
    }
  });

  // ============================================
  // Admin
  // ============================================

  router.post('/admin/trading', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    const body = ToggleBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      admin.setTrading(ctx, body.data.enabled);
      res.json({ tradingEnabled: body.data.enabled });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/admin/paper', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    const body = ToggleBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      admin.setPaper(ctx, body.data.enabled);
      res.json({ paperMode: body.data.enabled });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/admin/risk', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    const body = RiskBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const { param, value } = body.data;
      if (!admin.setLimit(ctx, param, value)) {
        res.status(400).json({ error: `risk param ${param} not recognized or invalid` });
        return;
      }
      res.json({ param, value, limits: core.risk.getLimits() });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/admin/strategy', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    const body = StrategyBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const { name, enabled } = body.data;
      if (!admin.setStrategyEnabled(ctx, name, enabled)) {
        res.status(400).json({ error: 'invalid strategy name' });
        return;
      }
      res.json({ name, enabled });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/admin/watchlist', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    const body = WatchlistBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const { action, marketId } = body.data;
      if (!admin.updateWatchlist(ctx, action, marketId)) {
        res.status(400).json({ error: 'invalid market id' });
        return;
      }
      res.json({ watchlist: [...ledger.getWatchlist()].sort() });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/admin/orders/:id/cancel', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    try {
      if (!admin.cancelOrder(ctx, req.params.id)) {
        res.status(404).json({ error: 'order not found' });
        return;
      }
      res.json({ orderId: req.params.id, cancelled: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * Feed realized/unrealized P&L into today's total (drives the daily loss limit)
   */
  router.post('/admin/pnl', (req: Request, res: Response) => {
    const ctx = authorize(req, res);
    if (!ctx) return;

    const body = PnlBody.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const dailyPnl = admin.recordPnl(ctx, body.data.realized, body.data.unrealized);
      res.json({ dailyPnl });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
