import { describe, expect, it } from 'vitest';

import { ExecutionEngine } from '../execution/engine.js';
import { PersistenceError } from '../errors.js';
import { MemoryLedger } from '../ledger/memory.js';
import { RiskEngine } from '../risk/engine.js';
import { createSignal } from '../signals/types.js';
import { AdminService } from './service.js';
import { isValidMarketId, isValidStrategyName, sanitizeForLog } from './validation.js';

const ADMIN = { actorId: '1001', correlationId: 'req-1' };

function setup(ledger = new MemoryLedger()) {
  const risk = new RiskEngine();
  const execution = new ExecutionEngine({ ledger });
  const admin = new AdminService(risk, execution, ledger);
  return { risk, execution, ledger, admin };
}

describe('AdminService', () => {
  it('enables trading and journals it', () => {
    const { admin, risk, ledger } = setup();
    admin.setTrading(ADMIN, true);

    expect(risk.isTradingEnabled()).toBe(true);
    expect(ledger.getTradingEnabled()).toBe(true);
    expect(ledger.getAuditLog()).toMatchObject([
      { actorId: '1001', action: 'trade_toggle', details: 'enabled=true', correlationId: 'req-1' },
    ]);
  });

  it('leaves the engine disabled when the flag cannot be stored', () => {
    class BrokenLedger extends MemoryLedger {
      override setTradingEnabled(_enabled: boolean): void {
        throw new PersistenceError('set trading enabled failed: database is locked');
      }
    }
    const { admin, risk, ledger } = setup(new BrokenLedger());

    expect(() => admin.setTrading(ADMIN, true)).toThrow(PersistenceError);
    expect(risk.isTradingEnabled()).toBe(false);
    expect(ledger.getAuditLog()).toEqual([]);
  });

  it('switches paper mode', () => {
    const { admin, execution, ledger } = setup();
    admin.setPaper(ADMIN, false);
    expect(execution.isPaper()).toBe(false);
    expect(ledger.getAuditLog()[0]).toMatchObject({ action: 'paper_toggle', details: 'paper=false' });
  });

  it('sets a known risk limit', () => {
    const { admin, risk, ledger } = setup();
    expect(admin.setLimit(ADMIN, 'max_order_size', 25)).toBe(true);
    expect(risk.getLimits().maxOrderSize).toBe(25);
    expect(ledger.getAuditLog()[0]).toMatchObject({ action: 'risk_param_set', details: 'max_order_size=25' });
  });

  it('sets a strategy cap', () => {
    const { admin, risk } = setup();
    expect(admin.setLimit(ADMIN, 'strategy.momentum', 5)).toBe(true);
    expect(risk.getLimits().strategyCaps).toEqual({ momentum: 5 });
  });

  it('refuses unknown or invalid limits without journaling', () => {
    const { admin, risk, ledger } = setup();
    const before = risk.getLimits();

    expect(admin.setLimit(ADMIN, 'max_leverage', 3)).toBe(false);
    expect(admin.setLimit(ADMIN, 'max_order_size', -1)).toBe(false);
    expect(admin.setLimit(ADMIN, 'max order size', 1)).toBe(false);

    expect(risk.getLimits()).toBe(before);
    expect(ledger.getAuditLog()).toEqual([]);
  });

  it('toggles strategies', () => {
    const { admin, ledger } = setup();
    expect(admin.setStrategyEnabled(ADMIN, 'momentum', false)).toBe(true);
    expect(ledger.getStrategyEnabled('momentum')).toBe(false);
    expect(ledger.getAuditLog()[0]?.details).toBe('strategy=momentum enabled=false');

    expect(admin.setStrategyEnabled(ADMIN, 'bad name; drop', false)).toBe(false);
    expect(ledger.getAuditLog()).toHaveLength(1);
  });

  it('updates the watchlist', () => {
    const { admin, ledger } = setup();
    expect(admin.updateWatchlist(ADMIN, 'add', 'market-a')).toBe(true);
    expect(admin.updateWatchlist(ADMIN, 'add', 'market-b')).toBe(true);
    expect(admin.updateWatchlist(ADMIN, 'remove', 'market-a')).toBe(true);
    expect(admin.updateWatchlist(ADMIN, 'add', '../etc')).toBe(false);

    expect([...ledger.getWatchlist()]).toEqual(['market-b']);
    expect(ledger.getAuditLog().map(entry => entry.details)).toEqual([
      'remove market=market-a',
      'add market=market-b',
      'add market=market-a',
    ]);
  });

  it('journals only cancellations that happened', async () => {
    const { admin, execution, risk, ledger } = setup();
    risk.setTrading(true);
    const signal = createSignal({ strategy: 'momentum', marketId: 'market-a', outcomeId: 'yes', action: 'buy', confidence: 0.7 });
    const result = await execution.submit(signal, { approved: true, reason: 'approved' });
    const orderId = result.order?.orderId ?? '';

    expect(admin.cancelOrder(ADMIN, 'order-unknown')).toBe(false);
    expect(ledger.getAuditLog()).toEqual([]);

    expect(admin.cancelOrder(ADMIN, orderId)).toBe(true);
    expect(ledger.getAuditLog()[0]?.details).toBe(`order=${orderId}`);
  });

  it('records P&L and returns the day total', () => {
    const { admin, ledger } = setup();
    expect(admin.recordPnl(ADMIN, -20, 5)).toBe(-15);
    expect(admin.recordPnl(ADMIN, -10, 0)).toBe(-25);
    expect(ledger.getAuditLog()[0]).toMatchObject({ action: 'pnl_update', details: 'realized=-10 unrealized=0' });
  });

  it('reports status', () => {
    const { admin, ledger } = setup();
    ledger.addToWatchlist('market-b');
    ledger.addToWatchlist('market-a');
    ledger.setStrategyEnabled('momentum', false);
    ledger.updateDailyPnl(-12.5, 0);

    expect(admin.status()).toMatchObject({
      tradingEnabled: false,
      paperMode: true,
      openOrders: [],
      watchlist: ['market-a', 'market-b'],
      strategies: { momentum: false },
      dailyPnl: -12.5,
    });
  });

  it('records a null correlation id when none is given', () => {
    const { admin, ledger } = setup();
    admin.setPaper({ actorId: '1002' }, true);
    expect(ledger.getAuditLog()[0]?.correlationId).toBeNull();
  });
});

describe('admin validation', () => {
  it('accepts plain identifiers', () => {
    expect(isValidStrategyName('mean_reversion-2')).toBe(true);
    expect(isValidMarketId('0xabc123')).toBe(true);
  });

  it('rejects empty and punctuated identifiers', () => {
    expect(isValidStrategyName('')).toBe(false);
    expect(isValidMarketId('market a')).toBe(false);
  });

  it('strips control characters and truncates', () => {
    expect(sanitizeForLog('line\nbreak')).toBe('line\nbreak');
    expect(sanitizeForLog('bell\u0007')).toBe('bell?');
    expect(sanitizeForLog('abcdef', 3)).toBe('abc...');
  });
});
