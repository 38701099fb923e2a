// src/core/common/integration-events/events.types.spec.ts
import { buildEnvelope } from './events.types';

describe('buildEnvelope', () => {
  it('默认填充 schemaVersion=1、occurredAt、dedupKey', () => {
    const env = buildEnvelope({
      type: 'GameSessionSettled',
      aggregateType: 'game_session',
      aggregateId: 'match-42',
    });
    expect(env.type).toBe('GameSessionSettled');
    expect(env.aggregateType).toBe('game_session');
    expect(env.aggregateId).toBe('match-42');
    expect(env.schemaVersion).toBe(1);
    expect(env.payload).toEqual({});
    expect(typeof env.occurredAt).toBe('string');
    expect(String(env.dedupKey)).toBe('GameSessionSettled:match-42:1');
    expect(Object.isFrozen(env)).toBe(true);
  });

  it('支持覆盖 schemaVersion、payload、correlationId 与 deliverAfter', () => {
    const occurredAt = new Date('2026-01-02T03:04:05.000Z');
    const deliverAfter = new Date('2026-01-02T03:05:05.000Z');
    const env = buildEnvelope({
      type: 'PayoutQuoted',
      aggregateType: 'payout_quote',
      aggregateId: 7,
      schemaVersion: 2,
      payload: { amount: 12.5, currency: 'usd' },
      correlationId: 'req-1',
      occurredAt,
      deliverAfter,
      priority: 5,
    });
    expect(env.schemaVersion).toBe(2);
    expect(env.payload).toEqual({ amount: 12.5, currency: 'usd' });
    expect(env.correlationId).toBe('req-1');
    expect(String(env.occurredAt)).toBe('2026-01-02T03:04:05.000Z');
    expect(String(env.deliverAfter)).toBe('2026-01-02T03:05:05.000Z');
    expect(env.priority).toBe(5);
    expect(String(env.dedupKey)).toBe('PayoutQuoted:7:2');
  });

  it('允许定制 dedupKey', () => {
    const env = buildEnvelope({
      type: 'GameSessionSettled',
      aggregateType: 'game_session',
      aggregateId: 99,
      dedupKey: 'custom-key',
    });
    expect(String(env.dedupKey)).toBe('custom-key');
  });
});
