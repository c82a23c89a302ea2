import { describe, it, expect, vi } from 'vitest';
import type { ProviderAdapter } from '@memsift/providers';
import { Session } from './session.js';

const provider: ProviderAdapter = {
  name: 'openai',
  kind: 'openai',
  config: {
    name: 'openai',
    model: 'gpt-4o-mini',
    api_key: 'test-key',
    enabled: true,
    temperature: 0,
    max_tokens: 256,
    priority: 1,
  },
  complete: vi.fn(),
  isAvailable: () => true,
};

describe('Session', () => {
  it('should start with empty counters', () => {
    const session = new Session('agent-1', provider);

    expect(session.sessionId).toBe('agent-1');
    expect(session.provider).toBe(provider);
    expect(session.contextTokens).toBe(0);
    expect(session.queryCount).toBe(0);
    expect(session.lastUsedAt).toEqual(session.createdAt);
  });

  it('should accumulate queries', () => {
    const session = new Session('agent-1', provider);

    session.recordQuery(40);
    session.recordQuery(25);

    expect(session.queryCount).toBe(2);
    expect(session.contextTokens).toBe(65);
  });

  it('should only ask for cleanup once strictly over the limit', () => {
    const session = new Session('agent-1', provider);
    session.recordQuery(100);

    expect(session.shouldCleanup(100)).toBe(false);
    expect(session.shouldCleanup(99)).toBe(true);
  });

  it('should reset counters but keep identity and provider', () => {
    const session = new Session('agent-1', provider);
    session.recordQuery(500);

    session.resetContext();
    session.resetContext();

    expect(session.contextTokens).toBe(0);
    expect(session.queryCount).toBe(0);
    expect(session.sessionId).toBe('agent-1');
    expect(session.provider).toBe(provider);
  });

  it('should produce a plain snapshot', () => {
    const session = new Session('agent-1', provider, new Date('2024-01-15T10:30:00.000Z'));

    expect(session.toSnapshot()).toEqual({
      sessionId: 'agent-1',
      provider: 'openai',
      model: 'gpt-4o-mini',
      createdAt: '2024-01-15T10:30:00.000Z',
      lastUsedAt: '2024-01-15T10:30:00.000Z',
      contextTokens: 0,
      queryCount: 0,
    });
  });
});
