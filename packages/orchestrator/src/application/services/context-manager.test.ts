import 'reflect-metadata';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  OrchestratorConfigSchema,
  type ConversationMessage,
  type SessionRecord,
} from '@ventanilla/shared';
import { ContextManager, message } from './context-manager.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { MemorySessionStore } from '../../infrastructure/repositories/memory-session-store.js';
import type { TextGenerator } from '../../domain/interfaces/text-generator.interface.js';
import type { SessionStore } from '../../domain/interfaces/session-store.interface.js';
import { Logger } from '../../logger.js';

const NOW = Date.parse('2026-03-01T10:00:00Z');

function turns(count: number): SessionRecord['messages'] {
  return Array.from({ length: count }, (_, i): ConversationMessage => ({
    role: i % 2 === 0 ? 'user' : 'agent',
    text: `m${i}`,
    timestamp: new Date(NOW - (count - i) * 1000).toISOString(),
  }));
}

describe('ContextManager', () => {
  let store: MemorySessionStore;
  let generate: ReturnType<typeof vi.fn>;
  let manager: ContextManager;

  const build = (sessionStore: SessionStore, summarizeOverflow = true) => {
    const generator: TextGenerator = { generate };
    return new ContextManager(
      sessionStore,
      generator,
      new ConfigService(
        OrchestratorConfigSchema.parse({ context: { maxHistory: 4, summarizeOverflow } }),
      ),
      new Logger({ level: 'silent', pretty: false }),
    );
  };

  const seed = async (messages: SessionRecord['messages']) => {
    await store.create({
      id: 'session_ctx',
      userId: 'user-1',
      chatId: 'chat-1',
      createdAt: NOW - 10_000,
      lastActive: NOW - 10_000,
      messages,
      memorySummary: 'resumen previo',
      userPreferences: { barrio: 'Laureles' },
      contextRelevanceScore: 0.5,
      expiresAt: NOW + 10_000_000,
      metadata: {},
    });
  };

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    store = new MemorySessionStore();
    generate = vi.fn();
    manager = build(store);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('load', () => {
    it('returns at most maxHistory stored messages plus the incoming one', async () => {
      await seed(turns(6));

      const context = await manager.load('session_ctx', 'nuevo mensaje');

      expect(context.recentMessages.map((m) => m.text)).toEqual(['m2', 'm3', 'm4', 'm5', 'nuevo mensaje']);
      expect(context.recentMessages[4]).toEqual({
        role: 'user',
        text: 'nuevo mensaje',
        timestamp: '2026-03-01T10:00:00.000Z',
      });
      expect(context.memorySummary).toBe('resumen previo');
      expect((await store.get('session_ctx'))?.messages).toHaveLength(6);
    });

    it('keeps the incoming message when the session is missing', async () => {
      const context = await manager.load('session_missing', 'hola');
      expect(context).toEqual({
        sessionId: 'session_missing',
        recentMessages: [{ role: 'user', text: 'hola', timestamp: '2026-03-01T10:00:00.000Z' }],
        memorySummary: '',
        userPreferences: {},
        contextRelevanceScore: 0,
        degraded: true,
      });
    });

    it('marks the context degraded when the store fails', async () => {
      const failing = build({
        create: vi.fn(),
        get: vi.fn().mockRejectedValue(new Error('timeout')),
        update: vi.fn(),
        delete: vi.fn(),
        findByUser: vi.fn(),
        findStale: vi.fn(),
        ping: vi.fn(),
      });
      const context = await failing.load('session_ctx', 'hola');

      expect(context.degraded).toBe(true);
      expect(context.recentMessages.map((m) => [m.role, m.text])).toEqual([['user', 'hola']]);
    });
  });

  describe('commit', () => {
    it('keeps only the newest maxHistory messages and bumps lastActive', async () => {
      await seed([]);

      await manager.commit('session_ctx', turns(7));

      const stored = await store.get('session_ctx');
      expect(stored?.messages.map((m) => m.text)).toEqual(['m3', 'm4', 'm5', 'm6']);
      expect(stored?.lastActive).toBe(NOW);
      expect(stored?.memorySummary).toBe('resumen previo');
    });

    it('fails when the session no longer exists', async () => {
      await expect(manager.commit('session_gone', turns(1))).rejects.toThrow('Session not found');
    });
  });

  describe('commitTurn', () => {
    it('appends the reply without summarising when nothing overflows', async () => {
      await seed(turns(2));
      const context = await manager.load('session_ctx', 'hola');

      await manager.commitTurn(context, 'respuesta');

      expect((await store.get('session_ctx'))?.messages.map((m) => m.text)).toEqual([
        'm0',
        'm1',
        'hola',
        'respuesta',
      ]);
      expect(generate).not.toHaveBeenCalled();
    });

    it('folds overflowing messages into the memory summary', async () => {
      generate.mockResolvedValue(
        '```json\n{"summary":"nuevo resumen","user_preferences":{"idioma":"es"},"context_relevance_score":0.8}\n```',
      );
      await seed(turns(4));
      const context = await manager.load('session_ctx', 'hola');

      await manager.commitTurn(context, 'respuesta');

      const stored = await store.get('session_ctx');
      expect(stored?.messages.map((m) => m.text)).toEqual(['m2', 'm3', 'hola', 'respuesta']);
      expect(stored?.memorySummary).toBe('nuevo resumen');
      expect(stored?.userPreferences).toEqual({ barrio: 'Laureles', idioma: 'es' });
      expect(stored?.contextRelevanceScore).toBe(0.8);
      expect(generate.mock.calls[0][0]).toContain('- Usuario: m0\n- Asistente: m1');
    });

    it('still commits when summarisation fails', async () => {
      generate.mockRejectedValue(new Error('provider down'));
      await seed(turns(4));
      const context = await manager.load('session_ctx', 'hola');

      await manager.commitTurn(context, null);

      const stored = await store.get('session_ctx');
      expect(stored?.messages.map((m) => m.text)).toEqual(['m1', 'm2', 'm3', 'hola']);
      expect(stored?.memorySummary).toBe('resumen previo');
    });
  });

  describe('commitTurn after a failed load', () => {
    it('appends the turn to the stored history instead of replacing it', async () => {
      await seed(turns(2));
      vi.spyOn(store, 'get').mockRejectedValueOnce(new Error('connection reset'));
      const context = await manager.load('session_ctx', 'hola');

      await manager.commitTurn(context, 'respuesta');

      const stored = await store.get('session_ctx');
      expect(stored?.messages.map((m) => m.text)).toEqual(['m0', 'm1', 'hola', 'respuesta']);
      expect(stored?.memorySummary).toBe('resumen previo');
    });

    it('folds overflow using the stored summary', async () => {
      generate.mockResolvedValue('{"summary":"resumen nuevo"}');
      await seed(turns(4));
      vi.spyOn(store, 'get').mockRejectedValueOnce(new Error('connection reset'));
      const context = await manager.load('session_ctx', 'hola');

      await manager.commitTurn(context, 'respuesta');

      const stored = await store.get('session_ctx');
      expect(stored?.messages.map((m) => m.text)).toEqual(['m2', 'm3', 'hola', 'respuesta']);
      expect(stored?.memorySummary).toBe('resumen nuevo');
      expect(stored?.userPreferences).toEqual({ barrio: 'Laureles' });
      expect(generate.mock.calls[0][0]).toContain('resumen previo');
    });

    it('fails when the session is gone', async () => {
      const context = await manager.load('session_missing', 'hola');
      await expect(manager.commitTurn(context, 'respuesta')).rejects.toThrow('Session not found');
    });
  });

  it('builds messages stamped with the current time', () => {
    expect(message('agent', 'ok')).toEqual({
      role: 'agent',
      text: 'ok',
      timestamp: '2026-03-01T10:00:00.000Z',
    });
  });
});
