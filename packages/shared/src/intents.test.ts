import { describe, it, expect } from 'vitest';
import {
  AGENT_KINDS,
  INTENT_CODES,
  agentKindFor,
  branchFor,
  intentsOf,
  isIntentCode,
} from './intents.js';

describe('Intent vocabulary', () => {
  it('maps every agent intent back to its owner', () => {
    for (const kind of AGENT_KINDS) {
      for (const intent of intentsOf(kind)) {
        expect(agentKindFor(intent)).toBe(kind);
      }
    }
  });

  it('shares one agent between several intents', () => {
    expect(agentKindFor('tramite_buscar')).toBe('tramites');
    expect(agentKindFor('tramite_costo')).toBe('tramites');
    expect(agentKindFor('notificacion_pico_placa')).toBe('notificaciones');
  });

  it('has no agent for conversational or unknown intents', () => {
    expect(agentKindFor('saludo')).toBeNull();
    expect(agentKindFor('ayuda')).toBeNull();
    expect(agentKindFor('pedir_pizza')).toBeNull();
  });

  it('contains no duplicate codes', () => {
    expect(new Set(INTENT_CODES).size).toBe(INTENT_CODES.length);
    expect(INTENT_CODES).toHaveLength(24);
    expect(isIntentCode('clarificacion')).toBe(true);
    expect(isIntentCode('CLARIFICACION')).toBe(false);
  });

  it('selects the conversation branch', () => {
    expect(branchFor('clarificacion')).toEqual({ kind: 'clarify' });
    expect(branchFor('human_escalation')).toEqual({ kind: 'escalate' });
    expect(branchFor('despedida')).toEqual({ kind: 'general', intent: 'despedida' });
    expect(branchFor('pqrsd_crear')).toEqual({ kind: 'route', intent: 'pqrsd_crear' });
    expect(branchFor('ayuda')).toEqual({ kind: 'route', intent: 'ayuda' });
  });
});
