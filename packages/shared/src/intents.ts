/**
 * @file packages/shared/src/intents.ts
 * @description Closed intent vocabulary and the agent kind that serves each routable intent.
 */

import { z } from 'zod';

// ─── Agent Kinds ──────────────────────────────────────────────

export const AgentKindSchema = z.enum(['tramites', 'pqrsd', 'programas', 'notificaciones']);
export type AgentKind = z.infer<typeof AgentKindSchema>;

export const AGENT_KINDS = AgentKindSchema.options;

// ─── Intent Codes ─────────────────────────────────────────────

/** Intents served by a downstream agent, grouped by the agent that owns them. */
export const AGENT_INTENTS = {
  tramites: [
    'tramite_buscar',
    'tramite_requisitos',
    'tramite_costo',
    'tramite_plazo',
    'tramite_oficina',
    'tramite_estado',
  ],
  pqrsd: ['pqrsd_crear', 'pqrsd_estado', 'pqrsd_tipos'],
  programas: [
    'programa_buscar',
    'programa_elegibilidad',
    'programa_inscripcion',
    'programa_beneficios',
  ],
  notificaciones: [
    'notificacion_pico_placa',
    'notificacion_cierre_vial',
    'notificacion_evento',
    'notificacion_alerta',
  ],
} as const satisfies Record<AgentKind, readonly string[]>;

export type AgentIntent = (typeof AGENT_INTENTS)[AgentKind][number];

export const GENERAL_INTENTS = ['saludo', 'despedida', 'agradecimiento'] as const;
export type GeneralIntent = (typeof GENERAL_INTENTS)[number];

export const CLARIFICATION_INTENT = 'clarificacion';
export const ESCALATION_INTENT = 'human_escalation';

/** Recognised by the classifier but owned by no agent. */
export const UNROUTED_INTENTS = ['ayuda', 'transaccion_completada'] as const;

export type IntentCode =
  | AgentIntent
  | GeneralIntent
  | typeof CLARIFICATION_INTENT
  | typeof ESCALATION_INTENT
  | (typeof UNROUTED_INTENTS)[number];

export function intentsOf(kind: AgentKind): readonly AgentIntent[] {
  return AGENT_INTENTS[kind];
}

const INTENT_TO_AGENT = new Map<string, AgentKind>(
  AGENT_KINDS.flatMap((kind) => intentsOf(kind).map((intent): [string, AgentKind] => [intent, kind])),
);

export const INTENT_CODES: readonly IntentCode[] = [
  ...AGENT_KINDS.flatMap((kind) => intentsOf(kind)),
  ...GENERAL_INTENTS,
  CLARIFICATION_INTENT,
  ESCALATION_INTENT,
  ...UNROUTED_INTENTS,
];

/**
 * Resolves the agent that owns an intent, or null when no agent serves it.
 */
export function agentKindFor(intent: string): AgentKind | null {
  return INTENT_TO_AGENT.get(intent) ?? null;
}

const GENERAL_INTENT_SET: ReadonlySet<string> = new Set(GENERAL_INTENTS);
const INTENT_CODE_SET: ReadonlySet<string> = new Set(INTENT_CODES);

export function isGeneralIntent(intent: string): intent is GeneralIntent {
  return GENERAL_INTENT_SET.has(intent);
}

export function isIntentCode(intent: string): intent is IntentCode {
  return INTENT_CODE_SET.has(intent);
}

// ─── Conversation Branches ────────────────────────────────────

export type ConversationBranch =
  | { kind: 'clarify' }
  | { kind: 'escalate' }
  | { kind: 'general'; intent: GeneralIntent }
  | { kind: 'route'; intent: string };

/**
 * Selects the branch of the turn state machine that handles an intent.
 * Everything that is not a conversational intent goes to the router, which
 * decides whether an agent exists for it.
 */
export function branchFor(intent: string): ConversationBranch {
  if (intent === CLARIFICATION_INTENT) return { kind: 'clarify' };
  if (intent === ESCALATION_INTENT) return { kind: 'escalate' };
  if (isGeneralIntent(intent)) return { kind: 'general', intent };
  return { kind: 'route', intent };
}
