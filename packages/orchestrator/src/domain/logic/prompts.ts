/**
 * @file packages/orchestrator/src/domain/logic/prompts.ts
 * @description Prompt templates for the classifier and the secondary flows.
 *              Each template asks for a single JSON object.
 */

import { INTENT_CODES, type ConversationMessage } from '@ventanilla/shared';

export const SYSTEM_PROMPT =
  'Eres el orquestador de un asistente de atención ciudadana. Respondes siempre con un único objeto JSON válido, sin texto adicional.';

const INTENT_CLASSIFIER_TEMPLATE = `Clasifica la intención principal del mensaje del usuario.

Códigos de intención disponibles:
{intent_codes}

Devuelve únicamente:
{"intent": "<código>", "confidence": <0.0-1.0>, "reasoning": "<máximo 2 frases>", "detected_keywords": ["..."]}

Historial reciente:
{recent_messages}

MENSAJE: "{user_message}"`;

const CLARIFICATION_TEMPLATE = `No se pudo clasificar el mensaje con suficiente confianza ({confidence_score}).
Formula 1 o 2 preguntas claras para entender lo que necesita el usuario. No adivines la intención.

Devuelve únicamente:
{"questions": ["..."], "suggested_intents": ["..."], "reasoning": "..."}

Historial reciente:
{recent_messages}

MENSAJE: "{user_message}"`;

const ESCALATION_TEMPLATE = `Decide si el usuario necesita hablar con un agente humano (solicitud explícita, frustración, urgencia, casos complejos).

Devuelve únicamente:
{"escalate": true|false, "confidence": <0.0-1.0>, "reasons": ["..."], "urgency": "alta|media|baja"}

Historial reciente:
{recent_messages}

MENSAJE: "{user_message}"`;

const SUMMARIZATION_TEMPLATE = `Resume la conversación conservando solo lo necesario para continuar la atención.

Resumen previo:
{previous_summary}

Mensajes a resumir:
{conversation_history}

Devuelve únicamente:
{"summary": "<3-5 frases>", "key_points": ["..."], "user_preferences": {}, "pending_items": ["..."], "context_relevance_score": <0.0-1.0>}`;

/**
 * Replaces `{name}` placeholders. Unknown placeholders are left as they are,
 * which keeps the literal JSON braces in the templates intact.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match,
  );
}

export function formatMessages(messages: readonly ConversationMessage[]): string {
  if (messages.length === 0) return '(sin mensajes)';
  return messages.map((m) => `- ${m.role === 'user' ? 'Usuario' : 'Asistente'}: ${m.text}`).join('\n');
}

export function intentClassifierPrompt(message: string, recent: readonly ConversationMessage[]): string {
  return fillTemplate(INTENT_CLASSIFIER_TEMPLATE, {
    intent_codes: INTENT_CODES.map((code) => `- ${code}`).join('\n'),
    recent_messages: formatMessages(recent),
    user_message: message,
  });
}

export function clarificationPrompt(
  message: string,
  recent: readonly ConversationMessage[],
  confidence: number,
): string {
  return fillTemplate(CLARIFICATION_TEMPLATE, {
    confidence_score: confidence.toFixed(2),
    recent_messages: formatMessages(recent),
    user_message: message,
  });
}

export function escalationPrompt(message: string, recent: readonly ConversationMessage[]): string {
  return fillTemplate(ESCALATION_TEMPLATE, {
    recent_messages: formatMessages(recent),
    user_message: message,
  });
}

export function summarizationPrompt(
  previousSummary: string,
  overflow: readonly ConversationMessage[],
): string {
  return fillTemplate(SUMMARIZATION_TEMPLATE, {
    previous_summary: previousSummary || '(ninguno)',
    conversation_history: formatMessages(overflow),
  });
}
