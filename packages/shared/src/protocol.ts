/**
 * @file packages/shared/src/protocol.ts
 * @description Wire formats: the inbound process request and the agent dispatch contract.
 */

import { z } from 'zod';
import type { ConversationMessage } from './types.js';

// ─── Inbound Requests ─────────────────────────────────────────

const IdentifierSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

export const ProcessRequestSchema = z.object({
  session_id: IdentifierSchema,
  user_id: IdentifierSchema,
  text: z.string().default(''),
  chat_id: IdentifierSchema.optional(),
});
export type ProcessRequest = z.infer<typeof ProcessRequestSchema>;

export const CreateSessionRequestSchema = z.object({
  user_id: IdentifierSchema,
  chat_id: IdentifierSchema,
});
export type CreateSessionRequest = z.infer<typeof CreateSessionRequestSchema>;

export type RequestParseResult<T> =
  | { ok: true; request: T }
  | { ok: false; reason: 'invalid_payload' | 'missing_identity' };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || String(value).trim() === '';

/**
 * Parses a process request body. A body that is not an object is an invalid
 * payload; an object lacking either identifier is reported separately.
 */
export function parseProcessRequest(payload: unknown): RequestParseResult<ProcessRequest> {
  if (!isRecord(payload)) return { ok: false, reason: 'invalid_payload' };
  if (isBlank(payload.session_id) || isBlank(payload.user_id)) {
    return { ok: false, reason: 'missing_identity' };
  }
  const parsed = ProcessRequestSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, reason: 'invalid_payload' };
  return { ok: true, request: parsed.data };
}

export function parseCreateSessionRequest(
  payload: unknown,
): RequestParseResult<CreateSessionRequest> {
  if (!isRecord(payload)) return { ok: false, reason: 'invalid_payload' };
  if (isBlank(payload.user_id) || isBlank(payload.chat_id)) {
    return { ok: false, reason: 'missing_identity' };
  }
  const parsed = CreateSessionRequestSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, reason: 'invalid_payload' };
  return { ok: true, request: parsed.data };
}

// ─── Agent Dispatch ───────────────────────────────────────────

export interface AgentConversationContext {
  recent_messages: ConversationMessage[];
  memory_summary: string;
  user_preferences: Record<string, unknown>;
  context_relevance_score: number;
}

/** Body of `POST {endpoint}/process`. */
export interface AgentRequest {
  user_message: string;
  conversation_context: AgentConversationContext;
  intent: string;
  timestamp: string;
  session_id: string;
}

export function serializeAgentRequest(request: AgentRequest): string {
  return JSON.stringify(request);
}

// ─── Model Output ─────────────────────────────────────────────

/**
 * Extracts the JSON object a model returned, tolerating a surrounding
 * Markdown code fence. Throws on anything that is not valid JSON.
 */
export function parseModelJson(raw: string): unknown {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return JSON.parse(fenced ? fenced[1] : trimmed);
}
