/**
 * @file packages/shared/src/types.ts
 * @description Session, message and model-output schemas shared by the orchestrator and its clients.
 */

import { z } from 'zod';

// ─── Conversation Messages ────────────────────────────────────

export const MessageRoleSchema = z.enum(['user', 'agent']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const ConversationMessageSchema = z.object({
  role: MessageRoleSchema,
  text: z.string(),
  timestamp: z.string(),
});
export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

// ─── Session ──────────────────────────────────────────────────

export const SessionMetadataSchema = z.object({
  ipAddress: z.string().optional(),
  userAgent: z.string().optional(),
  environment: z.string().optional(),
});
export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;

export const SessionRecordSchema = z.object({
  id: z.string(),
  userId: z.string(),
  chatId: z.string(),
  createdAt: z.number(),
  lastActive: z.number(),
  messages: z.array(ConversationMessageSchema).default([]),
  memorySummary: z.string().default(''),
  userPreferences: z.record(z.unknown()).default({}),
  contextRelevanceScore: z.number().default(0),
  expiresAt: z.number(),
  metadata: SessionMetadataSchema.default({}),
});
export type SessionRecord = z.infer<typeof SessionRecordSchema>;

/** Fields a store may overwrite in place; identity and ownership never change. */
export type SessionPatch = Partial<
  Pick<
    SessionRecord,
    'lastActive' | 'messages' | 'memorySummary' | 'userPreferences' | 'contextRelevanceScore'
  >
>;

// ─── Intent Classification ────────────────────────────────────

/** Raw classifier output as the model is instructed to emit it. */
export const IntentClassificationPayloadSchema = z.object({
  intent: z.string().min(1),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  detected_keywords: z.array(z.string()),
});

export interface IntentClassification {
  intent: string;
  confidence: number;
  reasoning: string;
  detectedKeywords: string[];
}

// ─── Secondary Flows ──────────────────────────────────────────

export const ClarificationSchema = z.object({
  questions: z.array(z.string()).min(1),
  suggested_intents: z.array(z.string()).default([]),
  reasoning: z.string().default(''),
});
export type Clarification = z.infer<typeof ClarificationSchema>;

export const UrgencySchema = z.enum(['alta', 'media', 'baja']);
export type Urgency = z.infer<typeof UrgencySchema>;

export const EscalationAssessmentSchema = z.object({
  escalate: z.boolean(),
  confidence: z.number().min(0).max(1).optional(),
  reasons: z.array(z.string()).default([]),
  urgency: UrgencySchema.default('media'),
});
export type EscalationAssessment = z.infer<typeof EscalationAssessmentSchema>;

export const ContextSummarySchema = z.object({
  summary: z.string(),
  key_points: z.array(z.string()).default([]),
  user_preferences: z.record(z.unknown()).default({}),
  pending_items: z.array(z.string()).default([]),
  context_relevance_score: z.number().min(0).max(1).default(0),
});
export type ContextSummary = z.infer<typeof ContextSummarySchema>;

// ─── Telemetry ────────────────────────────────────────────────

export interface Metric {
  name: string;
  value: number;
  timestamp: number;
  tags: Record<string, string>;
}

export interface Alert {
  alertType: string;
  message: string;
  timestamp: number;
  service: string;
}
