/**
 * @file packages/orchestrator/src/application/flows/conversation-flows.ts
 * @description Replies the orchestrator produces itself: clarification
 *              questions, human escalation and general small talk.
 */

import { inject, singleton } from 'tsyringe';
import {
  ClarificationSchema,
  EscalationAssessmentSchema,
  parseModelJson,
  type Clarification,
  type ConversationMessage,
  type GeneralIntent,
  type Urgency,
} from '@ventanilla/shared';
import { TOKENS } from '../../domain/interfaces/tokens.js';
import type { TextGenerator } from '../../domain/interfaces/text-generator.interface.js';
import { errorMessage } from '../../domain/errors/app-error.js';
import { SYSTEM_PROMPT, clarificationPrompt, escalationPrompt } from '../../domain/logic/prompts.js';
import { MonitoringManager } from '../services/monitoring-manager.js';
import { Logger } from '../../logger.js';

const CLARIFICATION_WINDOW = 5;
const ESCALATION_WINDOW = 3;

export const FALLBACK_CLARIFICATION: Clarification = {
  questions: ['¿Podría explicar con más detalle lo que necesita?'],
  suggested_intents: ['ayuda'],
  reasoning: 'Error generando preguntas de clarificación',
};

export const HUMAN_AGENT_INFO = {
  name: 'Agente Humano',
  department: 'Atención al Ciudadano',
  estimated_wait_time: '5 minutos',
  contact_method: 'chat',
} as const;

export type EscalationReply =
  | {
      escalate_to_human: true;
      reason: string[];
      urgency: Urgency;
      human_agent_info: typeof HUMAN_AGENT_INFO;
      message: string;
    }
  | { escalate_to_human: false; message: string };

export interface GeneralReply {
  response: string;
  suggested_actions: string[];
}

const GENERAL_RESPONSES: Record<GeneralIntent, string> = {
  saludo: '¡Hola! Bienvenido a Ventanilla, su asistente ciudadano. ¿En qué puedo ayudarle hoy?',
  despedida:
    '¡Hasta luego! Gracias por usar Ventanilla. Si necesita algo más, no dude en contactarnos.',
  agradecimiento: '¡De nada! Estoy para servirle. ¿En qué más puedo ayudarle?',
};

export const SUGGESTED_ACTIONS = ['tramites', 'pqrsd', 'programas_sociales', 'notificaciones'];

@singleton()
export class ConversationFlows {
  constructor(
    @inject(TOKENS.TextGenerator) private generator: TextGenerator,
    @inject(MonitoringManager) private monitoring: MonitoringManager,
    @inject(Logger) private logger: Logger,
  ) {}

  /**
   * Asks the model for follow-up questions; the fixed question set is used
   * when the model fails or replies with something unusable.
   */
  async clarify(
    message: string,
    recent: readonly ConversationMessage[],
    confidence: number,
  ): Promise<Clarification> {
    try {
      const raw = await this.generator.generate(
        clarificationPrompt(message, recent.slice(-CLARIFICATION_WINDOW), confidence),
        SYSTEM_PROMPT,
      );
      return ClarificationSchema.parse(parseModelJson(raw));
    } catch (err) {
      this.logger.error('[Flows] Error handling clarification', {
        event: 'clarification_error',
        error: errorMessage(err),
      });
      this.monitoring.record('clarification_error', 1);
      return FALLBACK_CLARIFICATION;
    }
  }

  /**
   * Decides whether to hand the conversation to a person. When the decision
   * itself fails the user is handed off.
   */
  async escalate(message: string, recent: readonly ConversationMessage[]): Promise<EscalationReply> {
    try {
      const raw = await this.generator.generate(
        escalationPrompt(message, recent.slice(-ESCALATION_WINDOW)),
        SYSTEM_PROMPT,
      );
      const assessment = EscalationAssessmentSchema.parse(parseModelJson(raw));

      if (!assessment.escalate) {
        return {
          escalate_to_human: false,
          message: 'Entiendo su situación. Puedo ayudarle con eso. ¿Qué necesita exactamente?',
        };
      }
      return {
        escalate_to_human: true,
        reason: assessment.reasons.length > 0 ? assessment.reasons : ['Solicitud de usuario'],
        urgency: assessment.urgency,
        human_agent_info: HUMAN_AGENT_INFO,
        message:
          'Voy a transferirlo con un agente humano para que lo atienda personalmente. Por favor espere unos momentos.',
      };
    } catch (err) {
      this.logger.error('[Flows] Error handling human escalation', {
        event: 'escalation_error',
        error: errorMessage(err),
      });
      this.monitoring.record('escalation_error', 1);
      return {
        escalate_to_human: true,
        reason: ['Error en detección de escalación'],
        urgency: 'media',
        human_agent_info: HUMAN_AGENT_INFO,
        message: 'Voy a transferirlo con un agente humano para que lo atienda personalmente.',
      };
    }
  }

  generalReply(intent: GeneralIntent): GeneralReply {
    return { response: GENERAL_RESPONSES[intent], suggested_actions: [...SUGGESTED_ACTIONS] };
  }
}
