/**
 * @file packages/orchestrator/src/domain/logic/intent-classifier.ts
 * @description LLM-backed intent classification with confidence gating.
 */

import { inject, singleton } from 'tsyringe';
import {
  CLARIFICATION_INTENT,
  IntentClassificationPayloadSchema,
  parseModelJson,
  type ConversationMessage,
  type IntentClassification,
} from '@ventanilla/shared';
import { TOKENS } from '../interfaces/tokens.js';
import type { TextGenerator } from '../interfaces/text-generator.interface.js';
import { ClassificationError, errorMessage } from '../errors/app-error.js';
import { SYSTEM_PROMPT, intentClassifierPrompt } from './prompts.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger } from '../../logger.js';

/**
 * Parses the classifier's JSON reply.
 * @throws ClassificationError when the reply is not JSON or a field is missing or out of range.
 */
export function parseClassification(raw: string): IntentClassification {
  let json: unknown;
  try {
    json = parseModelJson(raw);
  } catch (err) {
    throw new ClassificationError(`Invalid classifier JSON: ${errorMessage(err)}`);
  }

  const parsed = IntentClassificationPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ClassificationError(
      `Invalid classifier payload: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
    );
  }

  return {
    intent: parsed.data.intent,
    confidence: parsed.data.confidence,
    reasoning: parsed.data.reasoning,
    detectedKeywords: parsed.data.detected_keywords,
  };
}

@singleton()
export class IntentClassifier {
  private readonly threshold: number;
  private readonly window: number;

  constructor(
    @inject(TOKENS.TextGenerator) private generator: TextGenerator,
    @inject(ConfigService) config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    this.threshold = config.get('classifier').confidenceThreshold;
    this.window = config.get('context').classifierWindow;
  }

  /**
   * Classifies `message` using the trailing turns of `context`. Never throws:
   * low confidence and failures both resolve to the clarification intent.
   */
  async classify(
    message: string,
    context: readonly ConversationMessage[],
  ): Promise<IntentClassification> {
    try {
      const raw = await this.generator.generate(
        intentClassifierPrompt(message, context.slice(-this.window)),
        SYSTEM_PROMPT,
      );
      const result = parseClassification(raw);

      if (result.confidence < this.threshold) {
        return {
          ...result,
          intent: CLARIFICATION_INTENT,
          reasoning: `Confianza baja (${result.confidence.toFixed(2)} < ${this.threshold})`,
        };
      }
      return result;
    } catch (err) {
      this.logger.error('[IntentClassifier] Classification failed', {
        event: 'classification_error',
        error: errorMessage(err),
      });
      return {
        intent: CLARIFICATION_INTENT,
        confidence: 0,
        reasoning: `Error en clasificación: ${errorMessage(err)}`,
        detectedKeywords: [],
      };
    }
  }
}
