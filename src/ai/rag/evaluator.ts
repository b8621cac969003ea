/**
 * KubeQuery AI - Relevance Evaluator
 * ==================================
 * Second LLM pass grading the generated answer against the question.
 */

import { z } from 'zod';
import type { CompletionGateway } from '../llm/CompletionGateway';
import type { LLMCallOptions } from '../llm/types';
import { createError } from '../../lib/errors';
import { createContextLogger } from '../../utils/logger';
import { buildEvaluationPrompt } from './prompts';
import { RELEVANCE_LABELS, type RelevanceEvaluation, type RelevanceVerdict } from './types';

const evaluatorLogger = createContextLogger('evaluator');

export const NO_EXPLANATION = 'No explanation provided';

const evaluationSchema = z.object({
  Relevance: z.enum(RELEVANCE_LABELS, {
    errorMap: (issue, ctx) =>
      issue.code === 'invalid_type' && ctx.data === undefined
        ? { message: 'missing "Relevance" key' }
        : { message: `"Relevance" must be one of ${RELEVANCE_LABELS.join(', ')}` },
  }),
  Explanation: z.unknown(),
});

function describeExplanation(value: unknown): string {
  if (typeof value === 'string') return value || NO_EXPLANATION;
  if (value === null || value === undefined) return NO_EXPLANATION;
  return JSON.stringify(value);
}

export interface ParsedEvaluation {
  verdict: RelevanceVerdict;
  explanation: string;
}

/**
 * Parse the evaluator's raw text. Never throws: anything unusable
 * becomes UNKNOWN with the parse failure in the explanation.
 */
export function parseEvaluation(raw: string): ParsedEvaluation {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const malformed = createError.llm.malformedEvaluation(err instanceof Error ? err.message : String(err), raw);
    return { verdict: 'UNKNOWN', explanation: malformed.message };
  }

  const result = evaluationSchema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    const malformed = createError.llm.malformedEvaluation(detail, raw);
    return { verdict: 'UNKNOWN', explanation: malformed.message };
  }

  return {
    verdict: result.data.Relevance,
    explanation: describeExplanation(result.data.Explanation),
  };
}

export class RelevanceEvaluator {
  constructor(
    private readonly gateway: CompletionGateway,
    private readonly model: string
  ) {}

  get modelId(): string {
    return this.model;
  }

  /**
   * Gateway failures propagate (COMPLETION_FAILED); parse failures degrade to UNKNOWN
   */
  async evaluate(question: string, answer: string, options: LLMCallOptions = {}): Promise<RelevanceEvaluation> {
    const completion = await this.gateway.complete(buildEvaluationPrompt(question, answer), this.model, options);
    const parsed = parseEvaluation(completion.text);

    if (parsed.verdict === 'UNKNOWN') {
      evaluatorLogger.warn({ model: this.model, explanation: parsed.explanation }, 'Relevance evaluation degraded to UNKNOWN');
    }

    return {
      verdict: parsed.verdict,
      explanation: parsed.explanation,
      model: this.model,
      usage: {
        promptTokens: completion.promptTokens,
        completionTokens: completion.completionTokens,
        totalTokens: completion.totalTokens,
      },
    };
  }
}
