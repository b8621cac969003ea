/**
 * Relevance evaluator tests
 */

import { describe, it, expect } from 'vitest';
import { NO_EXPLANATION, parseEvaluation, RelevanceEvaluator } from '@/ai/rag/evaluator';
import { createError, ErrorCode, isRagError } from '@/lib/errors';
import { completion, ScriptedGateway } from './helpers/fakes';

describe('parseEvaluation', () => {
  it('reads a well-formed verdict', () => {
    expect(parseEvaluation('{"Relevance":"RELEVANT","Explanation":"Covers the question."}')).toEqual({
      verdict: 'RELEVANT',
      explanation: 'Covers the question.',
    });
  });

  it('defaults a missing explanation', () => {
    expect(parseEvaluation('{"Relevance":"PARTLY_RELEVANT"}')).toEqual({
      verdict: 'PARTLY_RELEVANT',
      explanation: NO_EXPLANATION,
    });
  });

  it('keeps the verdict when the explanation is null', () => {
    expect(parseEvaluation('{"Relevance":"RELEVANT","Explanation":null}')).toEqual({
      verdict: 'RELEVANT',
      explanation: NO_EXPLANATION,
    });
  });

  it('keeps the verdict and serializes a non-string explanation', () => {
    expect(parseEvaluation('{"Relevance":"NON_RELEVANT","Explanation":["off topic","no Pods"]}')).toEqual({
      verdict: 'NON_RELEVANT',
      explanation: '["off topic","no Pods"]',
    });
  });

  it('degrades non-JSON text to UNKNOWN', () => {
    const result = parseEvaluation('not json');

    expect(result.verdict).toBe('UNKNOWN');
    expect(result.explanation.startsWith('Failed to parse evaluation: ')).toBe(true);
  });

  it('degrades a missing Relevance key to UNKNOWN', () => {
    expect(parseEvaluation('{"Explanation":"fine"}')).toEqual({
      verdict: 'UNKNOWN',
      explanation: 'Failed to parse evaluation: missing "Relevance" key',
    });
  });

  it('degrades an unknown label to UNKNOWN', () => {
    expect(parseEvaluation('{"Relevance":"MAYBE"}')).toEqual({
      verdict: 'UNKNOWN',
      explanation: 'Failed to parse evaluation: "Relevance" must be one of RELEVANT, PARTLY_RELEVANT, NON_RELEVANT',
    });
  });
});

describe('RelevanceEvaluator', () => {
  it('grades with the evaluation model and reports its usage', async () => {
    const gateway = new ScriptedGateway([completion('{"Relevance":"NON_RELEVANT","Explanation":"Off topic."}', 200, 20)]);
    const evaluator = new RelevanceEvaluator(gateway, 'gpt-4o-mini');

    const result = await evaluator.evaluate('What is a Pod?', 'Bananas are yellow.');

    expect(result).toEqual({
      verdict: 'NON_RELEVANT',
      explanation: 'Off topic.',
      model: 'gpt-4o-mini',
      usage: { promptTokens: 200, completionTokens: 20, totalTokens: 220 },
    });
    expect(gateway.calls[0]?.modelId).toBe('gpt-4o-mini');
    expect(gateway.calls[0]?.prompt).toContain('Question: What is a Pod?\nGenerated Answer: Bananas are yellow.');
  });

  it('keeps the token usage of an unparseable reply', async () => {
    const evaluator = new RelevanceEvaluator(new ScriptedGateway([completion('not json', 50, 3)]), 'gpt-4o');

    const result = await evaluator.evaluate('q', 'a');

    expect(result.verdict).toBe('UNKNOWN');
    expect(result.usage).toEqual({ promptTokens: 50, completionTokens: 3, totalTokens: 53 });
  });

  it('propagates gateway failures', async () => {
    const gateway = new ScriptedGateway([createError.llm.completionFailed('gpt-4o', new Error('down'))]);

    const error = await new RelevanceEvaluator(gateway, 'gpt-4o').evaluate('q', 'a').catch((err: unknown) => err);

    expect(isRagError(error, ErrorCode.COMPLETION_FAILED)).toBe(true);
  });
});
