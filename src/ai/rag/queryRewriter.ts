/**
 * KubeQuery AI - Query Rewriter
 * =============================
 * Optional pre-embedding step that rewords the question in documentation terms.
 */

import type { CompletionGateway } from '../llm/CompletionGateway';
import type { LLMCallOptions } from '../llm/types';
import { buildRewritePrompt } from './prompts';
import { EMPTY_USAGE, type TokenUsage } from './types';

export interface RewrittenQuery {
  query: string;
  model: string | null;
  usage: TokenUsage;
}

export interface QueryRewriter {
  rewrite(question: string, options?: LLMCallOptions): Promise<RewrittenQuery>;
}

/**
 * Pass-through used when rewriting is disabled
 */
export class IdentityQueryRewriter implements QueryRewriter {
  async rewrite(question: string): Promise<RewrittenQuery> {
    return { query: question, model: null, usage: EMPTY_USAGE };
  }
}

export class LLMQueryRewriter implements QueryRewriter {
  constructor(
    private readonly gateway: CompletionGateway,
    private readonly model: string
  ) {}

  async rewrite(question: string, options: LLMCallOptions = {}): Promise<RewrittenQuery> {
    const completion = await this.gateway.complete(buildRewritePrompt(question), this.model, options);

    // Models sometimes echo the surrounding quotes back
    const rewritten = completion.text.trim().replace(/^"(.*)"$/s, '$1').trim();

    return {
      query: rewritten || question,
      model: this.model,
      usage: {
        promptTokens: completion.promptTokens,
        completionTokens: completion.completionTokens,
        totalTokens: completion.totalTokens,
      },
    };
  }
}
