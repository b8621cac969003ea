/**
 * KubeQuery AI - Prompt Builder
 * =============================
 * Pure, deterministic prompt rendering. No I/O.
 */

import type { RetrievedDocument } from './types';

// ============================================
// TEMPLATES
// ============================================

export const ANSWER_PROMPT_TEMPLATE = `
You are a Kubernetes assistant. Use ONLY the information in the "context" to answer the user's question.

REQUIREMENTS:
- Output ONLY raw Markdown text (no surrounding quotes, no JSON, no markdown in a string).
- Use literal line breaks for paragraphs and fenced code blocks for commands (\`\`\`bash ... \`\`\`).
- Do NOT include backslash-n sequences ("\\n") to indicate newlines; use real newlines.
- Do not escape code blocks or wrap them in a string.
- Return the answer only (no meta commentary).

Example of desired output:
To apply a YAML file in Kubernetes, use the following command:

\`\`\`bash
kubectl apply -f FILENAME.yaml
\`\`\`

Context:
{context}

User's Question:
{question}

Answer:
`.trim();

export const EVALUATION_PROMPT_TEMPLATE = `
You are an expert evaluator for a Retrieval-Augmented Generation (RAG) system.
Your task is to analyze the relevance of the generated answer to the given question.
Based on the relevance of the generated answer, you will classify it
as "NON_RELEVANT", "PARTLY_RELEVANT", or "RELEVANT".

Here is the data for evaluation:

Question: {question}
Generated Answer: {answer}

Please analyze the content and context of the generated answer in relation to the question
and provide your evaluation as a single parsable JSON object with exactly the keys
"Relevance" and "Explanation". Do not wrap it in code blocks:

{
  "Relevance": "NON_RELEVANT" | "PARTLY_RELEVANT" | "RELEVANT",
  "Explanation": "[Provide a brief explanation for your evaluation]"
}
`.trim();

export const REWRITE_PROMPT_TEMPLATE = `
Rewrite the following Kubernetes-related question so that it matches documentation terminology and includes key Kubernetes resource names:
"{question}"
Return only the rewritten query.
`.trim();

// ============================================
// RENDERING
// ============================================

/**
 * Single-pass placeholder substitution, so a value containing "{name}"
 * is never expanded a second time.
 */
function render(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] ?? match : match
  );
}

/**
 * One `title: …\nanswer: …\n\n` block per document, in result order
 */
export function buildContext(documents: readonly RetrievedDocument[]): string {
  return documents.map((doc) => `title: ${doc.title}\nanswer: ${doc.text}\n\n`).join('');
}

export function buildAnswerPrompt(question: string, documents: readonly RetrievedDocument[]): string {
  return render(ANSWER_PROMPT_TEMPLATE, {
    context: buildContext(documents),
    question,
  }).trim();
}

export function buildEvaluationPrompt(question: string, answer: string): string {
  return render(EVALUATION_PROMPT_TEMPLATE, { question, answer });
}

export function buildRewritePrompt(question: string): string {
  return render(REWRITE_PROMPT_TEMPLATE, { question });
}
