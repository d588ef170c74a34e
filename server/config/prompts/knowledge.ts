/**
 * Knowledge Prompts
 *
 * Grounded question answering over retrieved document snippets.
 */

export function buildKnowledgeAnswerPrompt(params: {
  question: string;
  snippets: Array<{ title: string; text: string }>;
}): string {
  const context = params.snippets
    .map((s, i) => `[${i + 1}] ${s.title}\n${s.text}`)
    .join("\n\n");

  return `Answer the question using ONLY the numbered excerpts below.
If the excerpts do not contain the answer, say so plainly.
Keep the answer under 150 words. Reference excerpts as [1], [2] where relevant.

EXCERPTS:
${context}

QUESTION: ${params.question}

ANSWER:`;
}
