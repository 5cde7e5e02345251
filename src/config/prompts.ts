export const DEFAULT_SYSTEM_PROMPT = `You are an assistant with access to a knowledge base.
Answer the user's questions using the context retrieved from that knowledge base.

Rules:
1. Base your answer on the information in the knowledge base context
2. Use the earlier messages of the conversation to resolve references such as "this", "that" or "the previous question"
3. If the context does not contain the answer, say so plainly
4. Answer clearly and in a structured way, using lists where they help
5. Stay polite and professional`;

export const DEFAULT_PROMPT_TEMPLATE = `Knowledge base context:
{context}

User question: {query}

Answer:`;

const PLACEHOLDER = /\{(context|query)\}/g;

/**
 * Fill the `{context}` and `{query}` placeholders in a single pass, so
 * placeholder text inside the retrieved context is left as is.
 */
export function renderPrompt(template: string, values: { context: string; query: string }): string {
  return template.replace(PLACEHOLDER, (_match, name: 'context' | 'query') => values[name]);
}
