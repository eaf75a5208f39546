/**
 * Prompt Composition
 *
 * Retrieved documents become a numbered context block inside a fixed
 * instruction template. The block is held to a token budget, estimated at
 * four characters per token.
 */

import type { ResolvedHit } from '../knowledge-base/types';

export const CHARS_PER_TOKEN = 4;

const SECTION_SEPARATOR = '\n\n';

export const RAG_PROMPT_TEMPLATE = `You are an expert content generator. Based on the provided context and user query, create high-quality, informative content.

Context Information:
{context}

User Query: {query}

Instructions:
1. Use the provided context to inform your response
2. Create comprehensive, well-structured content
3. Maintain factual accuracy based on the context
4. Write in a clear, engaging style
5. Include relevant details from the context
6. If the context is insufficient, indicate what additional information would be helpful

Content:`;

export interface ContextBlock {
  text: string;
  /** Documents that made it into `text`, in order */
  used: ResolvedHit[];
  truncated: boolean;
}

/**
 * Rough token count for budgeting
 */
export function estimateTokenCount(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function sourceHeader(position: number, hit: ResolvedHit): string {
  return `[Source ${position}] ${hit.document.title} (${hit.document.url})\n`;
}

/**
 * Lay out hits as `[Source n] title (url)` sections within `maxTokens`. The
 * last section that fits only partly is cut short; nothing follows it.
 */
export function composeContext(hits: ResolvedHit[], maxTokens: number): ContextBlock {
  const sections: string[] = [];
  const used: ResolvedHit[] = [];
  let remaining = maxTokens * CHARS_PER_TOKEN;

  for (const hit of hits) {
    const separator = sections.length > 0 ? SECTION_SEPARATOR.length : 0;
    const header = sourceHeader(sections.length + 1, hit);
    const room = remaining - separator - header.length;
    if (room <= 0) {
      return { text: sections.join(SECTION_SEPARATOR), used, truncated: true };
    }

    const { content } = hit.document;
    const body = content.length > room ? content.slice(0, room) : content;
    sections.push(header + body);
    used.push(hit);
    remaining -= separator + header.length + body.length;

    if (body.length < content.length) {
      return { text: sections.join(SECTION_SEPARATOR), used, truncated: true };
    }
  }

  return { text: sections.join(SECTION_SEPARATOR), used, truncated: false };
}

export function buildPrompt(query: string, context: string): string {
  return RAG_PROMPT_TEMPLATE.replace(/\{(context|query)\}/g, (_match, key: string) =>
    key === 'context' ? context : query
  );
}

export function buildSnippet(content: string, length: number): string {
  return content.length > length ? `${content.slice(0, length)}...` : content;
}
