import { ChatPromptTemplate } from '@langchain/core/prompts';

/**
 * Question used to pick the most relevant chunks from the index
 */
export const ANALYSIS_QUERY =
  'Identify missing topics, produce a summary, and produce insights for this document.';

export const analysisPrompt = ChatPromptTemplate.fromMessages([
  [
    'system',
    `You are a document reviewer. Using only the excerpts provided, assess the document.

Rules:
1. SUMMARY: 2-3 sentences describing what the document is and what it covers
2. MISSING_TOPICS: topics or clauses a document of this kind normally contains but these excerpts do not
3. INSIGHTS: short, specific observations that would help the reader act on the document
4. Do NOT invent content that is not in the excerpts

{format_instructions}`,
  ],
  ['user', 'Document: {document_name}\n\nExcerpts:\n{context}'],
]);
