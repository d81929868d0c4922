/**
 * Prompt Builders
 *
 * Fixed instruction prompts for each operation.
 */

export const NO_ANSWER_REPLY = 'I cannot answer based on the provided context.'

export function buildSummarizePrompt(text: string): string {
  return `Provide a concise summary of the following text:\n\n${text}`
}

/**
 * Restricts the model to the given context.
 */
export function buildAskPrompt(context: string, question: string): string {
  return `Based ONLY on the following context, answer the question.
If the answer is not in the context, say "${NO_ANSWER_REPLY}"

Context:
${context}

Question: ${question}

Answer:`
}

export function buildExtractionPrompt(text: string): string {
  return `Extract the following entities from the text and return ONLY a JSON object:
- people: list of person names
- dates: list of dates mentioned
- locations: list of locations

Use exactly these keys: "people", "dates", "locations". Each value is an array of strings
in the order they first appear in the text. Use an empty array when there are none.

Text:
${text}

Return ONLY valid JSON, no markdown formatting.`
}
