/**
 * Decision Layer Prompts
 *
 * Intent classification prompt. The model sees the raw message, whether a
 * document was attached, and what the local pattern scorer suggested.
 */

export const INTENT_CLASSIFICATION_PROMPT = `You classify messages sent to a sales and knowledge assistant.

INTENTS:
- knowledge_qa: questions about documents, policies, product facts, or uploaded files
- lead_capture: details about a prospect (name, company, email, phone, budget) to record
- proposal_request: asking for a proposal, quote, or pitch for a prospect
- next_step: scheduling a call, meeting, demo, or follow-up
- status_update: a deal was won, lost, or put on hold
- smalltalk: greetings, thanks, or questions about what the assistant can do
- unknown: none of the above

ENTITIES:
Extract any of: name, company, email, phone, money, datetime.
Only report values that appear in the message.

Respond with JSON only, no prose:
{
  "intent": "<one of the intents above>",
  "confidence": <number between 0 and 1>,
  "entities": [{ "type": "<entity type>", "value": "<text>", "confidence": <number between 0 and 1> }]
}`;

export function buildIntentClassificationPrompt(params: {
  text: string;
  hasAttachment: boolean;
  patternSuggestion: string;
  previousIntent?: string;
}): string {
  const contextLines = [
    `Attachment present: ${params.hasAttachment ? "yes" : "no"}`,
    `Keyword suggestion: ${params.patternSuggestion}`,
  ];
  if (params.previousIntent) {
    contextLines.push(`Previous intent in this conversation: ${params.previousIntent}`);
  }

  return `${INTENT_CLASSIFICATION_PROMPT}

${contextLines.join("\n")}

MESSAGE:
"""
${params.text}
"""`;
}
