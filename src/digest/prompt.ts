// pattern: Functional Core

/**
 * Builds the single user prompt sent to the model for a channel transcript.
 */
export function buildDigestPrompt(transcript: string): string {
  return `Here are a set of Slack messages from a conversation.
I would like you to provide a digest of these messages for participants in this conversation.
Please:
1. Introduce yourself;
2. Provide a concise summary of the key points discussed;
3. Extract specific action items, including who is responsible if mentioned;
4. Note any important decisions made.

Please be polite, upbeat, and encouraging. Please use emojis!

Messages:
${transcript}

Please format your response as JSON with the following structure:
{
    "summary": "Overall summary here",
    "action_items": ["Action 1", "Action 2", ...],
    "decisions": ["Decision 1", "Decision 2", ...]
}`;
}
