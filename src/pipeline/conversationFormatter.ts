import { NoInputError } from '#shared/errors';
import type { Conversation, EndpointPayload, LlmMessage, PayloadShape } from '#shared/model/llm.model';

/**
 * Removes assistant turns from the end of the conversation so the model is always asked to continue from a user turn.
 * Returns a new array and never mutates the input.
 */
export function stripTrailingAssistant(messages: Conversation): LlmMessage[] {
	let end = messages.length;
	while (end > 0 && messages[end - 1]?.role === 'assistant') end--;
	return messages.slice(0, end);
}

export function hasUserMessage(messages: Conversation): boolean {
	return messages.some((message) => message.role === 'user');
}

/**
 * Flattens the conversation into a question/answer prompt.
 * User turns become `Q: {content}\nA:` and assistant turns `{content}\n`. Content is inserted verbatim.
 */
export function formatPrompt(messages: Conversation): string {
	let prompt = '';
	for (const message of messages) {
		if (message.role === 'user') prompt += `Q: ${message.content}\nA:`;
		else if (message.role === 'assistant') prompt += `${message.content}\n`;
	}
	return prompt.trim();
}

/**
 * Builds the payload for one generation request.
 * @throws NoInputError when there is no user message to respond to
 */
export function formatPayload(messages: Conversation, shape: PayloadShape): EndpointPayload {
	if (!hasUserMessage(messages)) throw new NoInputError();

	const stripped = stripTrailingAssistant(messages);
	if (shape === 'prompt') return { shape, prompt: formatPrompt(stripped) };
	return { shape, messages: stripped };
}
