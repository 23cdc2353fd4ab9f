export type MessageRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
	role: MessageRole;
	content: string;
}

export type Conversation = ReadonlyArray<LlmMessage>;

/** Which request/response body the inference endpoint speaks */
export type PayloadShape = 'prompt' | 'chat';

export type EndpointPayload = { shape: 'prompt'; prompt: string } | { shape: 'chat'; messages: LlmMessage[] };

export function system(text: string): LlmMessage {
	return { role: 'system', content: text };
}

export function user(text: string): LlmMessage {
	return { role: 'user', content: text };
}

export function assistant(text: string): LlmMessage {
	return { role: 'assistant', content: text };
}
