import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import axios from 'axios';
import { logger } from '#o11y/logger';
import { EndpointError } from '#shared/errors';
import type { EndpointPayload } from '#shared/model/llm.model';

export interface GenerationRequest {
	model: string;
	payload: EndpointPayload;
	seed: number;
	temperature: number;
	maxTokens: number;
	/** Sent as options.top_k when set */
	topK?: number;
}

export interface GenerationMetrics {
	/** Number of tokens generated */
	evalCount?: number;
	/** Time spent generating, in the unit the endpoint reports */
	evalDuration?: number;
}

export interface GenerationResponse {
	text: string;
	metrics: GenerationMetrics;
	/** The full response body */
	metadata: Record<string, unknown>;
}

/**
 * An opaque text generation service. Implementations throw an EndpointError
 * when a request does not produce usable text.
 */
export interface InferenceEndpoint {
	generate(request: GenerationRequest): Promise<GenerationResponse>;
}

const GenerationResponseSchema = Type.Object({
	response: Type.Optional(Type.String()),
	message: Type.Optional(Type.Object({ content: Type.String() })),
	eval_count: Type.Optional(Type.Number()),
	eval_duration: Type.Optional(Type.Number()),
});

export interface OllamaEndpointConfig {
	/** Full URL of the /api/generate or /api/chat route */
	url: string;
	/** Request timeout in milliseconds */
	timeoutMs: number;
}

/**
 * Calls the Ollama generate (prompt payloads) or chat (message payloads) API with streaming disabled.
 */
export class OllamaEndpoint implements InferenceEndpoint {
	private readonly url: string;
	private readonly timeoutMs: number;

	constructor(config: OllamaEndpointConfig) {
		this.url = config.url;
		this.timeoutMs = config.timeoutMs;
	}

	async generate(request: GenerationRequest): Promise<GenerationResponse> {
		const { payload } = request;
		const body = {
			model: request.model,
			...(payload.shape === 'prompt' ? { prompt: payload.prompt } : { messages: payload.messages }),
			options: {
				seed: request.seed,
				temperature: request.temperature,
				max_tokens: request.maxTokens,
				...(request.topK !== undefined ? { top_k: request.topK } : {}),
				stream: false,
			},
			stream: false,
		};

		let data: unknown;
		try {
			const response = await axios.post<unknown>(this.url, body, {
				timeout: this.timeoutMs,
				validateStatus: (status) => status === 200,
			});
			data = response.data;
		} catch (error) {
			if (axios.isAxiosError(error)) {
				const status = error.response?.status;
				if (status !== undefined) throw new EndpointError(`Endpoint returned HTTP ${status}`, status);
				throw new EndpointError(`Endpoint request failed: ${error.message}`);
			}
			throw error;
		}

		if (!Value.Check(GenerationResponseSchema, data)) {
			logger.debug({ model: request.model }, 'Unexpected response body from endpoint');
			throw new EndpointError('Endpoint returned a malformed response body', 200);
		}

		const text = payload.shape === 'prompt' ? data.response : data.message?.content;
		if (!text || text.trim() === '') throw new EndpointError('Endpoint returned no text', 200);

		return {
			text,
			metrics: { evalCount: data.eval_count, evalDuration: data.eval_duration },
			metadata: { ...data },
		};
	}
}
