import type { PipelineConfig } from '#config/pipelineConfig';
import { logger } from '#o11y/logger';
import { type InferenceEndpoint, OllamaEndpoint } from '#ollama/ollamaEndpoint';
import { NoInputError } from '#shared/errors';
import { type Conversation, user } from '#shared/model/llm.model';
import { generateCandidates } from './candidateGenerator';
import { formatPayload, stripTrailingAssistant } from './conversationFormatter';
import { formatDebugInfo } from './debugTrace';
import { type CandidateSelector, createSelector } from './selectors';

export const NO_MODEL_MESSAGE = 'No model is configured for this pipeline. Set PIPELINE_MODEL or supply a model with the request.';
export const NO_INPUT_MESSAGE = 'Please send a message for me to respond to.';
export const APOLOGY_MESSAGE = "I'm sorry, but I couldn't generate a response.";

export interface PipelineDependencies {
	endpoint?: InferenceEndpoint;
	selector?: CandidateSelector;
}

/**
 * Samples k candidate answers for a conversation and returns the one the selector picks.
 * Every failure path ends in a returned string. Nothing is thrown to the caller.
 */
export class Pipeline {
	readonly name = 'Best-of-N Pipeline';
	private readonly endpoint: InferenceEndpoint;
	private readonly selector: CandidateSelector;

	constructor(
		private readonly config: PipelineConfig,
		deps: PipelineDependencies = {},
	) {
		this.endpoint = deps.endpoint ?? new OllamaEndpoint({ url: config.endpointUrl, timeoutMs: config.timeoutMs });
		this.selector = deps.selector ?? createSelector(config);
	}

	async onStartup(): Promise<void> {
		const { endpointUrl, model, k, strategy, payloadShape, concurrency } = this.config;
		logger.info({ endpointUrl, model, k, strategy, payloadShape, concurrency }, `on_startup: ${this.name}`);
	}

	async onShutdown(): Promise<void> {
		logger.info(`on_shutdown: ${this.name}`);
	}

	/**
	 * Entry point for a chat host.
	 * @param userMessage the latest user message, used when messages is empty
	 * @param modelId the id the host knows this pipeline by
	 * @param messages the full conversation
	 * @param body the raw request body. A non-empty string `model` property overrides the configured model
	 */
	async pipe(userMessage: string, modelId: string, messages: Conversation, body: Record<string, unknown> = {}): Promise<string> {
		const conversation = messages.length > 0 ? messages : [user(userMessage)];
		const modelOverride = typeof body.model === 'string' && body.model.trim() !== '' ? body.model : undefined;
		logger.debug({ pipelineId: modelId, messages: conversation.length }, 'pipe');
		return this.run(conversation, modelOverride);
	}

	async run(conversation: Conversation, modelOverride?: string): Promise<string> {
		const model = modelOverride?.trim() || this.config.model;
		if (!model) {
			logger.warn('Request rejected, no model configured or supplied');
			return NO_MODEL_MESSAGE;
		}

		try {
			return await this.selectResponse(conversation, model);
		} catch (error) {
			if (error instanceof NoInputError) return NO_INPUT_MESSAGE;
			logger.error({ err: error, model }, 'Pipeline invocation failed');
			return APOLOGY_MESSAGE;
		}
	}

	private async selectResponse(conversation: Conversation, model: string): Promise<string> {
		const { config, endpoint, selector } = this;
		const payload = formatPayload(conversation, config.payloadShape);
		if (config.debug) logger.debug({ payload }, 'Formatted payload');

		const candidates = await generateCandidates({
			endpoint,
			model,
			payload,
			k: config.k,
			temperature: config.temperature,
			maxTokens: config.maxTokens,
			scorer: selector.scorer,
			concurrency: config.concurrency,
		});
		logger.info({ model, generated: candidates.length, requested: config.k }, 'Generated candidates');

		const result = await selector.select(candidates, {
			conversation: stripTrailingAssistant(conversation),
			model,
			endpoint,
			payloadShape: config.payloadShape,
		});

		if (result.status !== 'selected') {
			logger.warn({ model, status: result.status, strategy: selector.strategy }, 'No response selected');
			return APOLOGY_MESSAGE;
		}

		if (!config.debug) return result.finalText;

		const debugInfo = formatDebugInfo(candidates, result, selector.traceTitle);
		logger.debug(debugInfo);
		return result.finalText + debugInfo;
	}
}
