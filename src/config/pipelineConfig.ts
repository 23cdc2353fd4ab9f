import { type Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigurationError } from '#shared/errors';
import type { PayloadShape } from '#shared/model/llm.model';
import { type Env, envBoolean, envNumber, envVar } from '#utils/env-var';

export const OLLAMA_GENERATE_URL = 'http://localhost:11434/api/generate';
export const OLLAMA_CHAT_URL = 'http://localhost:11434/api/chat';

const SelectionStrategySchema = Type.Union([Type.Literal('confidence'), Type.Literal('self-evaluation')]);
const PayloadShapeSchema = Type.Union([Type.Literal('prompt'), Type.Literal('chat')]);

export const PipelineConfigSchema = Type.Object({
	endpointUrl: Type.String({ minLength: 1 }),
	/** No default: a request is rejected when neither this nor an override names a model */
	model: Type.Optional(Type.String({ minLength: 1 })),
	/** Number of sampled candidates */
	k: Type.Integer({ minimum: 1 }),
	temperature: Type.Number({ minimum: 0 }),
	maxTokens: Type.Integer({ minimum: 1 }),
	/** Temperature of the arbitration call in the self-evaluation strategy */
	evalTemperature: Type.Number({ minimum: 0 }),
	evalMaxTokens: Type.Integer({ minimum: 1 }),
	debug: Type.Boolean(),
	strategy: SelectionStrategySchema,
	payloadShape: PayloadShapeSchema,
	timeoutMs: Type.Integer({ minimum: 1 }),
	/** Generation requests allowed in flight at once. 1 issues them one after another */
	concurrency: Type.Integer({ minimum: 1 }),
});

export type SelectionStrategy = Static<typeof SelectionStrategySchema>;

export type PipelineConfig = Readonly<Static<typeof PipelineConfigSchema>>;

function defaultShape(strategy: string): PayloadShape {
	return strategy === 'self-evaluation' ? 'chat' : 'prompt';
}

/**
 * Reads the pipeline configuration once from the environment.
 * The returned object is frozen and is passed explicitly to the pipeline.
 * @throws ConfigurationError when a variable holds an invalid value
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
	const strategy = envVar(env, 'PIPELINE_STRATEGY', 'confidence');
	const payloadShape = envVar(env, 'PIPELINE_PAYLOAD_SHAPE', defaultShape(strategy));

	const raw = {
		endpointUrl: envVar(env, 'OLLAMA_API_URL', payloadShape === 'chat' ? OLLAMA_CHAT_URL : OLLAMA_GENERATE_URL),
		model: envVar(env, 'PIPELINE_MODEL'),
		k: envNumber(env, 'PIPELINE_K', 10),
		temperature: envNumber(env, 'PIPELINE_TEMPERATURE', 0.7),
		maxTokens: envNumber(env, 'PIPELINE_MAX_TOKENS', 256),
		evalTemperature: envNumber(env, 'PIPELINE_EVAL_TEMPERATURE', 0.2),
		evalMaxTokens: envNumber(env, 'PIPELINE_EVAL_MAX_TOKENS', 512),
		debug: envBoolean(env, 'PIPELINE_DEBUG', true),
		strategy,
		payloadShape,
		timeoutMs: envNumber(env, 'PIPELINE_TIMEOUT_MS', 60_000),
		concurrency: envNumber(env, 'PIPELINE_CONCURRENCY', 1),
	};

	if (!Value.Check(PipelineConfigSchema, raw)) {
		const problems = [...Value.Errors(PipelineConfigSchema, raw)].map((error) => `${error.path}: ${error.message}`);
		throw new ConfigurationError(`Invalid pipeline configuration. ${problems.join('; ')}`);
	}
	return Object.freeze(raw);
}
