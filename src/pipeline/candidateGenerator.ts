import pLimit from 'p-limit';
import { logger } from '#o11y/logger';
import type { GenerationMetrics, InferenceEndpoint } from '#ollama/ollamaEndpoint';
import type { EndpointPayload } from '#shared/model/llm.model';
import { settleIndexed } from '#utils/async-utils';

export const MAX_SEED = 1_000_000;

export interface Candidate {
	readonly text: string;
	/** Seed sent with the request that produced this candidate */
	readonly seed: number;
	readonly metrics: GenerationMetrics;
	readonly metadata: Readonly<Record<string, unknown>>;
	readonly score?: number;
}

export type CandidateScorer = (metrics: GenerationMetrics) => number;

/**
 * Tokens generated per unit of generation time.
 * This rewards fast generations and is a throughput heuristic, not a calibrated confidence.
 * A missing count is 0 and a zero or missing duration is treated as 1.
 */
export const throughputScore: CandidateScorer = (metrics) => {
	const evalCount = metrics.evalCount ?? 0;
	const evalDuration = metrics.evalDuration || 1;
	return evalCount / evalDuration;
};

/** Uniform integer in [0, MAX_SEED]. Not cryptographic and not unique across draws */
export function randomSeed(): number {
	return Math.floor(Math.random() * (MAX_SEED + 1));
}

export interface GenerateCandidatesParams {
	endpoint: InferenceEndpoint;
	model: string;
	payload: EndpointPayload;
	/** Number of generation attempts */
	k: number;
	temperature: number;
	maxTokens: number;
	/** When set each candidate is scored as it is created */
	scorer?: CandidateScorer;
	/** Requests in flight at once, defaults to 1 */
	concurrency?: number;
}

/**
 * Issues k independently seeded generation requests and collects the successful ones.
 * A failed or empty response is logged and skipped, never retried. The returned candidates
 * are in request order regardless of the order the requests complete in. An empty array is a valid result.
 */
export async function generateCandidates(params: GenerateCandidatesParams): Promise<Candidate[]> {
	const limit = pLimit(params.concurrency ?? 1);

	const { fulfilled, rejected } = await settleIndexed(params.k, (index) =>
		limit(async (): Promise<Candidate> => {
			const seed = randomSeed();
			const response = await params.endpoint.generate({
				model: params.model,
				payload: params.payload,
				seed,
				temperature: params.temperature,
				maxTokens: params.maxTokens,
				topK: params.k,
			});
			logger.debug({ attempt: index + 1, seed, chars: response.text.length }, 'Generated candidate');
			const candidate: Candidate = {
				text: response.text,
				seed,
				metrics: response.metrics,
				metadata: response.metadata,
				...(params.scorer ? { score: params.scorer(response.metrics) } : {}),
			};
			return Object.freeze(candidate);
		}),
	);

	for (const { index, reason } of rejected) {
		logger.warn({ attempt: index + 1, model: params.model, err: reason }, 'Generation request failed, skipping candidate');
	}

	return fulfilled.map(({ value }) => value);
}
