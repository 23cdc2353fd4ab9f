import { logger } from '#o11y/logger';
import { type Conversation, type LlmMessage, user } from '#shared/model/llm.model';
import { type Candidate, randomSeed } from '../candidateGenerator';
import { formatPayload } from '../conversationFormatter';
import type { CandidateSelector, SelectionContext, SelectionResult } from './candidateSelector';

export const ARBITRATION_INSTRUCTION =
	'Review the candidate responses below to the previous message and write the single best final answer, without referring to the numbered options or to these instructions.';

export interface SelfEvaluationSettings {
	/** Temperature of the arbitration request, typically lower than the generation temperature */
	temperature: number;
	maxTokens: number;
}

/**
 * The arbitration turn: the instruction followed by every candidate as `[i] {text}`, 1-indexed in generation order.
 */
export function buildArbitrationMessage(candidates: ReadonlyArray<Candidate>): string {
	const options = candidates.map((candidate, index) => `[${index + 1}] ${candidate.text}`).join('\n\n');
	return `${ARBITRATION_INSTRUCTION}\n\n${options}`;
}

export function appendArbitrationTurn(conversation: Conversation, arbitrationMessage: string): LlmMessage[] {
	return [...conversation, user(arbitrationMessage)];
}

/**
 * Asks the model to write the final answer after showing it every candidate.
 * A failed arbitration request is reported as a failure. There is no fallback to local scoring.
 */
export class SelfEvaluationSelector implements CandidateSelector {
	readonly strategy = 'self-evaluation';
	readonly traceTitle = 'Evaluation Prompt';

	constructor(private readonly settings: SelfEvaluationSettings) {}

	async select(candidates: ReadonlyArray<Candidate>, context: SelectionContext): Promise<SelectionResult> {
		if (candidates.length === 0) return { status: 'no-candidate' };

		const arbitrationMessage = buildArbitrationMessage(candidates);
		const messages = appendArbitrationTurn(context.conversation, arbitrationMessage);

		try {
			const response = await context.endpoint.generate({
				model: context.model,
				payload: formatPayload(messages, context.payloadShape),
				seed: randomSeed(),
				temperature: this.settings.temperature,
				maxTokens: this.settings.maxTokens,
			});
			return { status: 'selected', finalText: response.text, trace: arbitrationMessage };
		} catch (error) {
			logger.error({ err: error, model: context.model, candidates: candidates.length }, 'Arbitration request failed');
			return { status: 'failed', reason: error instanceof Error ? error.message : String(error) };
		}
	}
}
