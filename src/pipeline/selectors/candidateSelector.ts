import type { SelectionStrategy } from '#config/pipelineConfig';
import type { InferenceEndpoint } from '#ollama/ollamaEndpoint';
import type { Conversation, PayloadShape } from '#shared/model/llm.model';
import type { Candidate, CandidateScorer } from '../candidateGenerator';

export interface SelectionContext {
	/** The conversation with trailing assistant turns removed */
	conversation: Conversation;
	model: string;
	endpoint: InferenceEndpoint;
	payloadShape: PayloadShape;
}

export type SelectionResult =
	| {
			status: 'selected';
			finalText: string;
			/** Explanation of how the answer was chosen, shown in debug output */
			trace?: string;
			/** Index into the candidate set when an existing candidate was chosen */
			selectedIndex?: number;
	  }
	| { status: 'no-candidate' }
	| { status: 'failed'; reason: string };

/**
 * Chooses, or synthesises, the final answer from a candidate set.
 * Implementations report an empty candidate set as 'no-candidate' and never throw for it.
 */
export interface CandidateSelector {
	readonly strategy: SelectionStrategy;
	/** Label of the trace block in debug output */
	readonly traceTitle: string;
	/** Applied by the generator to each candidate as it is created */
	readonly scorer?: CandidateScorer;

	select(candidates: ReadonlyArray<Candidate>, context: SelectionContext): Promise<SelectionResult>;
}
