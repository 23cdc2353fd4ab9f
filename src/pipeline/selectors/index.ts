import type { PipelineConfig } from '#config/pipelineConfig';
import type { CandidateSelector } from './candidateSelector';
import { ConfidenceSelector } from './confidenceSelector';
import { SelfEvaluationSelector } from './selfEvaluationSelector';

export * from './candidateSelector';
export { ConfidenceSelector } from './confidenceSelector';
export { SelfEvaluationSelector, buildArbitrationMessage, ARBITRATION_INSTRUCTION } from './selfEvaluationSelector';

export function createSelector(config: PipelineConfig): CandidateSelector {
	switch (config.strategy) {
		case 'confidence':
			return new ConfidenceSelector();
		case 'self-evaluation':
			return new SelfEvaluationSelector({ temperature: config.evalTemperature, maxTokens: config.evalMaxTokens });
	}
}
