import { type Candidate, throughputScore } from '../candidateGenerator';
import type { CandidateSelector, SelectionContext, SelectionResult } from './candidateSelector';

/**
 * Picks the candidate with the strictly highest score. Ties go to the earliest candidate.
 * Candidates without a score count as 0.
 */
export class ConfidenceSelector implements CandidateSelector {
	readonly strategy = 'confidence';
	readonly traceTitle = 'Scores';
	readonly scorer = throughputScore;

	async select(candidates: ReadonlyArray<Candidate>, _context?: SelectionContext): Promise<SelectionResult> {
		let selectedIndex = -1;
		let highest = Number.NEGATIVE_INFINITY;
		candidates.forEach((candidate, index) => {
			const score = candidate.score ?? 0;
			if (score > highest) {
				highest = score;
				selectedIndex = index;
			}
		});

		const selected = candidates[selectedIndex];
		if (!selected) return { status: 'no-candidate' };

		return {
			status: 'selected',
			finalText: selected.text,
			trace: scoreDump(candidates, selectedIndex),
			selectedIndex,
		};
	}
}

function scoreDump(candidates: ReadonlyArray<Candidate>, selectedIndex: number): string {
	return candidates.map((candidate, index) => `[${index + 1}] ${candidate.score ?? 0}${index === selectedIndex ? ' (selected)' : ''}`).join('\n');
}
