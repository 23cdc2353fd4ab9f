import type { Candidate } from './candidateGenerator';

export const DEBUG_HEADER = '--- Debug Info ---';

/**
 * The block appended to the answer in debug mode: every candidate with its score,
 * the selector's trace under its title, then the final response.
 */
export function formatDebugInfo(candidates: ReadonlyArray<Candidate>, selection: { finalText: string; trace?: string }, traceTitle: string): string {
	let debugInfo = `\n\n${DEBUG_HEADER}\n`;
	candidates.forEach((candidate, index) => {
		debugInfo += `Response ${index + 1}:\n`;
		debugInfo += `Content: ${candidate.text}\n`;
		debugInfo += `Confidence: ${candidate.score ?? 'Not calculated'}\n\n`;
	});
	if (selection.trace) debugInfo += `${traceTitle}:\n${selection.trace}\n\n`;
	debugInfo += `Final Response:\n${selection.finalText}\n`;
	return debugInfo;
}
