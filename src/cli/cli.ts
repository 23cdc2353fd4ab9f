export class CliArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CliArgumentError';
	}
}

export interface CliOptions {
	prompt: string;
	/** Model supplied with -m or --model */
	model?: string;
}

/**
 * Parses `[-m model | --model=model] prompt words...`.
 * @throws CliArgumentError when no prompt is given or a model flag has no value
 */
export function parseUserCliArgs(scriptArgs: string[]): CliOptions {
	const promptWords: string[] = [];
	let model: string | undefined;

	for (let i = 0; i < scriptArgs.length; i++) {
		const arg = scriptArgs[i];
		if (arg.startsWith('--model=') || arg.startsWith('-m=')) {
			model = arg.slice(arg.indexOf('=') + 1);
			if (!model) throw new CliArgumentError('No value given for the model flag');
		} else if (arg === '--model' || arg === '-m') {
			const next = scriptArgs[i + 1];
			if (next === undefined || next.startsWith('-')) throw new CliArgumentError('No value given for the model flag');
			model = next;
			i++;
		} else {
			promptWords.push(arg);
		}
	}

	const prompt = promptWords.join(' ').trim();
	if (!prompt) throw new CliArgumentError('A prompt is required, e.g. npm run pipe -- "What is 2+2?"');
	return { prompt, model };
}
