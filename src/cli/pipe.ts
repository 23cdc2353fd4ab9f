import { loadPipelineConfig } from '#config/pipelineConfig';
import { logger } from '#o11y/logger';
import { Pipeline } from '#pipeline/pipeline';
import { user } from '#shared/model/llm.model';
import { parseUserCliArgs } from './cli';

async function main() {
	const { prompt, model } = parseUserCliArgs(process.argv.slice(2));
	const pipeline = new Pipeline(loadPipelineConfig());

	await pipeline.onStartup();
	const response = await pipeline.run([user(prompt)], model);
	console.log(response);
	await pipeline.onShutdown();
}

main().catch((error) => {
	logger.fatal({ err: error }, 'pipe failed');
	process.exitCode = 1;
});
