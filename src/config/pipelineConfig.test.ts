import { expect } from 'chai';
import { ConfigurationError } from '#shared/errors';
import { OLLAMA_CHAT_URL, OLLAMA_GENERATE_URL, loadPipelineConfig } from './pipelineConfig';

describe('loadPipelineConfig', () => {
	it('uses the defaults for an empty environment', () => {
		const config = loadPipelineConfig({});

		expect(config).to.deep.equal({
			endpointUrl: OLLAMA_GENERATE_URL,
			model: undefined,
			k: 10,
			temperature: 0.7,
			maxTokens: 256,
			evalTemperature: 0.2,
			evalMaxTokens: 512,
			debug: true,
			strategy: 'confidence',
			payloadShape: 'prompt',
			timeoutMs: 60_000,
			concurrency: 1,
		});
		expect(Object.isFrozen(config)).to.equal(true);
	});

	it('reads every variable', () => {
		const config = loadPipelineConfig({
			OLLAMA_API_URL: 'http://ollama:11434/api/chat',
			PIPELINE_MODEL: 'llama3:8b',
			PIPELINE_K: '4',
			PIPELINE_TEMPERATURE: '1.1',
			PIPELINE_MAX_TOKENS: '128',
			PIPELINE_EVAL_TEMPERATURE: '0',
			PIPELINE_EVAL_MAX_TOKENS: '1024',
			PIPELINE_DEBUG: 'false',
			PIPELINE_STRATEGY: 'self-evaluation',
			PIPELINE_PAYLOAD_SHAPE: 'prompt',
			PIPELINE_TIMEOUT_MS: '1500',
			PIPELINE_CONCURRENCY: '4',
		});

		expect(config).to.deep.equal({
			endpointUrl: 'http://ollama:11434/api/chat',
			model: 'llama3:8b',
			k: 4,
			temperature: 1.1,
			maxTokens: 128,
			evalTemperature: 0,
			evalMaxTokens: 1024,
			debug: false,
			strategy: 'self-evaluation',
			payloadShape: 'prompt',
			timeoutMs: 1500,
			concurrency: 4,
		});
	});

	it('defaults to the chat route for the self-evaluation strategy', () => {
		const config = loadPipelineConfig({ PIPELINE_STRATEGY: 'self-evaluation' });
		expect(config.payloadShape).to.equal('chat');
		expect(config.endpointUrl).to.equal(OLLAMA_CHAT_URL);
	});

	it('treats blank values as unset', () => {
		const config = loadPipelineConfig({ PIPELINE_MODEL: '  ', PIPELINE_K: '' });
		expect(config.model).to.be.undefined;
		expect(config.k).to.equal(10);
	});

	it('rejects a non numeric candidate count', () => {
		expect(() => loadPipelineConfig({ PIPELINE_K: 'ten' })).to.throw(ConfigurationError, '/k');
	});

	it('rejects a candidate count below one', () => {
		expect(() => loadPipelineConfig({ PIPELINE_K: '0' })).to.throw(ConfigurationError);
	});

	it('rejects a fractional max token count', () => {
		expect(() => loadPipelineConfig({ PIPELINE_MAX_TOKENS: '12.5' })).to.throw(ConfigurationError, '/maxTokens');
	});

	it('accepts the boolean words in any case', () => {
		expect(loadPipelineConfig({ PIPELINE_DEBUG: 'OFF' }).debug).to.equal(false);
		expect(loadPipelineConfig({ PIPELINE_DEBUG: 'no' }).debug).to.equal(false);
		expect(loadPipelineConfig({ PIPELINE_DEBUG: 'Yes' }).debug).to.equal(true);
		expect(loadPipelineConfig({ PIPELINE_DEBUG: '1' }).debug).to.equal(true);
	});

	it('rejects an unrecognised debug flag', () => {
		expect(() => loadPipelineConfig({ PIPELINE_DEBUG: 'flase' })).to.throw(ConfigurationError, '/debug');
	});

	it('rejects an unknown strategy', () => {
		expect(() => loadPipelineConfig({ PIPELINE_STRATEGY: 'majority-vote' })).to.throw(ConfigurationError, '/strategy');
	});
});
