import { expect } from 'chai';
import sinon from 'sinon';
import { FakeInferenceEndpoint, failure, textResponse } from '#test/fakeEndpoint';
import { setupConditionalLoggerOutput } from '#test/testUtils';
import { MAX_SEED, generateCandidates, randomSeed, throughputScore } from './candidateGenerator';

describe('candidateGenerator', () => {
	const logs = setupConditionalLoggerOutput();
	const payload = { shape: 'prompt', prompt: 'Q: 2+2?\nA:' } as const;

	afterEach(() => {
		sinon.restore();
	});

	describe('generateCandidates', () => {
		it('returns k candidates with a distinct seed per request', async () => {
			const draws = [0.1, 0.2, 0.3, 0.4, 0.5];
			const random = sinon.stub(Math, 'random');
			draws.forEach((value, index) => random.onCall(index).returns(value));
			const endpoint = new FakeInferenceEndpoint((_request, call) => textResponse(`answer ${call}`));

			const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 5, temperature: 0.7, maxTokens: 256 });

			expect(candidates.map((c) => c.text)).to.deep.equal(['answer 1', 'answer 2', 'answer 3', 'answer 4', 'answer 5']);
			const seeds = endpoint.requests.map((r) => r.seed);
			expect(seeds).to.deep.equal([100000, 200000, 300000, 400000, 500000]);
			expect(new Set(seeds).size).to.equal(5);
			expect(candidates.map((c) => c.seed)).to.deep.equal(seeds);
		});

		it('sends the model, payload, sampling settings and top_k with every request', async () => {
			const endpoint = new FakeInferenceEndpoint();

			await generateCandidates({ endpoint, model: 'llama3', payload, k: 3, temperature: 0.9, maxTokens: 64 });

			expect(endpoint.requests).to.have.length(3);
			for (const request of endpoint.requests) {
				expect(request.model).to.equal('llama3');
				expect(request.payload).to.deep.equal(payload);
				expect(request.temperature).to.equal(0.9);
				expect(request.maxTokens).to.equal(64);
				expect(request.topK).to.equal(3);
			}
		});

		it('skips failed requests without retrying and keeps request order', async () => {
			const endpoint = new FakeInferenceEndpoint((_request, call) => (call === 2 || call === 4 ? failure(500) : textResponse(`answer ${call}`)));

			const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 5, temperature: 0.7, maxTokens: 256 });

			expect(endpoint.requests).to.have.length(5);
			expect(candidates.map((c) => c.text)).to.deep.equal(['answer 1', 'answer 3', 'answer 5']);
			const warnings = logs().filter((log) => log.level === 'warn');
			expect(warnings).to.have.length(2);
			expect(warnings[0].args[1]).to.equal('Generation request failed, skipping candidate');
		});

		it('returns an empty set when every request fails', async () => {
			const endpoint = new FakeInferenceEndpoint(() => failure(502));

			const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 3, temperature: 0.7, maxTokens: 256 });

			expect(candidates).to.deep.equal([]);
		});

		it('scores candidates when a scorer is given', async () => {
			const endpoint = new FakeInferenceEndpoint((_request, call) => textResponse('4', call * 10, 5));

			const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 3, temperature: 0.7, maxTokens: 256, scorer: throughputScore });

			expect(candidates.map((c) => c.score)).to.deep.equal([2, 4, 6]);
		});

		it('leaves candidates unscored without a scorer', async () => {
			const endpoint = new FakeInferenceEndpoint(() => textResponse('4', 10, 5));

			const [candidate] = await generateCandidates({ endpoint, model: 'llama3', payload, k: 1, temperature: 0.7, maxTokens: 256 });

			expect(candidate.score).to.be.undefined;
			expect(Object.isFrozen(candidate)).to.equal(true);
		});

		it('keeps request order when requests run concurrently and complete out of order', async () => {
			const delays = [30, 5, 15];
			const endpoint = {
				requests: 0,
				async generate() {
					const call = this.requests++;
					await new Promise((resolve) => setTimeout(resolve, delays[call]));
					return textResponse(`answer ${call + 1}`);
				},
			};

			const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 3, temperature: 0.7, maxTokens: 256, concurrency: 3 });

			expect(candidates.map((c) => c.text)).to.deep.equal(['answer 1', 'answer 2', 'answer 3']);
		});

		describe('concurrency limit', () => {
			function trackingEndpoint() {
				return {
					inFlight: 0,
					peak: 0,
					async generate() {
						this.inFlight++;
						this.peak = Math.max(this.peak, this.inFlight);
						await new Promise((resolve) => setTimeout(resolve, 5));
						this.inFlight--;
						return textResponse('ok');
					},
				};
			}

			it('issues requests one at a time by default', async () => {
				const endpoint = trackingEndpoint();

				const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 4, temperature: 0.7, maxTokens: 256 });

				expect(candidates).to.have.length(4);
				expect(endpoint.peak).to.equal(1);
			});

			it('keeps at most the configured number of requests in flight', async () => {
				const endpoint = trackingEndpoint();

				const candidates = await generateCandidates({ endpoint, model: 'llama3', payload, k: 5, temperature: 0.7, maxTokens: 256, concurrency: 2 });

				expect(candidates).to.have.length(5);
				expect(endpoint.peak).to.equal(2);
			});
		});
	});

	describe('throughputScore', () => {
		it('divides the token count by the duration', () => {
			expect(throughputScore({ evalCount: 120, evalDuration: 40 })).to.equal(3);
		});

		it('treats a zero or missing duration as one', () => {
			expect(throughputScore({ evalCount: 12, evalDuration: 0 })).to.equal(12);
			expect(throughputScore({ evalCount: 12 })).to.equal(12);
		});

		it('treats a missing token count as zero', () => {
			expect(throughputScore({ evalDuration: 10 })).to.equal(0);
		});
	});

	describe('randomSeed', () => {
		it('draws integers within the seed range', () => {
			const random = sinon.stub(Math, 'random');
			random.onFirstCall().returns(0);
			random.onSecondCall().returns(0.9999999999);
			expect(randomSeed()).to.equal(0);
			expect(randomSeed()).to.equal(MAX_SEED);
		});
	});
});
