export { loadPipelineConfig, type PipelineConfig, type SelectionStrategy } from '#config/pipelineConfig';
export { OllamaEndpoint, type InferenceEndpoint, type GenerationRequest, type GenerationResponse } from '#ollama/ollamaEndpoint';
export { APOLOGY_MESSAGE, NO_INPUT_MESSAGE, NO_MODEL_MESSAGE, Pipeline } from '#pipeline/pipeline';
export { generateCandidates, throughputScore, type Candidate } from '#pipeline/candidateGenerator';
export { formatPayload, formatPrompt, stripTrailingAssistant } from '#pipeline/conversationFormatter';
export * from '#pipeline/selectors';
export * from '#shared/errors';
export * from '#shared/model/llm.model';
