export { AiProvider, GenerationOptions, GeneratedImage, JsonSchema } from './AiProvider';
export { OpenAiProvider, OpenAiSettings } from './OpenAiProvider';
export { GeminiProvider, GeminiSettings } from './GeminiProvider';
export { createAiProvider } from './factory';
export { extractJson, parseJsonPayload, stripCodeFences } from './json';
export * from './prompts';
