import OpenAI from 'openai';
import { classifyError } from '../../errors';
import { createLogger, errorMessage } from '../../logger';
import { AiProvider, GeneratedImage, GenerationOptions } from './AiProvider';
import { SYSTEM_PROMPT } from './prompts';

const logger = createLogger('openai-provider');

export interface OpenAiSettings {
    apiKey: string;
    model: string;
    imageModel: string;
    timeoutMs: number;
}

/**
 * OpenAI-based AI Provider implementation
 */
export class OpenAiProvider implements AiProvider {
    readonly name = 'OpenAI';
    private client: OpenAI;

    constructor(private readonly settings: OpenAiSettings) {
        // Retries are owned by RetryPolicy
        this.client = new OpenAI({
            apiKey: settings.apiKey,
            timeout: settings.timeoutMs,
            maxRetries: 0,
        });
    }

    isConfigured(): boolean {
        return !!this.settings.apiKey;
    }

    async complete(prompt: string, options?: GenerationOptions): Promise<string> {
        logger.debug('Generating completion', { promptLength: prompt.length });

        // JSON mode only returns objects, so the schema is spelled out in the prompt
        const userPrompt = options?.responseSchema
            ? `${prompt}\n\nRespond with JSON matching this schema:\n${JSON.stringify(options.responseSchema)}`
            : prompt;

        try {
            const response = await this.client.chat.completions.create({
                model: this.settings.model,
                messages: [
                    { role: 'system', content: options?.systemPrompt || SYSTEM_PROMPT },
                    { role: 'user', content: userPrompt },
                ],
                temperature: options?.temperature ?? 0.7,
                max_tokens: options?.maxTokens ?? 4096,
                ...(options?.responseSchema?.type === 'object'
                    ? { response_format: { type: 'json_object' as const } }
                    : {}),
            });

            const choice = response.choices[0];
            const content = choice?.message?.content || '';
            if (choice?.finish_reason === 'length') {
                logger.warn('OpenAI stopped at the token limit', { responseLength: content.length });
            }
            logger.debug('Completion generated', {
                tokens: response.usage?.total_tokens
            });

            return content;
        } catch (error) {
            logger.error('OpenAI API error', { error: errorMessage(error) });
            throw classifyError(error, 'OpenAI API');
        }
    }

    async generateImage(prompt: string): Promise<GeneratedImage | null> {
        logger.info('Generating cover image', { model: this.settings.imageModel });

        try {
            const response = await this.client.images.generate({
                model: this.settings.imageModel,
                prompt,
                n: 1,
                size: '1792x1024',
                response_format: 'b64_json',
            });

            const encoded = response.data?.[0]?.b64_json;
            if (!encoded) {
                logger.warn('OpenAI returned no image data');
                return null;
            }

            return { data: Buffer.from(encoded, 'base64'), mimeType: 'image/png' };
        } catch (error) {
            logger.error('OpenAI image error', { error: errorMessage(error) });
            throw classifyError(error, 'OpenAI images');
        }
    }
}

export default OpenAiProvider;
