import axios from 'axios';
import { z } from 'zod';
import { classifyError } from '../../errors';
import { createLogger, errorMessage } from '../../logger';
import { AiProvider, GeneratedImage, GenerationOptions, JsonSchema } from './AiProvider';
import { SYSTEM_PROMPT } from './prompts';

const logger = createLogger('gemini-provider');

export interface GeminiSettings {
    apiKey: string;
    model: string;
    imageModel: string;
    timeoutMs: number;
    aspectRatio?: string;
}

const generateContentResponse = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
        }).optional(),
        finishReason: z.string().optional(),
    })).optional(),
});

const predictResponse = z.object({
    predictions: z.array(z.object({
        bytesBase64Encoded: z.string().optional(),
        mimeType: z.string().optional(),
    })).optional(),
});

interface GeminiSchema {
    type: string;
    description?: string;
    properties?: Record<string, GeminiSchema>;
    items?: GeminiSchema;
    required?: string[];
}

/**
 * Gemini's schema dialect spells types in upper case
 */
function toGeminiSchema(schema: JsonSchema): GeminiSchema {
    const converted: GeminiSchema = { type: schema.type.toUpperCase() };
    if (schema.description) {
        converted.description = schema.description;
    }
    if (schema.properties) {
        converted.properties = Object.fromEntries(
            Object.entries(schema.properties).map(([key, value]) => [key, toGeminiSchema(value)])
        );
    }
    if (schema.items) {
        converted.items = toGeminiSchema(schema.items);
    }
    if (schema.required) {
        converted.required = schema.required;
    }
    return converted;
}

function apiErrorMessage(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const body = z.object({ error: z.object({ message: z.string() }) }).safeParse(error.response?.data);
        return body.success ? body.data.error.message : error.message;
    }
    return errorMessage(error);
}

/**
 * Google Gemini AI Provider implementation
 */
export class GeminiProvider implements AiProvider {
    readonly name = 'Gemini';
    private readonly baseUrl = 'https://generativelanguage.googleapis.com/v1beta';

    constructor(private readonly settings: GeminiSettings) {}

    isConfigured(): boolean {
        return !!this.settings.apiKey;
    }

    async complete(prompt: string, options?: GenerationOptions): Promise<string> {
        logger.debug('Generating completion with Gemini', { promptLength: prompt.length });

        const generationConfig: Record<string, unknown> = {
            temperature: options?.temperature ?? 0.7,
            maxOutputTokens: options?.maxTokens ?? 8192,
        };
        if (options?.responseSchema) {
            generationConfig.responseMimeType = 'application/json';
            generationConfig.responseSchema = toGeminiSchema(options.responseSchema);
        }

        try {
            const response = await axios.post(
                `${this.baseUrl}/models/${this.settings.model}:generateContent?key=${this.settings.apiKey}`,
                {
                    systemInstruction: {
                        parts: [{ text: options?.systemPrompt || SYSTEM_PROMPT }]
                    },
                    contents: [
                        {
                            role: 'user',
                            parts: [{ text: prompt }]
                        }
                    ],
                    generationConfig,
                },
                {
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    timeout: this.settings.timeoutMs,
                }
            );

            const data = generateContentResponse.parse(response.data);
            const candidate = data.candidates?.[0];
            const content = (candidate?.content?.parts ?? [])
                .map(part => part.text ?? '')
                .join('');

            if (candidate?.finishReason === 'MAX_TOKENS') {
                logger.warn('Gemini stopped at the token limit', { responseLength: content.length });
            }
            logger.debug('Gemini completion generated', {
                responseLength: content.length
            });

            return content;
        } catch (error) {
            const message = apiErrorMessage(error);
            logger.error('Gemini API error', { error: message });
            throw classifyError(error, 'Gemini API', message);
        }
    }

    async generateImage(prompt: string): Promise<GeneratedImage | null> {
        logger.info('Generating cover image with Imagen', { model: this.settings.imageModel });

        try {
            const response = await axios.post(
                `${this.baseUrl}/models/${this.settings.imageModel}:predict?key=${this.settings.apiKey}`,
                {
                    instances: [{ prompt }],
                    parameters: {
                        sampleCount: 1,
                        aspectRatio: this.settings.aspectRatio ?? '16:9',
                    },
                },
                {
                    headers: { 'Content-Type': 'application/json' },
                    timeout: this.settings.timeoutMs,
                }
            );

            const prediction = predictResponse.parse(response.data).predictions?.[0];
            if (!prediction?.bytesBase64Encoded) {
                logger.warn('Imagen returned no image data');
                return null;
            }

            return {
                data: Buffer.from(prediction.bytesBase64Encoded, 'base64'),
                mimeType: prediction.mimeType || 'image/png',
            };
        } catch (error) {
            const message = apiErrorMessage(error);
            logger.error('Imagen API error', { error: message });
            throw classifyError(error, 'Imagen API', message);
        }
    }
}

export default GeminiProvider;
