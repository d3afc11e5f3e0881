/**
 * Generative text and image capability.
 * Output is untrusted: callers parse and validate everything returned.
 */

/**
 * Subset of JSON Schema understood by both providers' structured-output modes
 */
export interface JsonSchema {
    type: 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean';
    description?: string;
    properties?: Record<string, JsonSchema>;
    items?: JsonSchema;
    required?: string[];
}

export interface GenerationOptions {
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
    /** Ask for a JSON payload of this shape */
    responseSchema?: JsonSchema;
}

export interface GeneratedImage {
    data: Buffer;
    mimeType: string;
}

export interface AiProvider {
    readonly name: string;

    /**
     * Raw completion text; JSON when `responseSchema` is set, possibly fenced or truncated
     */
    complete(prompt: string, options?: GenerationOptions): Promise<string>;

    /**
     * Generate a cover image; null when the provider returned no image
     */
    generateImage(prompt: string): Promise<GeneratedImage | null>;

    isConfigured(): boolean;
}
