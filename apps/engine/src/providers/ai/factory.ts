/**
 * AI Provider Factory
 *
 * Builds the configured AI provider from settings.
 */

import { EngineConfig } from '../../config';
import { ConfigurationError } from '../../errors';
import { createLogger } from '../../logger';
import { AiProvider } from './AiProvider';
import { GeminiProvider } from './GeminiProvider';
import { OpenAiProvider } from './OpenAiProvider';

const logger = createLogger('ai-provider');

/**
 * Create the AI provider selected by AI_PROVIDER
 */
export function createAiProvider(config: EngineConfig): AiProvider {
    switch (config.ai.provider) {
        case 'openai': {
            const provider = new OpenAiProvider({
                apiKey: config.openai.apiKey,
                model: config.openai.model,
                imageModel: config.openai.imageModel,
                timeoutMs: config.ai.timeoutMs,
            });
            if (!provider.isConfigured()) {
                throw new ConfigurationError('OpenAI provider not configured - missing OPENAI_API_KEY');
            }
            logger.info('Using OpenAI provider', { model: config.openai.model });
            return provider;
        }

        case 'gemini':
        default: {
            const provider = new GeminiProvider({
                apiKey: config.gemini.apiKey,
                model: config.gemini.model,
                imageModel: config.gemini.imageModel,
                timeoutMs: config.ai.timeoutMs,
            });
            if (!provider.isConfigured()) {
                throw new ConfigurationError('Gemini provider not configured - missing GEMINI_API_KEY');
            }
            logger.info('Using Gemini AI provider', { model: config.gemini.model });
            return provider;
        }
    }
}

export default { createAiProvider };
