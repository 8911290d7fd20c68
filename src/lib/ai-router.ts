/**
 * Extraction client selection
 *
 * Picks the adapter named by the config. Exactly one provider is used per
 * client; there is no cross-provider fallback and no retry.
 */

import type { ExtractionClient, ExtractionConfig } from '@/types';
import { GeminiExtractionClient } from './adapters/gemini';
import { OpenRouterExtractionClient } from './adapters/openrouter';

export function createExtractionClient(config: ExtractionConfig): ExtractionClient {
    switch (config.provider) {
        case 'gemini':
            return new GeminiExtractionClient(config);
        case 'openrouter':
            return new OpenRouterExtractionClient(config);
    }
}

/**
 * Short status line for logs and the dev script.
 */
export function describeClient(client: ExtractionClient): string {
    return `${client.provider} (${client.model})`;
}
