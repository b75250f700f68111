import OpenAI from 'openai';
import type {
    ChatCompletion,
    ChatCompletionCreateParamsNonStreaming,
    ChatCompletionMessageParam
} from 'openai/resources/chat/completions';
import type { ITextGenerator } from '../agents/types';
import type { AppConfig } from '../config/env';
import { logger as rootLogger } from '../config/logger';
import type { ILogger } from '../config/logger';
import { AppError, ExternalServiceError, errorMessage } from '../utils/errors';
import { RetryUtil } from '../utils/retry.util';
import type { IRetryUtil } from '../utils/retry.util';

// The part of the OpenAI SDK this service calls, so tests can hand in a stub
export interface IOpenAIClient {
    chat: {
        completions: {
            create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export interface CompletionSettings {
    model: string;
    temperature: number;
    maxTokens: number;
}

export interface CompletionOptions {
    temperature?: number;
    max_tokens?: number;
}

export interface IOpenAIService extends ITextGenerator {
    generateCompletion(messages: ChatCompletionMessageParam[], options?: CompletionOptions): Promise<string>;
}

function statusOf(error: unknown): number | undefined {
    if (error instanceof OpenAI.APIError) {
        return error.status;
    }
    return undefined;
}

/**
 * OpenAI Service with Dependency Injection
 *
 * The text generator behind every agent: one chat completion per call, with
 * the system instructions and the assembled prompt as the two messages.
 * Transient failures are retried here; whatever still fails surfaces as an
 * ExternalServiceError.
 */
export class OpenAIService implements IOpenAIService {
    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private settings: CompletionSettings
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: AppConfig['openai']): OpenAIService {
        const client = new OpenAI({ apiKey: config.apiKey });

        return new OpenAIService(
            client,
            RetryUtil,
            rootLogger.child({ service: 'openai' }),
            {
                model: config.model,
                temperature: config.temperature,
                maxTokens: config.maxTokens
            }
        );
    }

    async generate(systemInstructions: string, prompt: string): Promise<string> {
        return this.generateCompletion([
            { role: 'system', content: systemInstructions },
            { role: 'user', content: prompt }
        ]);
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatCompletionMessageParam[], options?: CompletionOptions): Promise<string> {
        const temperature = options?.temperature ?? this.settings.temperature;

        try {
            return await this.retryUtil.executeWithRetry(
                async () => {
                    this.logger.info({
                        messagesCount: messages.length,
                        model: this.settings.model,
                        temperature
                    }, 'Generating OpenAI completion');

                    const response = await this.client.chat.completions.create({
                        model: this.settings.model,
                        messages,
                        temperature,
                        max_tokens: options?.max_tokens ?? this.settings.maxTokens
                    });

                    const content = response.choices[0]?.message?.content;
                    if (!content) {
                        throw new Error('No content returned from OpenAI');
                    }

                    this.logger.info({
                        tokensUsed: response.usage?.total_tokens ?? 0,
                        contentLength: content.length
                    }, 'OpenAI completion generated successfully');

                    return content;
                },
                {
                    maxAttempts: 3,
                    baseDelay: 1000,
                    maxDelay: 5000,
                    operationName: 'OpenAI completion generation'
                }
            );
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            throw new ExternalServiceError(`OpenAI completion failed: ${errorMessage(error)}`, {
                service: 'openai',
                statusCode: statusOf(error),
                cause: error
            });
        }
    }
}
