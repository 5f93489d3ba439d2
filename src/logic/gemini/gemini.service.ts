import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { EnvironmentVariables } from '../../config/env.validation';
import { Completion, CompletionBackend, CompletionOptions } from './completion-backend';

@Injectable()
export class GeminiService extends CompletionBackend {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly CHAT_MODEL: string;
    private readonly temperature: number;
    private readonly maxOutputTokens: number;

    constructor(private readonly configService: ConfigService<EnvironmentVariables, true>) {
        super();
        const apiKey = this.configService.get('GEMINI_API_KEY', { infer: true });
        if (!apiKey) {
            this.logger.warn('GEMINI_API_KEY is not set; completion requests will be rejected by the API');
        }
        this.genAI = new GoogleGenAI({ apiKey });
        this.CHAT_MODEL = this.configService.get('GEMINI_CHAT_MODEL', { infer: true });
        this.temperature = this.configService.get('COMPLETION_TEMPERATURE', { infer: true });
        this.maxOutputTokens = this.configService.get('COMPLETION_MAX_OUTPUT_TOKENS', { infer: true });
    }

    // The prompt is sent as one user turn: the harness blob already carries the whole dialogue.
    async complete(prompt: string, options: CompletionOptions = {}): Promise<Completion> {
        try {
            const result = await this.genAI.models.generateContent({
                model: this.CHAT_MODEL,
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                config: {
                    temperature: options.temperature ?? this.temperature,
                    maxOutputTokens: options.maxOutputTokens ?? this.maxOutputTokens,
                    stopSequences: options.stopSequences,
                },
            });
            return { text: result.text ?? '', model: this.CHAT_MODEL };
        } catch (error) {
            this.logger.error(`complete error: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
    }
}
