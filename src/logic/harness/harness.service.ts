import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../../config/env.validation';
import { CompletionBackend, CompletionOptions } from '../gemini/completion-backend';
import { assemblePrompt, disassemblePrompt, extractReply } from './prompt-harness';
import { CompletionResult, DisassembledPrompt, PromptAssembly, PromptInput, PromptOptions } from './types';

export type SamplingOptions = Pick<CompletionOptions, 'temperature' | 'maxOutputTokens'>;

@Injectable()
export class HarnessService {
    private readonly logger = new Logger(HarnessService.name);
    private readonly defaultDelimiter: string;

    constructor(
        private readonly backend: CompletionBackend,
        configService: ConfigService<EnvironmentVariables, true>,
    ) {
        this.defaultDelimiter = configService.get('HARNESS_DELIMITER', { infer: true });
    }

    assemble(input: PromptInput): PromptAssembly {
        const assembly = assemblePrompt({ ...input, delimiter: input.delimiter || this.defaultDelimiter });
        this.logger.debug(`Assembled ${assembly.turnCount} turn(s) into ${assembly.prompt.length} chars`);
        return assembly;
    }

    /**
     * Assembles then completes. Input errors surface before the backend is called;
     * backend errors reach the caller untouched, with no retry.
     */
    async complete(input: PromptInput, sampling: SamplingOptions = {}): Promise<CompletionResult> {
        const { prompt, delimiter, turnCount } = this.assemble(input);

        this.logger.log(`Requesting completion for ${turnCount} turn(s)`);
        const completion = await this.backend.complete(prompt, { ...sampling, stopSequences: [delimiter] });

        return {
            prompt,
            completion: completion.text,
            reply: extractReply(completion.text, delimiter),
            model: completion.model,
        };
    }

    disassemble(prompt: string, options: PromptOptions = {}): DisassembledPrompt {
        return disassemblePrompt(prompt, { ...options, delimiter: options.delimiter || this.defaultDelimiter });
    }
}
