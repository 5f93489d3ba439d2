import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { CompletionBackend } from './completion-backend';

@Module({
    providers: [
        GeminiService,
        { provide: CompletionBackend, useExisting: GeminiService },
    ],
    exports: [GeminiService, CompletionBackend],
})
export class GeminiModule {}
