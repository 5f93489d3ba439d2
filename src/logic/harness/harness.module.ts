import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { HarnessController } from './harness.controller';
import { HarnessService } from './harness.service';

@Module({
    imports: [GeminiModule],
    controllers: [HarnessController],
    providers: [HarnessService],
    exports: [HarnessService],
})
export class HarnessModule {}
