import { Body, Controller, Post } from '@nestjs/common';
import { HarnessService } from './harness.service';
import { AssemblePromptDto, CompletePromptDto, DisassemblePromptDto, toPromptInput } from './dto/prompt.dto';

@Controller('harness')
export class HarnessController {
    constructor(private readonly harnessService: HarnessService) {}

    @Post('assemble')
    assemble(@Body() body: AssemblePromptDto) {
        return this.harnessService.assemble(toPromptInput(body));
    }

    @Post('complete')
    async complete(@Body() body: CompletePromptDto) {
        return this.harnessService.complete(toPromptInput(body), {
            temperature: body.temperature,
            maxOutputTokens: body.maxOutputTokens,
        });
    }

    @Post('disassemble')
    disassemble(@Body() body: DisassemblePromptDto) {
        return this.harnessService.disassemble(body.prompt, {
            delimiter: body.delimiter,
            instruction: body.instruction,
            labels: body.labels,
        });
    }
}
