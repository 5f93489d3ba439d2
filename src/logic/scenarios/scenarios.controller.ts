import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { HarnessService } from '../harness/harness.service';
import { SamplingDto } from '../harness/dto/prompt.dto';
import { ScenariosService } from './scenarios.service';

@Controller('scenarios')
export class ScenariosController {
    constructor(
        private readonly scenariosService: ScenariosService,
        private readonly harnessService: HarnessService,
    ) {}

    @Get()
    list() {
        return this.scenariosService.list();
    }

    @Get(':name')
    get(@Param('name') name: string) {
        return this.scenariosService.describe(name);
    }

    @Post(':name/complete')
    async complete(@Param('name') name: string, @Body() body: SamplingDto) {
        return this.harnessService.complete(this.scenariosService.toPromptInput(name), {
            temperature: body.temperature,
            maxOutputTokens: body.maxOutputTokens,
        });
    }
}
