import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { CreateSessionDto, SendMessageDto } from './dto/session.dto';
import { SessionsService } from './sessions.service';

@Controller('sessions')
export class SessionsController {
    constructor(private readonly sessionsService: SessionsService) {}

    @Post()
    async create(@Body() body: CreateSessionDto) {
        return this.sessionsService.create(body);
    }

    @Get(':id')
    get(@Param('id', ParseUUIDPipe) id: string) {
        return this.sessionsService.get(id);
    }

    @Post(':id/messages')
    async send(@Param('id', ParseUUIDPipe) id: string, @Body() body: SendMessageDto) {
        return this.sessionsService.send(id, body.text, {
            temperature: body.temperature,
            maxOutputTokens: body.maxOutputTokens,
        });
    }

    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string) {
        this.sessionsService.remove(id);
        return { deleted: true };
    }
}
