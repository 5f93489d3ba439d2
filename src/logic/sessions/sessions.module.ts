import { Module } from '@nestjs/common';
import { HarnessModule } from '../harness/harness.module';
import { ScenariosModule } from '../scenarios/scenarios.module';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

@Module({
    imports: [HarnessModule, ScenariosModule],
    controllers: [SessionsController],
    providers: [SessionsService],
})
export class SessionsModule {}
