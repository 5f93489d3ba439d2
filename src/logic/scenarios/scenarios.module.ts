import { Module } from '@nestjs/common';
import { HarnessModule } from '../harness/harness.module';
import { ScenariosController } from './scenarios.controller';
import { ScenariosService } from './scenarios.service';

@Module({
    imports: [HarnessModule],
    controllers: [ScenariosController],
    providers: [ScenariosService],
    exports: [ScenariosService],
})
export class ScenariosModule {}
