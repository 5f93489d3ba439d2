import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { GeminiModule } from './logic/gemini/gemini.module';
import { HarnessModule } from './logic/harness/harness.module';
import { ScenariosModule } from './logic/scenarios/scenarios.module';
import { SessionsModule } from './logic/sessions/sessions.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    GeminiModule,
    HarnessModule,
    ScenariosModule,
    SessionsModule,
  ],
})
export class AppModule {}
