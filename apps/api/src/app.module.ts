import { Module } from '@nestjs/common';
import OpenAI from 'openai';
import { CalendarModule, createCalendarRegistry } from '@timekeeper/appstore';
import {
  AssistantModule,
  LexicalSimilarityOracle,
  OpenAiEmbeddingOracle,
  type AssistantModuleOptions,
} from '@timekeeper/agent';
import { ConfigModule } from './config/config.module.js';
import { ConfigService } from './config/config.service.js';
import { ChatModule } from './chat/chat.module.js';

export function assistantOptionsFrom(config: ConfigService): AssistantModuleOptions {
  const { provider, threshold, model } = config.similarity;
  return {
    scheduling: { timeZone: config.timeZone, workingHours: config.workingHours },
    similarity:
      provider === 'openai'
        ? new OpenAiEmbeddingOracle(new OpenAI().embeddings, { model, threshold })
        : new LexicalSimilarityOracle(threshold),
  };
}

@Module({
  imports: [
    ConfigModule,
    CalendarModule.registerAsync({
      registry: createCalendarRegistry(),
      inject: [ConfigService],
      useFactory: (config: ConfigService) => config.calendar,
    }),
    AssistantModule.forRootAsync({
      inject: [ConfigService],
      useFactory: assistantOptionsFrom,
    }),
    ChatModule,
  ],
})
export class AppModule {}
