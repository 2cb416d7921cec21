import { Module, type DynamicModule, type FactoryProvider, type ModuleMetadata, type Provider } from '@nestjs/common';
import { systemClock, type Clock } from '../clock.js';
import { ConversationService } from '../conversation/conversation.service.js';
import { InMemorySessionStore } from '../conversation/session-store.js';
import { LlmIntentParser } from '../intents/llm-intent-parser.js';
import { createLLM } from '../llm/factory.js';
import { TimeSlotManager } from '../scheduling/time-slot-manager.js';
import { assertWorkingHours, DEFAULT_WORKING_HOURS } from '../scheduling/working-hours.js';
import { LexicalSimilarityOracle } from '../similarity/lexical.js';
import {
  ASSISTANT_CLOCK,
  ASSISTANT_OPTIONS,
  INTENT_PARSER,
  SCHEDULING_OPTIONS,
  SESSION_STORE,
  SIMILARITY_ORACLE,
  type AssistantModuleOptions,
  type SchedulingOptions,
} from './assistant.tokens.js';

export type AssistantModuleAsyncOptions = Pick<ModuleMetadata, 'imports'> & {
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<AssistantModuleOptions>['useFactory'];
};

/**
 * Scheduling and conversation services over the global `CALENDAR_SERVICE`.
 * Every port left out of the options gets its default: system clock, lexical
 * similarity, in-memory sessions and an LLM-backed intent parser.
 */
@Module({})
export class AssistantModule {
  static forRoot(options: AssistantModuleOptions = {}): DynamicModule {
    return this.forRootAsync({ useFactory: () => options });
  }

  static forRootAsync(options: AssistantModuleAsyncOptions): DynamicModule {
    const optionsProvider: Provider = {
      provide: ASSISTANT_OPTIONS,
      inject: options.inject ?? [],
      useFactory: options.useFactory,
    };

    return {
      module: AssistantModule,
      imports: options.imports ?? [],
      providers: [optionsProvider, ...this.portProviders(), TimeSlotManager, ConversationService],
      exports: [ConversationService, TimeSlotManager, SESSION_STORE, SCHEDULING_OPTIONS],
    };
  }

  private static portProviders(): Provider[] {
    return [
      {
        provide: SCHEDULING_OPTIONS,
        inject: [ASSISTANT_OPTIONS],
        useFactory: (opts: AssistantModuleOptions): SchedulingOptions => ({
          timeZone: opts.scheduling?.timeZone ?? 'UTC',
          workingHours: assertWorkingHours(opts.scheduling?.workingHours ?? DEFAULT_WORKING_HOURS),
        }),
      },
      {
        provide: ASSISTANT_CLOCK,
        inject: [ASSISTANT_OPTIONS],
        useFactory: (opts: AssistantModuleOptions) => opts.clock ?? systemClock,
      },
      {
        provide: SIMILARITY_ORACLE,
        inject: [ASSISTANT_OPTIONS],
        useFactory: (opts: AssistantModuleOptions) => opts.similarity ?? new LexicalSimilarityOracle(),
      },
      {
        provide: SESSION_STORE,
        inject: [ASSISTANT_OPTIONS, SCHEDULING_OPTIONS],
        useFactory: (opts: AssistantModuleOptions, scheduling: SchedulingOptions) =>
          opts.sessionStore ?? new InMemorySessionStore(scheduling.workingHours),
      },
      {
        provide: INTENT_PARSER,
        inject: [ASSISTANT_OPTIONS, SCHEDULING_OPTIONS, ASSISTANT_CLOCK],
        useFactory: (opts: AssistantModuleOptions, scheduling: SchedulingOptions, clock: Clock) =>
          opts.intentParser ??
          new LlmIntentParser(opts.llm ?? createLLM(), { timeZone: scheduling.timeZone, clock }),
      },
    ];
  }
}
