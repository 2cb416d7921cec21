import { DynamicModule, Module, type FactoryProvider, type ModuleMetadata } from '@nestjs/common';
import {
  CALENDAR_FACTORY,
  CALENDAR_OPTIONS,
  CALENDAR_REGISTRY,
  CALENDAR_SERVICE,
} from './calendar.tokens.js';
import {
  CalendarFactory,
  type CalendarProviderOptions,
  type CalendarRegistry,
} from './calendar.factory.js';
import type { CalendarProviderId } from './calendar.types.js';

export interface CalendarModuleOptions extends CalendarProviderOptions {
  provider: CalendarProviderId;
}

export interface CalendarModuleAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
  registry: CalendarRegistry;
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<CalendarModuleOptions>['useFactory'];
}

const serviceProvider = {
  provide: CALENDAR_SERVICE,
  inject: [CALENDAR_FACTORY, CALENDAR_OPTIONS],
  useFactory: (factory: CalendarFactory, options: CalendarModuleOptions) =>
    factory.create(options.provider, options),
};

@Module({})
export class CalendarModule {
  static register(providers: {
    registry: CalendarRegistry;
    options: CalendarModuleOptions;
  }): DynamicModule {
    return {
      module: CalendarModule,
      global: true,
      providers: [
        { provide: CALENDAR_REGISTRY, useValue: providers.registry },
        { provide: CALENDAR_OPTIONS, useValue: providers.options },
        { provide: CALENDAR_FACTORY, useClass: CalendarFactory },
        serviceProvider,
      ],
      exports: [CALENDAR_FACTORY, CALENDAR_SERVICE],
    };
  }

  /** Same as `register`, with the provider options resolved through DI (e.g. from ConfigService). */
  static registerAsync(providers: CalendarModuleAsyncOptions): DynamicModule {
    return {
      module: CalendarModule,
      global: true,
      imports: providers.imports ?? [],
      providers: [
        { provide: CALENDAR_REGISTRY, useValue: providers.registry },
        {
          provide: CALENDAR_OPTIONS,
          inject: providers.inject ?? [],
          useFactory: providers.useFactory,
        },
        { provide: CALENDAR_FACTORY, useClass: CalendarFactory },
        serviceProvider,
      ],
      exports: [CALENDAR_FACTORY, CALENDAR_SERVICE],
    };
  }
}
