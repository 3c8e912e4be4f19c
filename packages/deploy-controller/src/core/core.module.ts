import { Module, type DynamicModule } from '@nestjs/common';

import { CLOCK, SystemClock } from './clock';
import { ConfigService } from './services/config.service';
import { LoggerService } from './services/logger.service';

@Module({})
export class CoreModule {
  static register(config: ConfigService): DynamicModule {
    return {
      module: CoreModule,
      global: true,
      providers: [
        { provide: ConfigService, useValue: config },
        {
          provide: LoggerService,
          useFactory: (configService: ConfigService) => new LoggerService({ level: configService.logLevel }),
          inject: [ConfigService],
        },
        { provide: CLOCK, useFactory: () => new SystemClock() },
      ],
      exports: [ConfigService, LoggerService, CLOCK],
    };
  }
}
