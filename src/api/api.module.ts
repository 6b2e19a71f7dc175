import { Module } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { LoggerService } from '../common/logger.service';
import { NotifyModule } from '../notify/notify.module';
import { SubscribersModule } from '../subscribers/subscribers.module';
import { ApiKeyGuard } from './api-key.guard';
import { DomainExceptionFilter } from './domain-exception.filter';
import { HealthController } from './health.controller';
import { NotifyController } from './notify.controller';
import { SubscribersController } from './subscribers.controller';
import { createValidationPipe } from './validation';

@Module({
  imports: [SubscribersModule, NotifyModule],
  controllers: [HealthController, NotifyController, SubscribersController],
  providers: [
    LoggerService,
    ApiKeyGuard,
    { provide: APP_PIPE, useFactory: createValidationPipe },
    { provide: APP_FILTER, useClass: DomainExceptionFilter }
  ]
})
export class ApiModule {}
