import { Module } from '@nestjs/common';
import { LoggerService } from '../common/logger.service';
import { SubscribersService } from './subscribers.service';

@Module({
  providers: [SubscribersService, LoggerService],
  exports: [SubscribersService]
})
export class SubscribersModule {}
