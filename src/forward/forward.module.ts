import { Module } from '@nestjs/common';
import { LoggerService } from '../common/logger.service';
import { SubscribersModule } from '../subscribers/subscribers.module';
import { ForwardService } from './forward.service';

@Module({
  imports: [SubscribersModule],
  providers: [ForwardService, LoggerService],
  exports: [ForwardService]
})
export class ForwardModule {}
