import { Module } from '@nestjs/common';
import { LoggerService } from '../common/logger.service';
import { SubscribersModule } from '../subscribers/subscribers.module';
import { NotifyService } from './notify.service';

@Module({
  imports: [SubscribersModule],
  providers: [NotifyService, LoggerService],
  exports: [NotifyService]
})
export class NotifyModule {}
