import { Module } from '@nestjs/common';
import { LoggerService } from '../common/logger.service';
import { ForwardModule } from '../forward/forward.module';
import { NotifyModule } from '../notify/notify.module';
import { SubscribersModule } from '../subscribers/subscribers.module';
import { BotService } from './bot.service';
import { FollowupScheduler } from './followup.scheduler';

@Module({
  imports: [SubscribersModule, NotifyModule, ForwardModule],
  providers: [BotService, FollowupScheduler, LoggerService]
})
export class BotModule {}
