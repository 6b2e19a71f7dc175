import { Module } from '@nestjs/common';
import { ConditionalModule, ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import configuration, { isDatabaseConfigured } from '../config/configuration';
import { LoggerService } from '../common/logger.service';
import { ApiModule } from '../api/api.module';
import { BotModule } from '../bot/bot.module';
import { typeOrmConfig } from '../database/typeorm.config';
import { StorageModule } from '../storage/storage.module';
import { TelegramModule } from '../telegram/telegram.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.ENV_FILE || '.env',
      load: [configuration]
    }),
    ConditionalModule.registerWhen(
      TypeOrmModule.forRootAsync({
        inject: [ConfigService],
        useFactory: (config: ConfigService) => typeOrmConfig(config)
      }),
      isDatabaseConfigured
    ),
    StorageModule,
    TelegramModule,
    ApiModule,
    BotModule
  ],
  providers: [LoggerService],
  exports: [LoggerService]
})
export class AppModule {}
