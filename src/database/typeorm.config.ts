import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { SubscriberEntity } from '../entities/subscriber.entity';

export const typeOrmConfig = (config: ConfigService): TypeOrmModuleOptions => ({
  type: 'oracle',
  username: config.get<string>('oracleUser'),
  password: config.get<string>('oraclePassword'),
  connectString: config.get<string>('oracleConnectString'),
  synchronize: config.get<boolean>('oracleSynchronize'),
  logging: false,
  entities: [SubscriberEntity]
});
