import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { config as loadEnv } from 'dotenv';
import { buildConfig } from '../config/configuration';
import { SubscriberEntity } from '../entities/subscriber.entity';

loadEnv({ path: process.env.ENV_FILE || '.env' });

export const appConfig = buildConfig(process.env);

export const AppDataSource = new DataSource({
  type: 'oracle',
  username: appConfig.oracleUser,
  password: appConfig.oraclePassword,
  connectString: appConfig.oracleConnectString,
  synchronize: appConfig.oracleSynchronize,
  logging: false,
  entities: [SubscriberEntity]
});
