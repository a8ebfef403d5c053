import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { configuration } from './configuration.js';
import { validateEnv } from './env.validation.js';

// 从仓库根目录或 backend/ 启动都能读到 .env
export const ENV_FILE_PATHS = [
  '.env.local',
  '.env',
  'backend/.env.local',
  'backend/.env',
];

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      validate: (env) => validateEnv(env),
      envFilePath: ENV_FILE_PATHS,
    }),
  ],
})
export class AppConfigModule {}
