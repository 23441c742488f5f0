import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { ChatModule } from './chat/chat.module';
import { ImageModule } from './image/image.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    ChatModule,
    ImageModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
