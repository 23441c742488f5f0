import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { OllamaClient } from './ollama.client';

@Module({
  imports: [ConfigModule],
  providers: [OllamaClient],
  exports: [OllamaClient],
})
export class InferenceModule {}
