import { Module } from '@nestjs/common';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { ConversationModule } from '../conversation/conversation.module';
import { InferenceModule } from '../inference/inference.module';

/**
 * Chat Module for conversations with the local language model.
 *
 * Components:
 * - ChatController: HTTP endpoints for chat, one-off messages and history
 * - ChatService: composes conversation memory with the inference client
 */
@Module({
  imports: [ConversationModule, InferenceModule],
  controllers: [ChatController],
  providers: [ChatService],
  exports: [ChatService],
})
export class ChatModule {}
