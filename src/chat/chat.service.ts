import { Injectable, Logger } from '@nestjs/common';
import {
  ConversationStore,
  renderHistory,
} from '../conversation/conversation.store';
import { Speaker } from '../conversation/conversation.types';
import { OllamaClient } from '../inference/ollama.client';

/**
 * Chat operations exposed to the HTTP surface.
 *
 * - chatTurn: reply with the user's recent history as context
 * - oneShot: reply to a single message, nothing remembered
 * - clearHistory: forget a user's history
 * - listModels: models installed on the inference server
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly conversationStore: ConversationStore,
    private readonly ollamaClient: OllamaClient,
  ) {}

  /**
   * Reply to a message using the user's conversation memory.
   *
   * The user's message is recorded before the model is called and stays
   * recorded if the call fails. The reply is recorded once it arrives, even
   * if other turns for the same user landed in the meantime.
   */
  async chatTurn(userId: string, text: string): Promise<string> {
    await this.conversationStore.append(userId, Speaker.User, text);
    const history = this.conversationStore.get(userId);
    this.logger.debug(
      `Chat turn for user ${userId} with ${history.length} exchange(s) of context`,
    );

    const response = await this.ollamaClient.generate(renderHistory(history));

    await this.conversationStore.append(userId, Speaker.Assistant, response);
    return response;
  }

  /**
   * Reply to a single message without reading or writing any history.
   */
  async oneShot(text: string): Promise<string> {
    return this.ollamaClient.generate(text);
  }

  async clearHistory(userId: string): Promise<void> {
    await this.conversationStore.clear(userId);
    this.logger.log(`Cleared conversation history for user ${userId}`);
  }

  async listModels(): Promise<string[]> {
    return this.ollamaClient.listModels();
  }
}
