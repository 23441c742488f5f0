import { Injectable, Logger } from '@nestjs/common';
import { KeyedMutex } from '../common/keyed-mutex';
import { ConversationHistory, Exchange, Speaker } from './conversation.types';

/**
 * Number of exchanges kept per user. Older ones are dropped silently.
 */
export const MAX_HISTORY_LENGTH = 10;

/**
 * Flatten a history into the prompt sent to the language model.
 *
 * One line per exchange, `"{speaker}: {content}"`, in order. The language
 * model sees exactly this text, so the line format is part of the prompt.
 */
export function renderHistory(history: ConversationHistory): string {
  return history.map((msg) => `${msg.role}: ${msg.content}`).join('\n');
}

/**
 * In-memory conversation memory, one bounded history per user identity.
 *
 * Writes for the same user are serialized so that two requests finishing at
 * once cannot both build on the same old history and drop each other's turn.
 * Users never wait on each other. Nothing survives a restart.
 */
@Injectable()
export class ConversationStore {
  private readonly logger = new Logger(ConversationStore.name);
  private readonly conversations = new Map<string, ConversationHistory>();
  private readonly locks = new KeyedMutex<string>();

  /**
   * Get the history for a user, creating an empty one on first access.
   */
  get(userId: string): ConversationHistory {
    let history = this.conversations.get(userId);
    if (!history) {
      history = [];
      this.conversations.set(userId, history);
    }
    return [...history];
  }

  /**
   * Record one exchange and keep only the newest {@link MAX_HISTORY_LENGTH}.
   */
  async append(userId: string, role: Speaker, content: string): Promise<void> {
    await this.locks.runExclusive(userId, () => {
      const exchange: Exchange = Object.freeze({ role, content });
      const history = [...this.get(userId), exchange];
      const kept = history.slice(-MAX_HISTORY_LENGTH);

      if (kept.length < history.length) {
        this.logger.debug(
          `Dropped ${history.length - kept.length} old exchange(s) for user ${userId}`,
        );
      }
      this.conversations.set(userId, kept);
    });
  }

  /**
   * Reset a user's history to empty. Safe to call repeatedly.
   */
  async clear(userId: string): Promise<void> {
    await this.locks.runExclusive(userId, () => {
      this.conversations.set(userId, []);
    });
  }

  /**
   * Number of users with a history entry, including cleared ones.
   */
  get size(): number {
    return this.conversations.size;
  }
}
