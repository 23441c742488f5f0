/**
 * Who produced an exchange. The value is the label written into prompts.
 */
export enum Speaker {
  User = 'User',
  Assistant = 'Assistant',
}

/**
 * One turn of a conversation.
 */
export interface Exchange {
  readonly role: Speaker;
  readonly content: string;
}

/**
 * Ordered exchanges for one user, oldest first.
 */
export type ConversationHistory = readonly Exchange[];
