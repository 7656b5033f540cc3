import { randomUUID } from 'crypto';
import { DatabaseService } from './database.js';
import { Conversation, ConversationWithMessages, Message, NewMessage } from '../types/conversation.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import { TextProcessor } from '../utils/text-processing.js';

export const TITLE_LENGTH = 50;

export interface HistoryLimits {
  maxMessages: number;
  maxTokens?: number;
}

/**
 * Durable, append-only message history keyed by conversation id.
 */
export class ConversationStore {
  private locks = new KeyedMutex();

  constructor(private db: DatabaseService) {}

  /**
   * Return the conversation with `id`, creating it when it does not exist yet.
   * `title` (truncated) is only used for a new conversation.
   */
  createOrGet(id?: string, title?: string): Conversation {
    if (id !== undefined) {
      if (id.trim().length === 0) {
        throw new ValidationError('conversation_id cannot be empty');
      }
      const existing = this.db.getConversation(id);
      if (existing) return existing;
    }
    const cleanTitle = title?.trim();
    return this.db.insertConversation(
      id ?? randomUUID(),
      cleanTitle ? TextProcessor.truncate(cleanTitle, TITLE_LENGTH) : null
    );
  }

  append(conversationId: string, message: NewMessage): Message {
    if (!this.db.getConversation(conversationId)) {
      throw new NotFoundError(`Conversation not found: ${conversationId}`);
    }
    return this.db.insertMessage(conversationId, message);
  }

  get(conversationId: string): ConversationWithMessages {
    const conversation = this.db.getConversation(conversationId);
    if (!conversation) {
      throw new NotFoundError(`Conversation not found: ${conversationId}`);
    }
    return { ...conversation, messages: this.db.getMessages(conversationId) };
  }

  /**
   * Most recent messages within the limits, oldest first. Messages are dropped from the
   * start only, so the result is always a contiguous tail of the conversation.
   */
  getHistory(conversationId: string, limits: HistoryLimits): Message[] {
    const recent = this.db.getRecentMessages(conversationId, limits.maxMessages);
    if (limits.maxTokens === undefined) {
      return recent;
    }

    let budget = limits.maxTokens;
    let start = recent.length;
    while (start > 0) {
      const candidate = recent[start - 1];
      if (!candidate) break;
      const cost = TextProcessor.estimateTokenCount(candidate.content);
      if (cost > budget) break;
      budget -= cost;
      start--;
    }
    return recent.slice(start);
  }

  delete(conversationId: string): void {
    if (!this.db.deleteConversation(conversationId)) {
      throw new NotFoundError(`Conversation not found: ${conversationId}`);
    }
  }

  list(limit: number = 50, offset: number = 0): Conversation[] {
    return this.db.listConversations(limit, offset);
  }

  /**
   * Run `fn` while holding the conversation's lock. Exchanges on one conversation are
   * serialised in arrival order; different conversations never wait on each other.
   */
  withLock<T>(conversationId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(conversationId, fn);
  }

  isLocked(conversationId: string): boolean {
    return this.locks.isLocked(conversationId);
  }
}
