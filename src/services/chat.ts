import { randomUUID } from 'crypto';
import { ConversationStore, HistoryLimits } from './conversation-store.js';
import { ModelRouter } from './model-router.js';
import { Retriever } from './retriever.js';
import { ChatMessage } from '../types/provider.js';
import { Message, MessageStatus } from '../types/conversation.js';
import { RetrievedChunk } from '../types/search.js';
import { BoundedChannel } from '../utils/channel.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

export type ChatState = 'pending' | 'retrieving' | 'generating' | 'finalizing' | 'done' | 'failed';

export interface ChatRequest {
  message: string;
  conversationId?: string;
  documentIds?: string[];
}

export interface ChatResult {
  conversationId: string;
  state: 'done' | 'failed';
  response: string;
  status: MessageStatus | null;
  /** The stored assistant message, or null when nothing was persisted. */
  message: Message | null;
  sources: RetrievedChunk[];
  cancelled: boolean;
  error?: unknown;
}

/**
 * A running exchange. `fragments` must be consumed (or abandoned, which cancels the
 * generation); `done` always resolves, failures included.
 */
export interface ChatStream {
  conversationId: string;
  fragments: AsyncIterable<string>;
  done: Promise<ChatResult>;
}

export interface ChatOrchestratorOptions {
  systemPrompt: string;
  history: HistoryLimits;
  topK?: number;
  bufferSize?: number;
  logger?: Logger;
}

export const CONTEXT_HEADER = 'Context information is below.\n---------------------';
export const CONTEXT_FOOTER =
  '---------------------\nGiven the context information and not prior knowledge, answer the query.';

export function buildContextBlock(chunks: RetrievedChunk[]): string {
  const body = chunks.map(chunk => `[${chunk.filename}]\n${chunk.text}`).join('\n\n');
  return `${CONTEXT_HEADER}\n${body}\n${CONTEXT_FOOTER}`;
}

export class ChatOrchestrator {
  private log: Logger;

  constructor(
    private conversations: ConversationStore,
    private retriever: Retriever,
    private router: ModelRouter,
    private options: ChatOrchestratorOptions
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'chat' });
  }

  /**
   * Start an exchange. The user message is stored, context retrieved and generation
   * started in the background under the conversation's lock; fragments reach the caller
   * through a bounded channel as they are produced.
   */
  chat(request: ChatRequest, options: { signal?: AbortSignal } = {}): ChatStream {
    const message = request.message.trim();
    if (message.length === 0) {
      throw new ValidationError('Message cannot be empty');
    }
    if (request.conversationId !== undefined && request.conversationId.trim().length === 0) {
      throw new ValidationError('conversation_id cannot be empty');
    }

    const conversationId = request.conversationId ?? randomUUID();
    const channel = new BoundedChannel<string>(this.options.bufferSize ?? 16);

    const cancel = () => channel.cancel(options.signal?.reason);
    if (options.signal?.aborted) {
      cancel();
    } else {
      options.signal?.addEventListener('abort', cancel, { once: true });
    }

    const done = this.conversations
      .withLock(conversationId, () => this.run(conversationId, message, request.documentIds ?? [], channel))
      .catch((error: unknown) => this.lockFailure(conversationId, channel, error))
      .finally(() => options.signal?.removeEventListener('abort', cancel));

    return { conversationId, fragments: channel, done };
  }

  /**
   * Run an exchange to completion and return its result, rethrowing its failure.
   */
  async respond(request: ChatRequest, options: { signal?: AbortSignal } = {}): Promise<ChatResult> {
    const stream = this.chat(request, options);
    let received = 0;
    for await (const fragment of stream.fragments) {
      received += fragment.length;
    }

    const result = await stream.done;
    if (result.error !== undefined) {
      throw result.error;
    }
    this.log.debug('chat.drained', { conversationId: stream.conversationId, chars: received });
    return result;
  }

  private async run(
    conversationId: string,
    message: string,
    documentIds: string[],
    channel: BoundedChannel<string>
  ): Promise<ChatResult> {
    const machine: { state: ChatState } = { state: 'pending' };
    const log = this.log.child({ conversationId });
    const transition = (next: ChatState) => {
      log.debug('chat.state', { from: machine.state, to: next });
      machine.state = next;
    };

    const startedAt = Date.now();
    let response = '';
    let sources: RetrievedChunk[] = [];
    let failure: unknown;

    try {
      this.conversations.createOrGet(conversationId, message);
      const history = this.conversations.getHistory(conversationId, this.options.history);
      this.conversations.append(conversationId, { role: 'user', content: message });

      if (documentIds.length > 0) {
        transition('retrieving');
        sources = await this.retriever.retrieve(message, { documentIds, k: this.options.topK });
        log.debug('chat.context', { requested: documentIds.length, chunks: sources.length });
      }

      transition('generating');
      const prompt = this.buildPrompt(history, message, sources);

      for await (const fragment of this.router.generate(prompt, { signal: channel.signal })) {
        response += fragment;
        if (!(await channel.send(fragment))) {
          break;
        }
      }
    } catch (error) {
      failure = error;
    }

    transition('finalizing');
    const cancelled = channel.isCancelled;
    const status: MessageStatus = failure !== undefined || cancelled ? 'incomplete' : 'complete';
    let stored: Message | null = null;

    // Nothing is stored for an exchange that failed or was cancelled before any text arrived.
    if (response.length > 0 || status === 'complete') {
      try {
        stored = this.conversations.append(conversationId, {
          role: 'assistant',
          content: response,
          status,
          sources: sources.map(source => source.chunkId),
        });
      } catch (error) {
        log.error('chat.persist_failed', { error });
        failure ??= error;
      }
    }

    const error = cancelled ? undefined : failure;
    const outcome = error === undefined && !cancelled ? 'done' : 'failed';
    transition(outcome);
    channel.close(error);

    const fields = {
      state: outcome,
      chars: response.length,
      sources: sources.length,
      cancelled,
      durationMs: Date.now() - startedAt,
    };
    if (error !== undefined) {
      log.warn('chat.failed', { ...fields, error: errorMessage(error) });
    } else {
      log.info('chat.finished', fields);
    }

    return {
      conversationId,
      state: outcome,
      response,
      status: stored ? status : null,
      message: stored,
      sources,
      cancelled,
      error,
    };
  }

  private buildPrompt(history: Message[], message: string, sources: RetrievedChunk[]): ChatMessage[] {
    const system = sources.length > 0
      ? `${this.options.systemPrompt}\n\n${buildContextBlock(sources)}`
      : this.options.systemPrompt;

    return [
      { role: 'system', content: system },
      ...history.map(entry => ({ role: entry.role, content: entry.content })),
      { role: 'user', content: message },
    ];
  }

  private lockFailure(conversationId: string, channel: BoundedChannel<string>, error: unknown): ChatResult {
    this.log.error('chat.crashed', { conversationId, error });
    channel.close(error);
    return {
      conversationId,
      state: 'failed',
      response: '',
      status: null,
      message: null,
      sources: [],
      cancelled: channel.isCancelled,
      error,
    };
  }
}
