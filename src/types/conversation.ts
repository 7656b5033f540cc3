export type MessageRole = 'user' | 'assistant';

export type MessageStatus = 'complete' | 'incomplete';

export interface Conversation {
  id: string;
  title: string | null;
  created_at: string;
  updated_at: string;
}

export interface Message {
  id: number;
  conversation_id: string;
  role: MessageRole;
  content: string;
  status: MessageStatus;
  sources: number[];
  created_at: string;
}

export interface NewMessage {
  role: MessageRole;
  content: string;
  status?: MessageStatus;
  sources?: number[];
}

export interface ConversationWithMessages extends Conversation {
  messages: Message[];
}
