/**
 * Conversation and message type definitions
 */

/**
 * Role of a message kept in a channel's history
 */
export type ConversationRole = 'user' | 'assistant';

/**
 * Role of a message sent to the LLM (history roles plus the system instruction)
 */
export type MessageRole = 'system' | ConversationRole;

/**
 * Single message in an LLM request
 */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Single turn retained in a channel's history
 */
export interface ConversationMessage {
  role: ConversationRole;
  content: string;
}

/**
 * Complete state of one channel
 */
export interface ChannelState {
  channelId: string;
  personaId: string | null;
  history: ConversationMessage[];
  /** Bumped whenever the conversation context is reset */
  generation: number;
}

/**
 * Diagnostic counters for the conversation store
 */
export interface ConversationStats {
  channelCount: number;
  channelsWithPersona: number;
  totalMessageCount: number;
}
