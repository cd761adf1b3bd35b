/**
 * Inbound event, classification and dispatch result definitions
 *
 * These types are platform-agnostic: adapters translate chat platform objects
 * into an InboundEvent and render a DispatchResult back.
 */
import type { ArticleSummary } from './article';
import type { Persona } from './persona';

/**
 * Plain channel message
 */
export interface InboundMessage {
  kind: 'message';
  channelId: string;
  userId: string;
  guildId?: string;
  text: string;
  /** Author is the bot itself */
  fromSelf: boolean;
  /** Direct mention of the bot (reply-context mentions excluded) */
  mentionsBot: boolean;
  /** Used to strip mention markup from chat text */
  botUserId?: string;
}

/**
 * Slash-command invocation
 */
export interface InboundCommand {
  kind: 'command';
  channelId: string;
  userId: string;
  guildId?: string;
  name: string;
  args: Record<string, string | undefined>;
}

export type InboundEvent = InboundMessage | InboundCommand;

export type IgnoreReason = 'self' | 'no-trigger';

/**
 * Outcome of classifying one inbound event; at most one path runs per event
 */
export type Classification =
  | { type: 'ignore'; reason: IgnoreReason }
  | { type: 'summarize'; url: string }
  | { type: 'chat'; text: string }
  | { type: 'command'; name: string; args: Record<string, string | undefined> };

export type ErrorKind = 'validation' | 'fetch' | 'llm' | 'internal';

/**
 * User-visible failure produced by the dispatcher
 */
export interface DispatchError {
  type: 'error';
  kind: ErrorKind;
  /** Sub-reason, e.g. 'Forbidden' for a fetch failure */
  reason?: string;
  message: string;
  validIds?: string[];
}

export type DispatchResult =
  | { type: 'none' }
  | { type: 'summary'; summary: ArticleSummary }
  | { type: 'chat-reply'; text: string; personaId: string | null }
  | { type: 'persona-chooser'; current: Persona | null; personas: Persona[] }
  | { type: 'persona-set'; persona: Persona }
  | { type: 'persona-reset'; previous: Persona | null }
  | { type: 'rate-limited'; retryAfterMs: number }
  | DispatchError;
