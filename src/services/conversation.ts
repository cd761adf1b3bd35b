/**
 * Conversation service - per-channel persona selection and bounded message history
 */
import type {
  ChannelState,
  ConversationMessage,
  ConversationRole,
  ConversationStats,
} from '../types/index';
import { config } from '../config/index';
import { InternalStateError } from '../errors/index';
import { LoggerService } from './logger';

export interface ConversationOptions {
  /** Maximum number of messages retained per channel */
  maxHistory?: number;
}

const VALID_ROLES: ReadonlySet<string> = new Set<ConversationRole>(['user', 'assistant']);

/**
 * Single source of truth for channel state.
 *
 * All operations are synchronous, so each one runs to completion on the event
 * loop without interleaving with other handlers.
 */
export class ConversationService {
  private readonly channels = new Map<string, ChannelState>();
  private readonly logger: LoggerService;
  private readonly maxHistory: number;

  constructor(logger: LoggerService, options: ConversationOptions = {}) {
    this.logger = logger;
    this.maxHistory = Math.max(1, options.maxHistory ?? config.conversation.maxHistory);
  }

  /**
   * Maximum number of messages retained per channel
   */
  getMaxHistory(): number {
    return this.maxHistory;
  }

  /**
   * Returns the channel state, creating it on first access
   */
  private ensureChannel(channelId: string): ChannelState {
    let state = this.channels.get(channelId);
    if (!state) {
      state = { channelId, personaId: null, history: [], generation: 0 };
      this.channels.set(channelId, state);
    }
    return state;
  }

  /**
   * Validates the history bound; a violation resets the channel and raises
   */
  private verifyChannel(state: ChannelState): void {
    const overflow = state.history.length > this.maxHistory;
    const badRole = state.history.some((message) => !VALID_ROLES.has(message.role));
    if (!overflow && !badRole) {
      return;
    }

    const error = new InternalStateError('Channel state invariant violated', {
      channelId: state.channelId,
      historyLength: state.history.length,
      maxHistory: this.maxHistory,
    });
    this.logger.error('Conversation state corrupted, resetting channel', error);
    this.channels.set(state.channelId, {
      channelId: state.channelId,
      personaId: null,
      history: [],
      generation: state.generation + 1,
    });
    throw error;
  }

  setPersona(channelId: string, personaId: string): void {
    this.ensureChannel(channelId).personaId = personaId;
    this.logger.info('Persona set for channel', { channelId, personaId });
  }

  /**
   * @returns Persona id, or null when none is active or the channel is unknown
   */
  getPersona(channelId: string): string | null {
    return this.channels.get(channelId)?.personaId ?? null;
  }

  /**
   * Clears the persona; history is left untouched
   */
  resetPersona(channelId: string): void {
    const state = this.channels.get(channelId);
    if (!state || state.personaId === null) {
      return;
    }
    const oldPersonaId = state.personaId;
    state.personaId = null;
    this.logger.info('Persona reset', { channelId, oldPersonaId });
  }

  clearHistory(channelId: string): void {
    const state = this.ensureChannel(channelId);
    const clearedCount = state.history.length;
    state.history = [];
    state.generation++;
    if (clearedCount > 0) {
      this.logger.info('Conversation history cleared', { channelId, clearedCount });
    }
  }

  /**
   * Sets (or resets, with null) the persona and clears history in one step.
   * Context never carries across a persona change.
   * @returns The previously active persona id
   */
  switchPersona(channelId: string, personaId: string | null): string | null {
    const previous = this.getPersona(channelId);
    if (personaId === null) {
      this.resetPersona(channelId);
    } else {
      this.setPersona(channelId, personaId);
    }
    this.clearHistory(channelId);
    return previous;
  }

  /**
   * Appends a message, evicting the oldest entries beyond the history bound
   */
  appendMessage(channelId: string, role: ConversationRole, content: string): void {
    const state = this.ensureChannel(channelId);
    state.history.push({ role, content });

    if (state.history.length > this.maxHistory) {
      const removedCount = state.history.length - this.maxHistory;
      state.history = state.history.slice(removedCount);
      this.logger.debug('Trimmed conversation history', {
        channelId,
        removedCount,
        newLength: state.history.length,
      });
    }

    this.verifyChannel(state);
  }

  /**
   * Appends a user turn and its reply together.
   * With expectedGeneration, nothing is written if the channel was switched or
   * cleared after the caller read its context.
   * @returns Whether the exchange was recorded
   */
  appendExchange(
    channelId: string,
    userContent: string,
    assistantContent: string,
    expectedGeneration?: number
  ): boolean {
    if (expectedGeneration !== undefined && this.getGeneration(channelId) !== expectedGeneration) {
      this.logger.warn('Discarding exchange for a reset channel', {
        channelId,
        expectedGeneration,
        currentGeneration: this.getGeneration(channelId),
      });
      return false;
    }
    this.appendMessage(channelId, 'user', userContent);
    this.appendMessage(channelId, 'assistant', assistantContent);
    return true;
  }

  /**
   * Returns the most recent messages, oldest first
   * @param limit - Context window size; capped at the retained history bound
   */
  getHistory(channelId: string, limit: number = this.maxHistory): ConversationMessage[] {
    const state = this.channels.get(channelId);
    if (!state) {
      return [];
    }
    this.verifyChannel(state);

    const window = Math.min(Math.max(0, limit), this.maxHistory);
    if (window === 0) {
      return [];
    }
    return state.history.slice(-window).map((message) => ({ ...message }));
  }

  getGeneration(channelId: string): number {
    return this.channels.get(channelId)?.generation ?? 0;
  }

  getStats(): ConversationStats {
    let channelsWithPersona = 0;
    let totalMessageCount = 0;
    for (const state of this.channels.values()) {
      if (state.personaId !== null) channelsWithPersona++;
      totalMessageCount += state.history.length;
    }
    return {
      channelCount: this.channels.size,
      channelsWithPersona,
      totalMessageCount,
    };
  }
}
