/**
 * Dispatcher - turns every inbound event into exactly one DispatchResult
 */
import type {
  ArticleSummary,
  CompletionService,
  DispatchError,
  DispatchResult,
  InboundEvent,
  Persona,
  PersonaSource,
} from '../types/index';
import type { FetchFailureReason } from '../errors/index';
import { config } from '../config/index';
import {
  PersonaNotFoundError,
  UpstreamFetchError,
  UpstreamLLMError,
  ValidationError,
} from '../errors/index';
import { KeyedQueue } from '../utils/keyed-queue';
import { classifyEvent } from './classifier';
import { ConversationService } from './conversation';
import { LoggerService } from './logger';
import { RateLimiterService } from './rate-limiter';

export const DEFAULT_CHAT_INSTRUCTION = 'You are a kind and helpful assistant.';
export const PERSONA_COMMAND = 'persona';
export const PERSONA_RESET_KEYWORD = 'reset';

export const LLM_FAILURE_MESSAGE =
  "Sorry, I couldn't generate a response right now. Please try again later.";
export const INTERNAL_FAILURE_MESSAGE = 'Something went wrong while handling that message.';

const FETCH_FAILURE_MESSAGES: Record<FetchFailureReason, string> = {
  InvalidUrl: 'that link is not a valid http(s) URL.',
  NotFound: 'the page was not found (404 Not Found).',
  Forbidden: 'access to the page was denied (403 Forbidden).',
  Timeout: 'the page took too long to respond (Timeout).',
  UnsupportedContent: 'the page has no readable article text (it may need JavaScript).',
  TooLarge: 'the page is too large to read.',
  HttpError: 'the site returned an error.',
  NetworkError: 'the site could not be reached.',
};

export function fetchFailureMessage(reason: FetchFailureReason): string {
  return `Couldn't fetch the article: ${FETCH_FAILURE_MESSAGES[reason]}`;
}

type CommandArgs = Record<string, string | undefined>;

export interface ArticleSummarizer {
  summarize(url: string, personaId: string | null): Promise<ArticleSummary>;
}

export interface DispatcherDeps {
  store: ConversationService;
  personas: PersonaSource;
  summaries: ArticleSummarizer;
  completion: CompletionService;
  rateLimiter: RateLimiterService;
  logger: LoggerService;
}

export interface DispatcherOptions {
  /** Number of history messages sent with each persona chat */
  contextLimit?: number;
}

/**
 * Routes URL messages, mentions and commands.
 * Persona chats are serialized per channel; other channels proceed concurrently.
 */
export class Dispatcher {
  private readonly store: ConversationService;
  private readonly personas: PersonaSource;
  private readonly summaries: ArticleSummarizer;
  private readonly completion: CompletionService;
  private readonly rateLimiter: RateLimiterService;
  private readonly logger: LoggerService;
  private readonly contextLimit: number;
  private readonly chatQueue = new KeyedQueue();

  constructor(deps: DispatcherDeps, options: DispatcherOptions = {}) {
    this.store = deps.store;
    this.personas = deps.personas;
    this.summaries = deps.summaries;
    this.completion = deps.completion;
    this.rateLimiter = deps.rateLimiter;
    this.logger = deps.logger;
    this.contextLimit = Math.min(
      options.contextLimit ?? config.conversation.contextLimit,
      this.store.getMaxHistory()
    );
  }

  /**
   * Handles one inbound event; failures become an error result, never a rejection
   */
  async dispatch(event: InboundEvent): Promise<DispatchResult> {
    try {
      const classification = classifyEvent(event);
      switch (classification.type) {
        case 'ignore':
          return { type: 'none' };
        case 'summarize':
          return await this.handleUrl(event.channelId, classification.url);
        case 'chat':
          return await this.handleChat(event.channelId, classification.text);
        case 'command':
          return this.handleCommand(
            event.channelId,
            event.userId,
            classification.name,
            classification.args
          );
      }
    } catch (error) {
      return this.toErrorResult(error, event.channelId);
    }
  }

  /**
   * Commits a persona picked from the chooser.
   * The chooser belongs to an already admitted command, so no rate limit applies.
   */
  selectPersona(channelId: string, personaId: string): DispatchResult {
    try {
      return this.applyPersonaChoice(channelId, personaId);
    } catch (error) {
      return this.toErrorResult(error, channelId);
    }
  }

  /**
   * Persona active in the channel; a stored id missing from the registry counts as none
   */
  private activePersona(channelId: string): Persona | null {
    const personaId = this.store.getPersona(channelId);
    if (personaId === null) {
      return null;
    }
    const persona = this.personas.getPersona(personaId);
    if (!persona) {
      this.logger.warn('Stored persona is no longer registered', { channelId, personaId });
      return null;
    }
    return persona;
  }

  private async handleUrl(channelId: string, url: string): Promise<DispatchResult> {
    const persona = this.activePersona(channelId);
    this.logger.info('Summarizing article', { channelId, url, personaId: persona?.id ?? null });

    const summary = await this.summaries.summarize(url, persona?.id ?? null);
    return { type: 'summary', summary };
  }

  private handleChat(channelId: string, text: string): Promise<DispatchResult> {
    return this.chatQueue.run(channelId, async (): Promise<DispatchResult> => {
      const persona = this.activePersona(channelId);

      if (!persona) {
        // Stateless default voice: no history is read or written
        const reply = await this.completion.complete(DEFAULT_CHAT_INSTRUCTION, [
          { role: 'user', content: text },
        ]);
        return { type: 'chat-reply', text: reply, personaId: null };
      }

      const generation = this.store.getGeneration(channelId);
      const history = this.store.getHistory(channelId, this.contextLimit);
      const reply = await this.completion.complete(persona.systemPrompt, [
        ...history,
        { role: 'user', content: text },
      ]);

      // Recorded only after a successful completion
      this.store.appendExchange(channelId, text, reply, generation);
      this.logger.debug('Persona chat exchange recorded', {
        channelId,
        personaId: persona.id,
        contextUsed: history.length,
      });
      return { type: 'chat-reply', text: reply, personaId: persona.id };
    });
  }

  private handleCommand(
    channelId: string,
    userId: string,
    name: string,
    args: CommandArgs
  ): DispatchResult {
    // Rejected commands do no other work
    if (!this.rateLimiter.tryAcquire(userId)) {
      const retryAfterMs = this.rateLimiter.getRetryAfterMs(userId);
      this.logger.info('Command rate limited', { userId, command: name, retryAfterMs });
      return { type: 'rate-limited', retryAfterMs };
    }

    if (name !== PERSONA_COMMAND) {
      throw new ValidationError(`Unknown command: ${name}`, { command: name });
    }

    const style = args.style?.trim();
    if (!style) {
      const currentId = this.store.getPersona(channelId);
      return {
        type: 'persona-chooser',
        current: currentId === null ? null : (this.personas.getPersona(currentId) ?? null),
        personas: this.personas.listPersonas(),
      };
    }

    return this.applyPersonaChoice(channelId, style);
  }

  private applyPersonaChoice(channelId: string, style: string): DispatchResult {
    const personaId = style.trim().toLowerCase();

    if (personaId === PERSONA_RESET_KEYWORD) {
      const previousId = this.store.switchPersona(channelId, null);
      this.logger.info('Persona reset', { channelId, previousId });
      return {
        type: 'persona-reset',
        previous: previousId === null ? null : (this.personas.getPersona(previousId) ?? null),
      };
    }

    const persona = this.personas.getPersona(personaId);
    if (!persona) {
      throw new PersonaNotFoundError(personaId, this.personas.listPersonaIds());
    }

    this.store.switchPersona(channelId, persona.id);
    return { type: 'persona-set', persona };
  }

  private toErrorResult(error: unknown, channelId: string): DispatchError {
    if (error instanceof PersonaNotFoundError) {
      this.logger.info('Unknown persona requested', { channelId, personaId: error.personaId });
      return {
        type: 'error',
        kind: 'validation',
        message: `Persona \`${error.personaId}\` was not found. Available personas: ${error.validIds.join(', ')}`,
        validIds: error.validIds,
      };
    }

    if (error instanceof ValidationError) {
      return { type: 'error', kind: 'validation', message: error.message };
    }

    if (error instanceof UpstreamFetchError) {
      this.logger.warn('Article fetch failed', { channelId, error });
      return {
        type: 'error',
        kind: 'fetch',
        reason: error.reason,
        message: fetchFailureMessage(error.reason),
      };
    }

    if (error instanceof UpstreamLLMError) {
      this.logger.warn('Completion failed', { channelId, error });
      return { type: 'error', kind: 'llm', reason: error.reason, message: LLM_FAILURE_MESSAGE };
    }

    this.logger.error('Unexpected dispatch failure', error);
    return { type: 'error', kind: 'internal', message: INTERNAL_FAILURE_MESSAGE };
  }
}
