/**
 * Discord adapter - translates gateway events into dispatcher calls and
 * renders the results back to the channel
 */
import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  REST,
  Routes,
  type ChatInputCommandInteraction,
  type Interaction,
  type InteractionReplyOptions,
  type Message,
  type MessageCreateOptions,
  type StringSelectMenuInteraction,
} from 'discord.js';
import type { InboundCommand, InboundMessage } from '../types/index';
import { classifyEvent } from '../services/classifier';
import { Dispatcher } from '../services/dispatcher';
import { LoggerService } from '../services/logger';
import { PERSONA_STYLE_OPTION, slashCommands } from './commands';
import { PERSONA_SELECT_ID, renderResult, type RenderedMessage } from './render';

export interface MessageFields {
  channelId: string;
  guildId: string | null;
  authorId: string;
  content: string;
  mentionsBot: boolean;
}

export function toInboundMessage(fields: MessageFields, botUserId: string): InboundMessage {
  return {
    kind: 'message',
    channelId: fields.channelId,
    userId: fields.authorId,
    guildId: fields.guildId ?? undefined,
    text: fields.content,
    fromSelf: fields.authorId === botUserId,
    mentionsBot: fields.mentionsBot,
    botUserId,
  };
}

/**
 * Payload fields shared by channel sends and message replies
 */
export type MessageFieldsPayload = Pick<MessageCreateOptions, 'content' | 'embeds' | 'components'>;

export function toMessageOptions(rendered: RenderedMessage): MessageFieldsPayload {
  return {
    content: rendered.content,
    embeds: rendered.embeds,
    components: rendered.components,
  };
}

export function toInteractionReply(rendered: RenderedMessage): InteractionReplyOptions {
  return {
    content: rendered.content,
    embeds: rendered.embeds,
    components: rendered.components,
    ...(rendered.ephemeral ? { flags: MessageFlags.Ephemeral } : {}),
  };
}

export interface DiscordBotOptions {
  token: string;
}

export class DiscordBot {
  private readonly client: Client;
  private readonly dispatcher: Dispatcher;
  private readonly logger: LoggerService;
  private readonly token: string;

  constructor(dispatcher: Dispatcher, logger: LoggerService, options: DiscordBotOptions) {
    this.dispatcher = dispatcher;
    this.logger = logger;
    this.token = options.token;
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
    });

    this.client.once(
      Events.ClientReady,
      this.guard('ready', (client: Client<true>) => this.onReady(client))
    );
    this.client.on(
      Events.MessageCreate,
      this.guard('messageCreate', (message: Message) => this.handleMessage(message))
    );
    this.client.on(
      Events.InteractionCreate,
      this.guard('interactionCreate', (interaction: Interaction) => this.handleInteraction(interaction))
    );
  }

  async start(): Promise<void> {
    await this.client.login(this.token);
  }

  async stop(): Promise<void> {
    await this.client.destroy();
    this.logger.info('Discord client destroyed');
  }

  /**
   * Errors escaping a handler are logged instead of reaching the event emitter
   */
  private guard<T extends unknown[]>(
    name: string,
    handler: (...args: T) => Promise<void>
  ): (...args: T) => void {
    return (...args: T): void => {
      handler(...args).catch((error: unknown) => {
        this.logger.error(`Discord ${name} handler failed`, error);
      });
    };
  }

  private async onReady(client: Client<true>): Promise<void> {
    this.logger.info('Discord bot connected', { user: client.user.tag, guilds: client.guilds.cache.size });

    const rest = new REST({ version: '10' }).setToken(this.token);
    try {
      await rest.put(Routes.applicationCommands(client.user.id), {
        body: slashCommands.map((command) => command.toJSON()),
      });
      this.logger.info('Slash commands registered', {
        commands: slashCommands.map((command) => command.name),
      });
    } catch (error) {
      this.logger.error('Failed to register slash commands', error);
    }
  }

  private async handleMessage(message: Message): Promise<void> {
    const botUser = this.client.user;
    if (!botUser) {
      return;
    }

    const event = toInboundMessage(
      {
        channelId: message.channelId,
        guildId: message.guildId,
        authorId: message.author.id,
        content: message.content,
        mentionsBot: message.mentions.has(botUser, {
          ignoreEveryone: true,
          ignoreRoles: true,
          ignoreRepliedUser: true,
        }),
      },
      botUser.id
    );

    if (classifyEvent(event).type === 'ignore') {
      return;
    }

    const channel = message.channel;
    if (channel.isSendable()) {
      await channel.sendTyping().catch((error: unknown) => {
        this.logger.debug('Typing indicator failed', { channelId: message.channelId, error });
      });
    }

    const result = await this.dispatcher.dispatch(event);
    const [first, ...rest] = renderResult(result);
    if (!first) {
      return;
    }

    await message.reply({ ...toMessageOptions(first), allowedMentions: { repliedUser: false } });
    for (const chunk of rest) {
      if (channel.isSendable()) {
        await channel.send(toMessageOptions(chunk));
      }
    }
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleCommand(interaction);
      return;
    }
    if (interaction.isStringSelectMenu() && interaction.customId === PERSONA_SELECT_ID) {
      await this.handlePersonaSelect(interaction);
    }
  }

  private async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const channelId = interaction.channelId;
    if (!channelId) {
      return;
    }

    const event: InboundCommand = {
      kind: 'command',
      channelId,
      userId: interaction.user.id,
      guildId: interaction.guildId ?? undefined,
      name: interaction.commandName,
      args: { style: interaction.options.getString(PERSONA_STYLE_OPTION) ?? undefined },
    };

    const result = await this.dispatcher.dispatch(event);
    const [first, ...rest] = renderResult(result);
    if (!first) {
      await interaction.reply({ content: 'Nothing to do.', flags: MessageFlags.Ephemeral });
      return;
    }

    await interaction.reply(toInteractionReply(first));
    for (const chunk of rest) {
      await interaction.followUp(toInteractionReply(chunk));
    }
  }

  private async handlePersonaSelect(interaction: StringSelectMenuInteraction): Promise<void> {
    const [personaId] = interaction.values;
    const channelId = interaction.channelId;
    if (!personaId || !channelId) {
      return;
    }

    const result = this.dispatcher.selectPersona(channelId, personaId);
    const [rendered] = renderResult(result);
    await interaction.update({
      content: rendered?.content ?? null,
      embeds: rendered?.embeds ?? [],
      components: [],
    });
  }
}
