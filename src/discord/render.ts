/**
 * Renders dispatcher results as Discord message payloads
 */
import {
  ActionRowBuilder,
  EmbedBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder,
} from 'discord.js';
import type { ArticleSummary, DispatchResult, Persona } from '../types/index';
import { formatDisplayName } from '../utils/persona-parser';

export const DISCORD_MESSAGE_LIMIT = 2000;
export const PERSONA_SELECT_ID = 'persona-select';

const MAX_SELECT_OPTIONS = 25;
const MAX_OPTION_TEXT = 100;
const MAX_EMBED_TITLE = 256;
const MAX_EMBED_DESCRIPTION = 4096;
const MAX_FIELD_VALUE = 1024;

export interface RenderedMessage {
  content?: string;
  embeds?: EmbedBuilder[];
  components?: ActionRowBuilder<StringSelectMenuBuilder>[];
  /** Only honored for interaction replies */
  ephemeral: boolean;
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

/**
 * Splits text into chunks of at most limit characters, preferring line breaks
 */
export function splitMessage(text: string, limit = DISCORD_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    let cut = rest.lastIndexOf('\n', limit);
    if (cut <= 0) {
      cut = limit;
    }
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^\n/, '');
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }
  return chunks;
}

export function buildSummaryEmbed(summary: ArticleSummary): EmbedBuilder {
  const { personaInfo } = summary;
  const embed = new EmbedBuilder()
    .setColor(personaInfo.color)
    .setTitle(truncate(`${formatDisplayName(personaInfo)}'s article pick`, MAX_EMBED_TITLE))
    .setURL(summary.articleUrl)
    .setDescription(truncate(summary.summary, MAX_EMBED_DESCRIPTION))
    .addFields(
      { name: 'Article', value: truncate(summary.articleTitle, MAX_FIELD_VALUE) },
      { name: 'Link', value: truncate(summary.articleUrl, MAX_FIELD_VALUE) }
    );

  if (summary.truncated) {
    embed.setFooter({ text: 'Only the beginning of the article was summarized.' });
  }
  return embed;
}

export function buildChooserEmbed(current: Persona | null, personas: Persona[]): EmbedBuilder {
  const lines = personas.map(
    (persona) => `${persona.icon} **${persona.name}** (\`${persona.id}\`) - ${persona.description}`
  );
  const currentLabel = current ? formatDisplayName(current) : 'Default voice';

  return new EmbedBuilder()
    .setColor(current?.color ?? 0x5865f2)
    .setTitle('Choose a persona')
    .setDescription(truncate(lines.join('\n') || 'No personas are available.', MAX_EMBED_DESCRIPTION))
    .addFields({ name: 'Current', value: currentLabel });
}

export function buildPersonaSelect(
  current: Persona | null,
  personas: Persona[]
): ActionRowBuilder<StringSelectMenuBuilder> {
  const options = [...personas]
    .sort((a, b) => a.id.localeCompare(b.id))
    .slice(0, MAX_SELECT_OPTIONS)
    .map((persona) =>
      new StringSelectMenuOptionBuilder()
        .setLabel(truncate(formatDisplayName(persona), MAX_OPTION_TEXT))
        .setValue(persona.id)
        .setDescription(truncate(persona.description || persona.id, MAX_OPTION_TEXT))
        .setDefault(persona.id === current?.id)
    );

  const menu = new StringSelectMenuBuilder()
    .setCustomId(PERSONA_SELECT_ID)
    .setPlaceholder('Pick a persona')
    .addOptions(options);

  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
}

/**
 * Converts one dispatch result into the messages to send, in order
 */
export function renderResult(result: DispatchResult): RenderedMessage[] {
  switch (result.type) {
    case 'none':
      return [];

    case 'summary':
      return [{ embeds: [buildSummaryEmbed(result.summary)], ephemeral: false }];

    case 'chat-reply': {
      const text =
        result.personaId === null ? result.text : `${result.text}\n\n-# Persona: ${result.personaId}`;
      return splitMessage(text).map((content) => ({ content, ephemeral: false }));
    }

    case 'persona-chooser':
      if (result.personas.length === 0) {
        return [{ content: 'No personas are available.', ephemeral: true }];
      }
      return [
        {
          embeds: [buildChooserEmbed(result.current, result.personas)],
          components: [buildPersonaSelect(result.current, result.personas)],
          ephemeral: true,
        },
      ];

    case 'persona-set':
      return [
        {
          content: `${result.persona.icon} Persona set to **${result.persona.name}**. Conversation history has been cleared.`,
          ephemeral: false,
        },
      ];

    case 'persona-reset':
      return [
        {
          content: result.previous
            ? `Persona **${result.previous.name}** has been reset. Back to the default voice.`
            : 'No persona was active. Using the default voice.',
          ephemeral: false,
        },
      ];

    case 'rate-limited':
      return [
        {
          content: `⏳ Slow down! You can use this command again in ${Math.ceil(result.retryAfterMs / 1000)}s.`,
          ephemeral: true,
        },
      ];

    case 'error':
      return [{ content: `⚠️ ${result.message}`, ephemeral: result.kind === 'validation' }];
  }
}
