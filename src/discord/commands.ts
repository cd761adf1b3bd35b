/**
 * Slash command definitions registered with Discord
 */
import { SlashCommandBuilder } from 'discord.js';
import { PERSONA_COMMAND, PERSONA_RESET_KEYWORD } from '../services/dispatcher';

export const PERSONA_STYLE_OPTION = 'style';

export const personaCommand = new SlashCommandBuilder()
  .setName(PERSONA_COMMAND)
  .setDescription('Choose the persona that answers in this channel')
  .addStringOption((option) =>
    option
      .setName(PERSONA_STYLE_OPTION)
      .setDescription(`Persona id, or "${PERSONA_RESET_KEYWORD}" for the default voice`)
      .setRequired(false)
  );

export const slashCommands = [personaCommand];
