import { describe, it, expect } from 'vitest';
import { MessageFlags } from 'discord.js';
import { toInboundMessage, toInteractionReply, toMessageOptions } from '../bot';
import { personaCommand } from '../commands';

describe('toInboundMessage', () => {
  it('should map message fields and flag the bot as author', () => {
    const fields = {
      channelId: 'c1',
      guildId: 'g1',
      authorId: 'bot1',
      content: 'hello',
      mentionsBot: false,
    };

    expect(toInboundMessage(fields, 'bot1')).toEqual({
      kind: 'message',
      channelId: 'c1',
      userId: 'bot1',
      guildId: 'g1',
      text: 'hello',
      fromSelf: true,
      mentionsBot: false,
      botUserId: 'bot1',
    });
  });

  it('should leave guildId unset for direct messages', () => {
    const event = toInboundMessage(
      { channelId: 'dm1', guildId: null, authorId: 'u1', content: '<@bot1> hi', mentionsBot: true },
      'bot1'
    );
    expect(event.guildId).toBeUndefined();
    expect(event.fromSelf).toBe(false);
  });
});

describe('reply options', () => {
  it('should mark ephemeral interaction replies with the flag', () => {
    expect(toInteractionReply({ content: 'private', ephemeral: true })).toEqual({
      content: 'private',
      embeds: undefined,
      components: undefined,
      flags: MessageFlags.Ephemeral,
    });
    expect(toInteractionReply({ content: 'public', ephemeral: false })).not.toHaveProperty('flags');
  });

  it('should drop the ephemeral marker for channel messages', () => {
    expect(toMessageOptions({ content: 'hi', ephemeral: true })).not.toHaveProperty('ephemeral');
  });
});

describe('persona slash command', () => {
  it('should expose an optional style option', () => {
    const json = personaCommand.toJSON();
    expect(json.name).toBe('persona');
    expect(json.options).toHaveLength(1);
    expect(json.options?.[0]).toMatchObject({ name: 'style', required: false });
  });
});
