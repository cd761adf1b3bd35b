/**
 * Message classifier - decides which handling path an inbound event takes
 */
import type { Classification, InboundEvent, InboundMessage } from '../types/index';

const URL_CANDIDATE_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

/**
 * Chat prompt used when a mention carries no text
 */
export const EMPTY_MENTION_PROMPT = 'Say hello and ask what I would like to talk about.';

/**
 * Trims characters that end a sentence rather than a URL
 */
function trimUrlCandidate(candidate: string): string {
  let url = candidate.replace(TRAILING_PUNCTUATION, '');

  // "(see https://example.com/a)" should not keep the closing parenthesis
  while (url.endsWith(')')) {
    const opens = url.split('(').length - 1;
    const closes = url.split(')').length - 1;
    if (closes <= opens) break;
    url = url.slice(0, -1).replace(TRAILING_PUNCTUATION, '');
  }

  return url;
}

function isWellFormedUrl(candidate: string): boolean {
  try {
    const parsed = new URL(candidate);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
  } catch {
    return false;
  }
}

/**
 * Extracts well-formed http(s) URLs in order of appearance
 */
export function extractUrls(text: string): string[] {
  const urls: string[] = [];
  for (const match of text.matchAll(URL_CANDIDATE_PATTERN)) {
    const url = trimUrlCandidate(match[0]);
    if (isWellFormedUrl(url)) {
      urls.push(url);
    }
  }
  return urls;
}

export function firstUrl(text: string): string | null {
  return extractUrls(text)[0] ?? null;
}

/**
 * Removes `<@id>` and `<@!id>` mention markup for the given user
 */
export function stripMention(text: string, botUserId?: string): string {
  if (!botUserId) {
    return text.trim();
  }
  return text.split(`<@${botUserId}>`).join('').split(`<@!${botUserId}>`).join('').trim();
}

function classifyMessage(message: InboundMessage): Classification {
  if (message.fromSelf) {
    return { type: 'ignore', reason: 'self' };
  }

  // Text commands are handled by the platform's slash commands
  if (message.text.trimStart().startsWith('/')) {
    return { type: 'ignore', reason: 'no-trigger' };
  }

  const url = firstUrl(message.text);
  if (url) {
    return { type: 'summarize', url };
  }

  if (message.mentionsBot) {
    const text = stripMention(message.text, message.botUserId);
    return { type: 'chat', text: text || EMPTY_MENTION_PROMPT };
  }

  return { type: 'ignore', reason: 'no-trigger' };
}

/**
 * Classifies an inbound event; the first matching rule wins
 */
export function classifyEvent(event: InboundEvent): Classification {
  if (event.kind === 'command') {
    return { type: 'command', name: event.name, args: event.args };
  }
  return classifyMessage(event);
}
