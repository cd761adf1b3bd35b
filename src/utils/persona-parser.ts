/**
 * Persona parsing utilities - extracts prompt, profile and examples from persona files
 */
import type { ParsedPersona, Persona, PersonaExample } from '../types/index';
import { ValidationError } from '../errors/index';

/**
 * Section markers in persona files
 */
const PROFILE_MARKER = '---PROFILE---';
const EXAMPLES_MARKER = '---EXAMPLES---';

export const DEFAULT_PERSONA_ICON = '🎭';
export const DEFAULT_PERSONA_COLOR = 0x5865f2;

const MAX_COLOR = 0xffffff;

/**
 * Parses persona file content into system prompt, profile fields and examples
 * @param content - Raw persona file content
 * @param fallbackName - Display name used when the profile has none
 * @throws ValidationError if the file has no prompt text
 */
export function parsePersonaContent(content: string, fallbackName: string): ParsedPersona {
  const lines = content.split(/\r?\n/);

  const profileIndex = lines.findIndex((line) => line.trim() === PROFILE_MARKER);
  const examplesIndex = lines.findIndex((line) => line.trim() === EXAMPLES_MARKER);

  const firstMarkerIndex = Math.min(
    profileIndex === -1 ? Infinity : profileIndex,
    examplesIndex === -1 ? Infinity : examplesIndex
  );

  // System prompt is everything before the first marker
  const systemPrompt = lines.slice(0, firstMarkerIndex).join('\n').trim();
  if (!systemPrompt) {
    throw new ValidationError('Persona file has no prompt text');
  }

  const profile: Record<string, string> =
    profileIndex === -1
      ? {}
      : parseKeyValuePairs(sectionLines(lines, profileIndex, examplesIndex));
  const examples =
    examplesIndex === -1 ? [] : parseExamples(sectionLines(lines, examplesIndex, profileIndex));

  return {
    name: profile.name ?? fallbackName,
    icon: profile.icon ?? DEFAULT_PERSONA_ICON,
    color: parseColor(profile.color) ?? DEFAULT_PERSONA_COLOR,
    description: profile.description ?? '',
    systemPrompt,
    examples,
  };
}

/**
 * Lines after a marker, up to the other marker when it follows
 */
function sectionLines(lines: string[], start: number, otherMarker: number): string[] {
  const end = otherMarker > start ? otherMarker : lines.length;
  return lines.slice(start + 1, end);
}

/**
 * Parses key:value pairs from lines of text
 * @returns Record of key-value pairs; keys are lower-cased
 */
export function parseKeyValuePairs(lines: string[]): Record<string, string> {
  const pairs: Record<string, string> = {};

  for (const line of lines) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex > 0) {
      const key = trimmed.substring(0, colonIndex).trim().toLowerCase();
      const value = trimmed.substring(colonIndex + 1).trim();

      if (key && value) {
        pairs[key] = value;
      }
    }
  }

  return pairs;
}

/**
 * Pairs each `input:` line with the `output:` line that follows it
 */
export function parseExamples(lines: string[]): PersonaExample[] {
  const examples: PersonaExample[] = [];
  const pairs = lines.map((line) => line.trim()).filter(Boolean);
  let pendingInput: string | null = null;

  for (const line of pairs) {
    const colonIndex = line.indexOf(':');
    if (colonIndex <= 0) continue;

    const key = line.substring(0, colonIndex).trim().toLowerCase();
    const value = line.substring(colonIndex + 1).trim();

    if (key === 'input') {
      pendingInput = value;
    } else if (key === 'output' && pendingInput !== null) {
      examples.push({ input: pendingInput, output: value });
      pendingInput = null;
    }
  }

  return examples;
}

/**
 * Parses `0xRRGGBB`, `#RRGGBB` or a decimal string into a 24-bit color
 * @returns The color, or undefined when missing or out of range
 */
export function parseColor(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  let parsed: number;
  if (/^0x[0-9a-f]{1,6}$/i.test(trimmed)) {
    parsed = parseInt(trimmed.slice(2), 16);
  } else if (/^#[0-9a-f]{6}$/i.test(trimmed)) {
    parsed = parseInt(trimmed.slice(1), 16);
  } else if (/^\d+$/.test(trimmed)) {
    parsed = parseInt(trimmed, 10);
  } else {
    return undefined;
  }

  return parsed <= MAX_COLOR ? parsed : undefined;
}

/**
 * Display name with icon, e.g. "😏 Sarcastic Critic"
 */
export function formatDisplayName(persona: Pick<Persona, 'icon' | 'name'>): string {
  return `${persona.icon} ${persona.name}`;
}
