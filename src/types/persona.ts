/**
 * Persona type definitions
 */

/**
 * Example exchange shipped with a persona file
 */
export interface PersonaExample {
  input: string;
  output: string;
}

/**
 * Persona loaded from a markdown file in the personas directory
 */
export interface Persona {
  /**
   * Unique identifier (file name without extension)
   */
  id: string;

  /**
   * Display name of the persona
   */
  name: string;

  /**
   * Emoji shown next to the name
   */
  icon: string;

  /**
   * Embed color as a 24-bit integer
   */
  color: number;

  description: string;

  /**
   * Instruction text sent verbatim as the LLM system prompt
   */
  systemPrompt: string;

  examples: PersonaExample[];
}

/**
 * Presentation fields of a persona, as returned to clients
 */
export interface PersonaInfo {
  name: string;
  icon: string;
  color: number;
  description: string;
}

/**
 * Result of parsing a persona file before an id is assigned
 */
export type ParsedPersona = Omit<Persona, 'id'>;

/**
 * Read-only view of the persona registry used by the dispatcher
 */
export interface PersonaSource {
  getPersona(id: string): Persona | undefined;
  listPersonas(): Persona[];
  listPersonaIds(): string[];
}
