/**
 * Persona service - loads persona descriptors from markdown files
 */
import path from 'path';
import { readdir, readFile } from 'fs/promises';
import type { Persona, PersonaSource } from '../types/index';
import { config } from '../config/index';
import { ConfigurationError } from '../errors/index';
import { parsePersonaContent } from '../utils/persona-parser';
import { LoggerService } from './logger';

const PERSONA_FILE_PATTERN = /^([a-z0-9][a-z0-9_-]*)\.md$/i;

/**
 * Read-only persona registry, loaded once at startup
 */
export class PersonaService implements PersonaSource {
  private readonly personasDir: string;
  private readonly logger: LoggerService;
  private personas = new Map<string, Persona>();

  constructor(logger: LoggerService, personasDir?: string) {
    this.logger = logger;
    this.personasDir = personasDir ?? config.persona.personasDir;
  }

  /**
   * Loads every `<id>.md` file in the personas directory.
   * Files that fail to parse are skipped with a warning.
   * @returns Number of personas loaded
   * @throws ConfigurationError if the directory is missing or holds no valid persona
   */
  async loadAll(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.personasDir);
    } catch (error) {
      throw new ConfigurationError(`Personas directory not found: ${this.personasDir}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const loaded = new Map<string, Persona>();
    for (const filename of entries.sort()) {
      const match = PERSONA_FILE_PATTERN.exec(filename);
      if (!match) continue;

      const id = match[1].toLowerCase();
      try {
        const content = await readFile(path.join(this.personasDir, filename), 'utf-8');
        loaded.set(id, { id, ...parsePersonaContent(content, id) });
      } catch (error) {
        this.logger.warn('Skipping invalid persona file', { filename, error });
      }
    }

    if (loaded.size === 0) {
      throw new ConfigurationError(`No persona files found in ${this.personasDir}`);
    }

    this.personas = loaded;
    this.logger.info('Personas loaded', {
      count: loaded.size,
      ids: this.listPersonaIds(),
    });
    return loaded.size;
  }

  getPersona(id: string): Persona | undefined {
    return this.personas.get(id.toLowerCase());
  }

  /**
   * All personas, sorted by id
   */
  listPersonas(): Persona[] {
    return [...this.personas.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  listPersonaIds(): string[] {
    return this.listPersonas().map((persona) => persona.id);
  }
}
