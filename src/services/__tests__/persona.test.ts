import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { PersonaService } from '../persona';
import { LoggerService } from '../logger';
import { ConfigurationError } from '../../errors';
import { createSilentLogger } from '../../__tests__/helpers';

describe('PersonaService', () => {
  let logger: LoggerService;
  let dir: string;

  beforeEach(async () => {
    logger = createSilentLogger();
    dir = await mkdtemp(path.join(os.tmpdir(), 'personas-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load markdown personas keyed by file name', async () => {
    await writeFile(path.join(dir, 'sarcastic.md'), 'You are sarcastic.\n---PROFILE---\nname: Critic');
    await writeFile(path.join(dir, 'professor.md'), 'You are a professor.');
    await writeFile(path.join(dir, 'notes.txt'), 'not a persona');

    const service = new PersonaService(logger, dir);
    const count = await service.loadAll();

    expect(count).toBe(2);
    expect(service.listPersonaIds()).toEqual(['professor', 'sarcastic']);
    expect(service.getPersona('sarcastic')?.name).toBe('Critic');
    expect(service.getPersona('professor')?.systemPrompt).toBe('You are a professor.');
    expect(service.getPersona('notes')).toBeUndefined();
    expect(service.getPersona('SARCASTIC')?.name).toBe('Critic');
  });

  it('should skip files that fail to parse', async () => {
    await writeFile(path.join(dir, 'good.md'), 'You are good.');
    await writeFile(path.join(dir, 'empty.md'), '   ');

    const service = new PersonaService(logger, dir);
    await service.loadAll();

    expect(service.listPersonaIds()).toEqual(['good']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping invalid persona file',
      expect.objectContaining({ filename: 'empty.md' })
    );
  });

  it('should fail when the directory is missing', async () => {
    const service = new PersonaService(logger, path.join(dir, 'missing'));
    await expect(service.loadAll()).rejects.toThrow(ConfigurationError);
  });

  it('should fail when no persona files are present', async () => {
    const service = new PersonaService(logger, dir);
    await expect(service.loadAll()).rejects.toThrow(`No persona files found in ${dir}`);
  });

  it('should load the bundled personas', async () => {
    const service = new PersonaService(logger, path.join(process.cwd(), 'personas'));
    await service.loadAll();

    expect(service.listPersonaIds()).toEqual([
      'cheerleader',
      'noir-detective',
      'professor',
      'sarcastic',
    ]);
    const sarcastic = service.getPersona('sarcastic');
    expect(sarcastic?.icon).toBe('😏');
    expect(sarcastic?.color).toBe(0xe67e22);
    expect(sarcastic?.examples).toHaveLength(2);
    expect(service.getPersona('cheerleader')?.color).toBe(15844367);
  });
});
