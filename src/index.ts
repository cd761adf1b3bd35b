/**
 * Server entry point - loads personas, starts the HTTP API and the Discord bot
 */
import { pathToFileURL } from 'url';
import { createApp } from './app';
import { config } from './config/index';
import { DiscordBot } from './discord/bot';
import { getConfiguredProvider, PROVIDER_PRESETS } from './providers/index';
import { LoggerService } from './services/logger';

export interface BannerOptions {
  title: string;
  port: number;
  provider: string;
  model: string;
  personas: number;
  discord: boolean;
  cooldownSeconds: number;
}

export const generateBanner = (options: BannerOptions): string[] => {
  const reset = '\x1b[0m';
  const bright = '\x1b[1m';
  const dim = '\x1b[2m';
  const green = '\x1b[32m';
  const cyan = '\x1b[36m';
  const yellow = '\x1b[33m';
  const blue = '\x1b[34m';
  const magenta = '\x1b[35m';

  const boxWidth = 55;
  const contentWidth = boxWidth - 6;

  const getVisibleWidth = (text: string): number => {
    const ansiEscape = '\x1b';
    const ansiRegex = new RegExp(`${ansiEscape}\\[[0-9;]*m`, 'g');
    const textWithoutAnsi = text.replace(ansiRegex, '');

    let width = 0;
    for (let i = 0; i < textWithoutAnsi.length; i++) {
      const codePoint = textWithoutAnsi.codePointAt(i) ?? 0;
      if (codePoint > 0xffff) {
        i++;
      }
      // Emoji and East Asian wide characters take two terminal columns
      if (
        codePoint >= 0x1f000 ||
        (codePoint >= 0x1100 && codePoint <= 0x115f) ||
        (codePoint >= 0x2e80 && codePoint <= 0x4dbf) ||
        (codePoint >= 0x4e00 && codePoint <= 0x9fff) ||
        (codePoint >= 0xac00 && codePoint <= 0xd7af) ||
        (codePoint >= 0xf900 && codePoint <= 0xfaff) ||
        (codePoint >= 0xfe30 && codePoint <= 0xfe4f) ||
        (codePoint >= 0xff00 && codePoint <= 0xffef)
      ) {
        width += 2;
      } else {
        width += 1;
      }
    }
    return width;
  };

  const padRight = (text: string, width: number): string => {
    const visibleLength = getVisibleWidth(text);
    return text + ' '.repeat(Math.max(0, width - visibleLength));
  };

  const createLine = (content: string): string => {
    return `${bright}${green}║${reset}  ${padRight(content, contentWidth)}  ${bright}${green}║${reset}`;
  };

  const topBorder = `${bright}${green}╔${'═'.repeat(boxWidth - 2)}╗${reset}`;
  const divider = `${bright}${green}╠${'═'.repeat(boxWidth - 2)}╣${reset}`;
  const bottomBorder = `${bright}${green}╚${'═'.repeat(boxWidth - 2)}╝${reset}`;

  const discordStatus = options.discord
    ? `${bright}${green}enabled${reset}`
    : `${dim}disabled (API only)${reset}`;

  const lines: string[] = [];
  lines.push('');
  lines.push(topBorder);
  lines.push(createLine(`${bright}${cyan}${options.title}${reset}`));
  lines.push(divider);
  lines.push(createLine(`${dim}Status:${reset}     ${bright}${green}✓ Running${reset}`));
  lines.push(createLine(`${dim}Port:${reset}       ${bright}${yellow}${options.port}${reset}`));
  lines.push(createLine(`${dim}Provider:${reset}   ${bright}${blue}${options.provider}${reset}`));
  lines.push(createLine(`${dim}Model:${reset}      ${bright}${magenta}${options.model}${reset}`));
  lines.push(createLine(`${dim}Personas:${reset}   ${bright}${yellow}${options.personas}${reset} loaded`));
  lines.push(
    createLine(`${dim}Cooldown:${reset}   ${bright}${yellow}${options.cooldownSeconds}s${reset} per user`)
  );
  lines.push(createLine(`${dim}Discord:${reset}    ${discordStatus}`));
  lines.push(bottomBorder);
  lines.push('');

  return lines;
};

/**
 * Starts every surface; resolves once the HTTP server is listening
 */
export async function main(): Promise<void> {
  const logger = new LoggerService();
  const provider = getConfiguredProvider(logger);
  const { app, services } = createApp({ logger, completion: provider });

  const personaCount = await services.personas.loadAll();
  const { host, port } = config.server;
  const model = config.llm.model || PROVIDER_PRESETS[config.llm.provider].model;

  const bot = config.discord.token
    ? new DiscordBot(services.dispatcher, logger, { token: config.discord.token })
    : undefined;

  const server = await new Promise<ReturnType<typeof app.listen>>((resolve) => {
    const listening = app.listen(port, host, () => resolve(listening));
  });

  const banner = generateBanner({
    title: '🎭 Persona Link Bot',
    port,
    provider: provider.name,
    model,
    personas: personaCount,
    discord: bot !== undefined,
    cooldownSeconds: services.commandLimiter.getCooldownMs() / 1000,
  });
  banner.forEach((line) => console.log(line));

  logger.info(`Server started successfully on ${host}:${port}`);
  logger.info(`Log level: ${config.logging.logLevel}`);
  logger.info(`AI Provider: ${provider.name} (model: ${model}, max tokens: ${config.llm.maxTokens})`);
  logger.info(`Personas: ${services.personas.listPersonaIds().join(', ')}`);

  if (bot) {
    await bot.start();
  } else {
    logger.info('DISCORD_TOKEN is not set; running the HTTP API only');
  }

  // Graceful shutdown
  const cleanup = (signal: string): void => {
    logger.info('Server shutting down', { signal });
    server.close();
    const stopped = bot ? bot.stop() : Promise.resolve();
    void stopped
      .catch((error: unknown) => logger.error('Discord client failed to stop', error))
      .finally(() => process.exit(0));
  };

  process.once('SIGTERM', () => cleanup('SIGTERM'));
  process.once('SIGINT', () => cleanup('SIGINT'));
}

const entryPath = process.argv[1];

// Only start when run directly (not imported in tests)
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main().catch((error: unknown) => {
    new LoggerService().error('Startup failed', error);
    process.exit(1);
  });
}
