import type { Context, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { logger } from '@/lib/logger';
import { getErrorMessage } from '@/lib/errors';
import { CommandController, type CommandRequest } from '@/controllers/command.controller';
import { PromptController } from '@/controllers/prompt.controller';
import { TelegramDeliveryChannel } from '@/services/telegram-channel.service';
import { getCommandArgument } from '@/utils/text.util';

export interface BotControllers {
  commandController: CommandController;
  promptController: PromptController;
}

type CommandHandler = (request: CommandRequest) => string | Promise<string>;

const replyHtml = async (ctx: Context, text: string) => {
  await ctx.reply(text, { parse_mode: 'HTML' });
};

/**
 * Wires chat commands and free text prompts onto the bot
 */
export function registerBotRoutes(bot: Telegraf, { commandController, promptController }: BotControllers): void {
  const command = (name: string, handler: CommandHandler) => {
    bot.command(name, async ctx => {
      const from = ctx.from;
      if (!from) return;

      logger.debug('Command received', { command: name, userId: from.id });
      const reply = await handler({ userId: from.id, argument: getCommandArgument(ctx.message.text) });
      await replyHtml(ctx, reply);
    });
  };

  command('start', () => commandController.start());
  command('help', () => commandController.help());
  command('settings', request => commandController.settings(request));
  command('setmodel', request => commandController.setModel(request));
  command('setduration', request => commandController.setDuration(request));
  command('setresolution', request => commandController.setResolution(request));
  command('reset', request => commandController.reset(request));
  command('stats', () => commandController.stats());

  /**
   * Any other text is a prompt. The handler returns right away so long
   * polling is not blocked while the video is generated.
   */
  bot.on(message('text'), ctx => {
    const from = ctx.from;
    if (!from || ctx.message.text.startsWith('/')) return;

    void promptController.dispatch(
      {
        userId: from.id,
        username: from.username || from.first_name || 'Unknown',
        prompt: ctx.message.text,
      },
      new TelegramDeliveryChannel(ctx)
    );
  });

  bot.catch((error, ctx) => {
    logger.error('Unhandled bot error', {
      updateId: ctx.update.update_id,
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  });
}
