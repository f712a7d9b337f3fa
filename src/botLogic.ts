// src/botLogic.ts

import { Telegraf, Markup, Context } from 'telegraf';
import { message } from 'telegraf/filters';
import type { ChatReplier, InboundText } from './chat';
import type { UpdateDispatcher } from './dispatcher';

// --- TRANSPORT ADAPTER ---
export function contextReplier(ctx: Context): ChatReplier {
    return {
        async send(text, options) {
            const extra = options?.keyboard ? Markup.keyboard(options.keyboard).resize() : undefined;
            await ctx.reply(text, extra);
        },
        async replyTo(messageId, text) {
            await ctx.reply(text, { reply_parameters: { message_id: messageId } });
        },
        async sendTyping() {
            await ctx.sendChatAction('typing');
        },
    };
}

// --- BOT ---
export function createBot(token: string, dispatcher: UpdateDispatcher): Telegraf {
    const bot = new Telegraf(token);

    // Only text messages are dispatched; every other update type falls through untouched.
    bot.on(message('text'), async (ctx) => {
        const from = ctx.from;
        if (!from) return;
        const inbound: InboundText = {
            chatId: ctx.chat.id,
            messageId: ctx.message.message_id,
            userId: from.id,
            firstName: from.first_name,
            text: ctx.message.text,
        };
        await dispatcher.dispatch(inbound, contextReplier(ctx));
    });

    bot.catch((err, ctx) => {
        console.error(`Bot Error while processing update ${ctx.update.update_id}:`, err);
    });

    return bot;
}
