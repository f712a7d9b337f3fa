// src/handlers/commands.ts

import type { ChatReplier, InboundText } from '../chat';
import { ASK_QUESTION_BUTTON, FALLBACK_NAME, HELP_TEXT, greeting } from '../texts';

export type CommandName = 'start' | 'help';

export type CommandHandler = (message: InboundText, chat: ChatReplier) => Promise<void>;

const logUserAction = (userId: number, action: string) =>
    console.log(`User ${userId} ran: ${action}`);

export const handleStart: CommandHandler = async (message, chat) => {
    logUserAction(message.userId, '/start');
    const name = message.firstName?.trim() || FALLBACK_NAME;
    await chat.send(greeting(name), { keyboard: [[ASK_QUESTION_BUTTON]] });
};

export const handleHelp: CommandHandler = async (message, chat) => {
    logUserAction(message.userId, '/help');
    await chat.send(HELP_TEXT);
};

export const COMMANDS: Record<CommandName, CommandHandler> = {
    start: handleStart,
    help: handleHelp,
};
