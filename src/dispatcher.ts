// src/dispatcher.ts

import type { ChatReplier, InboundText } from './chat';
import { COMMANDS, CommandHandler, CommandName } from './handlers/commands';
import type { MessageHandler } from './handlers/message';

// "/Start@my_bot hello" -> "start"; anything that is not a slash command -> null
export function parseCommand(text: string): string | null {
    const token = text.trim().split(/\s+/)[0] ?? '';
    if (!token.startsWith('/') || token.length < 2) return null;
    return token.slice(1).split('@')[0].toLowerCase();
}

const isKnownCommand = (name: string): name is CommandName =>
    Object.prototype.hasOwnProperty.call(COMMANDS, name);

export interface UpdateDispatcher {
    dispatch(message: InboundText, chat: ChatReplier): Promise<void>;
}

export function createDispatcher(
    handleMessage: MessageHandler,
    commands: Record<CommandName, CommandHandler> = COMMANDS
): UpdateDispatcher {
    return {
        async dispatch(message, chat) {
            const command = parseCommand(message.text);
            if (command !== null && isKnownCommand(command)) {
                await commands[command](message, chat);
                return;
            }
            // Unknown commands are ordinary prompts.
            await handleMessage(message, chat);
        },
    };
}
