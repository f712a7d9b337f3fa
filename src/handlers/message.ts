// src/handlers/message.ts

import type { ChatReplier, InboundText } from '../chat';
import type { ReplyGenerator } from '../gemini';
import type { RecordOutcome } from '../messageStore';
import { Result, attempt } from '../result';
import { ASK_QUESTION_BUTTON, ASK_QUESTION_PROMPT, GENERIC_HANDLER_ERROR } from '../texts';

export interface MessageLog {
    recordMessage(userId: number, text: string): Promise<Result<RecordOutcome>>;
}

export interface MessageHandlerDeps {
    store: MessageLog;
    gemini: ReplyGenerator;
}

// Telegram rejects sendMessage texts longer than this.
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Cuts text into chunks of at most `limit` UTF-16 units, preferring a newline
 * in the second half of the window and never splitting a surrogate pair.
 */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
    const chunks: string[] = [];
    let rest = text;
    while (rest.length > limit) {
        let cut = rest.lastIndexOf('\n', limit);
        if (cut < limit / 2) {
            cut = limit;
            const last = rest.charCodeAt(cut - 1);
            if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
        }
        chunks.push(rest.slice(0, cut));
        rest = rest.slice(cut).replace(/^\n/, '');
    }
    if (rest.length > 0 || chunks.length === 0) chunks.push(rest);
    return chunks;
}

export const isAskQuestionTrigger = (text: string) =>
    text.trim().toLowerCase() === ASK_QUESTION_BUTTON.toLowerCase();

/**
 * Handles one free-text message: typing indicator, request log, Gemini call,
 * threaded reply. The returned promise never rejects.
 */
export function createMessageHandler({ store, gemini }: MessageHandlerDeps) {
    return async function handleMessage(message: InboundText, chat: ChatReplier): Promise<void> {
        try {
            if (isAskQuestionTrigger(message.text)) {
                await chat.send(ASK_QUESTION_PROMPT);
                return;
            }

            const typing = await attempt(() => chat.sendTyping());
            if (!typing.ok) console.warn(`Could not send typing indicator to chat ${message.chatId}:`, typing.error.message);

            // Store failures are already logged by the store.
            await store.recordMessage(message.userId, message.text);

            const reply = await gemini.getReply(message.text);
            for (const chunk of splitMessage(reply.text)) {
                await chat.replyTo(message.messageId, chunk);
            }
        } catch (e) {
            console.error(`Unhandled error while handling a message from user ${message.userId}:`, e);
            const apology = await attempt(() => chat.send(GENERIC_HANDLER_ERROR));
            if (!apology.ok) console.error(`Could not send the error reply to chat ${message.chatId}:`, apology.error);
        }
    };
}

export type MessageHandler = ReturnType<typeof createMessageHandler>;
