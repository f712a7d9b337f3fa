// src/chat.ts

// The parts of an inbound Telegram text message the handlers look at.
export interface InboundText {
    chatId: number;
    messageId: number;
    userId: number;
    firstName?: string;
    text: string;
}

export interface SendOptions {
    // Rows of reply-keyboard buttons shown under the input field.
    keyboard?: string[][];
}

// Outbound operations against the chat an update came from.
export interface ChatReplier {
    send(text: string, options?: SendOptions): Promise<void>;
    replyTo(messageId: number, text: string): Promise<void>;
    sendTyping(): Promise<void>;
}
