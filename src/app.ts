// src/app.ts

import type { AppConfig } from './config';
import { createBot } from './botLogic';
import { BotSession } from './botSession';
import { createDispatcher } from './dispatcher';
import { GeminiClient } from './gemini';
import { createMessageHandler } from './handlers/message';
import { MessageStore } from './messageStore';

export interface BotApp {
    store: MessageStore;
    session: BotSession;
}

// Shared by both front ends: store, Gemini client, dispatcher and the polling session.
export async function buildBotApp(config: AppConfig): Promise<BotApp> {
    const store = new MessageStore(config.dbFile, config.storeMode);
    try {
        await store.init();
    } catch (e) {
        store.close();
        throw e;
    }

    const gemini = new GeminiClient({
        apiKey: config.geminiApiKey,
        model: config.geminiModel,
        timeoutMs: config.geminiTimeoutMs,
    });
    const dispatcher = createDispatcher(createMessageHandler({ store, gemini }));
    const session = new BotSession(createBot(config.botToken, dispatcher));

    return { store, session };
}
