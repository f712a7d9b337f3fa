// src/local.ts

import { loadConfig } from './config';
import { buildBotApp } from './app';

async function main() {
    console.log('🤖 Bot is starting in local polling mode...');

    const config = loadConfig();
    const { store, session } = await buildBotApp(config);

    // Enable graceful stop on process exit signals.
    process.once('SIGINT', () => session.shutdown('SIGINT'));
    process.once('SIGTERM', () => session.shutdown('SIGTERM'));

    try {
        await session.start();
    } finally {
        store.close();
        console.log('👋 Bot stopped.');
    }
}

main().catch((err) => {
    console.error('❌ Bot failed:', err);
    process.exit(1);
});
