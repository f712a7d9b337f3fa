// src/server.ts

import { loadConfig } from './config';
import { buildBotApp } from './app';
import { runService } from './service';

async function main() {
    console.log('🤖 Bot is starting in service mode...');

    const config = loadConfig();
    const { server, finished } = runService(await buildBotApp(config), config.port);

    const stop = (signal: NodeJS.Signals) => {
        console.log(`Received ${signal}, closing HTTP server...`);
        server.close();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    process.exitCode = await finished;
}

main().catch((err) => {
    console.error('❌ Service failed to start:', err);
    process.exit(1);
});
