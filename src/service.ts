// src/service.ts

import type { Server } from 'http';
import type { BotApp } from './app';
import { createHealthApp } from './health';

export interface ServiceHandle {
    server: Server;
    // Resolves with the process exit code once the bot and the HTTP server are both down.
    finished: Promise<number>;
}

/**
 * Runs the health endpoint next to the polling bot. The HTTP server owns the
 * lifecycle: when it closes or fails, the bot session and the store go down with it.
 */
export function runService({ store, session }: BotApp, port: number): ServiceHandle {
    let exitCode = 0;
    let tornDown = false;

    const teardown = (reason: string) => {
        if (tornDown) return;
        tornDown = true;
        session.shutdown(reason);
        store.close();
        console.log('👋 Service stopped.');
    };

    const server = createHealthApp(store).listen(port, () => {
        console.log(`🩺 Health endpoint listening on port ${port}`);
    });

    server.once('close', () => teardown('server closed'));
    server.once('error', (err) => {
        console.error(`❌ HTTP server error on port ${port}:`, err);
        exitCode = 1;
        teardown('server error');
    });

    const finished = (async () => {
        try {
            await session.start();
        } catch (err) {
            console.error('❌ Bot polling failed:', err);
            exitCode = 1;
        } finally {
            server.close();
        }
        return exitCode;
    })();

    return { server, finished };
}
