import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import express from 'express';
import http from 'http';
import { once } from 'events';
import { Telegraf } from 'telegraf';
import { BotSession, PollingBot, STOP_RETRY_MS } from '../src/botSession';
import { FakeBot, silenceConsole } from './fakes';

// Refuses to stop until polling has begun, the way Telegraf does.
class SlowStartBot implements PollingBot {
    stopReasons: string[] = [];
    private polling = false;
    private settle?: (error?: Error) => void;

    launch(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.settle = error => (error ? reject(error) : resolve());
        });
    }

    beginPolling(): void {
        this.polling = true;
    }

    failStartup(error: Error): void {
        this.settle?.(error);
    }

    stop(reason?: string): void {
        if (!this.polling) throw new Error('Bot is not running!');
        this.stopReasons.push(reason ?? '');
        this.settle?.();
    }
}

beforeEach(() => {
    silenceConsole();
});

describe('BotSession', () => {
    it('stops polling once on shutdown and lets start resolve', async () => {
        const bot = new FakeBot();
        const session = new BotSession(bot);

        const running = session.start();
        expect(session.isRunning).toBe(true);

        session.shutdown('SIGINT');
        session.shutdown('SIGTERM');
        await running;

        expect(bot.stopReasons).toEqual(['SIGINT']);
        expect(session.isRunning).toBe(false);
    });

    it('shuts down exactly once when launching fails', async () => {
        const bot = new FakeBot();
        bot.failLaunch = new Error('401: Unauthorized');
        const session = new BotSession(bot);

        await expect(session.start()).rejects.toThrow('401: Unauthorized');
        session.shutdown('SIGTERM');

        expect(bot.stopReasons).toEqual(['polling ended']);
    });

    it('cannot be restarted after shutdown', async () => {
        const bot = new FakeBot();
        const session = new BotSession(bot);

        session.shutdown('SIGINT');

        await expect(session.start()).rejects.toThrow('Bot session cannot start from state "stopped"');
        expect(bot.launches).toBe(0);
        expect(bot.stopReasons).toEqual([]);
    });

    it('tolerates a bot that already stopped polling', async () => {
        const bot = new FakeBot();
        bot.stop = () => {
            throw new Error('Bot is not running!');
        };
        const session = new BotSession(bot);
        bot.failLaunch = new Error('network down');

        await expect(session.start()).rejects.toThrow('network down');
        expect(console.warn).toHaveBeenCalledWith('Bot was not polling at shutdown:', 'Bot is not running!');
    });

    describe('shutdown while the bot is still starting', () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('stops the bot as soon as polling begins', async () => {
            const bot = new SlowStartBot();
            const session = new BotSession(bot);

            const running = session.start();
            session.shutdown('SIGINT');
            expect(bot.stopReasons).toEqual([]);

            vi.advanceTimersByTime(STOP_RETRY_MS);
            expect(bot.stopReasons).toEqual([]);

            bot.beginPolling();
            vi.advanceTimersByTime(STOP_RETRY_MS);
            await running;

            expect(bot.stopReasons).toEqual(['SIGINT']);
            expect(session.isRunning).toBe(false);
        });

        it('gives up retrying once startup fails', async () => {
            const bot = new SlowStartBot();
            const session = new BotSession(bot);

            const running = session.start();
            session.shutdown('SIGTERM');
            bot.failStartup(new Error('409: Conflict'));
            await expect(running).rejects.toThrow('409: Conflict');

            vi.advanceTimersByTime(STOP_RETRY_MS * 4);

            expect(bot.stopReasons).toEqual([]);
            expect(vi.getTimerCount()).toBe(0);
            expect(console.warn).toHaveBeenCalledWith('Bot was not polling at shutdown:', 'Bot is not running!');
        });
    });
});

describe('BotSession with Telegraf', () => {
    let server: http.Server;
    let apiRoot: string;
    let calls: string[];

    // In-process Bot API: getMe answers slowly, getUpdates long-polls briefly.
    beforeEach(async () => {
        calls = [];
        const api = express();
        api.post('/bottest-token/:method', (req, res) => {
            const method = req.params.method;
            calls.push(method);
            const answer = (result: unknown, delayMs = 0) =>
                setTimeout(() => res.json({ ok: true, result }), delayMs);
            if (method === 'getMe') {
                answer({ id: 1, is_bot: true, first_name: 'Relay', username: 'relay_test_bot' }, 50);
            } else if (method === 'getUpdates') {
                answer([], 20);
            } else {
                answer(true);
            }
        });
        server = api.listen(0, '127.0.0.1');
        await once(server, 'listening');
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
        apiRoot = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        server.closeAllConnections();
        server.close();
        await once(server, 'close');
    });

    const newBot = () => new Telegraf('test-token', { telegram: { apiRoot, agent: new http.Agent() } });
    const pollCount = () => calls.filter(method => method === 'getUpdates').length;

    it('stops a bot that is shut down before getMe has answered', async () => {
        const session = new BotSession(newBot());

        const running = session.start();
        session.shutdown('SIGINT');
        await running;

        const polled = pollCount();
        await new Promise(resolve => setTimeout(resolve, 100));

        expect(calls[0]).toBe('getMe');
        expect(pollCount()).toBe(polled);
        expect(session.isRunning).toBe(false);
    });

    it('stops a bot that is already polling', async () => {
        const session = new BotSession(newBot());

        const running = session.start();
        await vi.waitFor(() => expect(pollCount()).toBeGreaterThan(0));
        session.shutdown('SIGTERM');
        await running;

        const polled = pollCount();
        await new Promise(resolve => setTimeout(resolve, 100));

        expect(pollCount()).toBe(polled);
    });
});
