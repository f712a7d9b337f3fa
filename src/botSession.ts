// src/botSession.ts

// The slice of Telegraf the session drives.
export interface PollingBot {
    launch(onLaunch?: () => void): Promise<void>;
    stop(reason?: string): void;
}

type SessionState = 'idle' | 'running' | 'stopped';

export const STOP_RETRY_MS = 25;

/**
 * Owns the bot's long-polling loop. `start` resolves once polling has ended;
 * `shutdown` stops the bot exactly once, whichever exit path gets there first.
 */
export class BotSession {
    private state: SessionState = 'idle';
    private launching = false;

    constructor(private readonly bot: PollingBot) {}

    get isRunning(): boolean {
        return this.state === 'running';
    }

    async start(): Promise<void> {
        if (this.state !== 'idle') throw new Error(`Bot session cannot start from state "${this.state}"`);
        this.state = 'running';
        this.launching = true;
        try {
            await this.bot.launch(() => console.log('🚀 Bot is running! Open Telegram and talk to it.'));
        } finally {
            this.launching = false;
            this.shutdown('polling ended');
        }
    }

    shutdown(reason: string): void {
        const wasRunning = this.state === 'running';
        this.state = 'stopped';
        if (!wasRunning) return;

        console.log(`Stopping bot (${reason})...`);
        this.stopPolling(reason);
    }

    // Telegraf refuses to stop until its polling loop exists (getMe and
    // deleteWebhook come first), so a stop requested during launch is retried
    // until polling begins or launch settles.
    private stopPolling(reason: string): void {
        try {
            this.bot.stop(reason);
        } catch (e) {
            if (this.launching) {
                setTimeout(() => this.stopPolling(reason), STOP_RETRY_MS);
                return;
            }
            console.warn('Bot was not polling at shutdown:', e instanceof Error ? e.message : e);
        }
    }
}
