// src/messageStore.ts

import { createClient, Client } from '@libsql/client';
import type { StoreMode } from './config';
import { Result, attempt, fail, ok } from './result';

export type RecordOutcome = 'inserted' | 'duplicate';

// Bare paths become file: URLs; libsql URLs and :memory: pass through.
export function toDatabaseUrl(dbFile: string): string {
    if (dbFile === ':memory:' || /^[a-z]+:/i.test(dbFile)) return dbFile;
    return `file:${dbFile}`;
}

export class MessageStore {
    private client: Client;
    private initialized = false;

    constructor(dbFile: string, private readonly mode: StoreMode = 'dedupe') {
        this.client = createClient({ url: toDatabaseUrl(dbFile) });
    }

    async init(): Promise<void> {
        if (this.initialized) return;

        await this.client.execute(`
            CREATE TABLE IF NOT EXISTS users (
                user_id INTEGER NOT NULL,
                message TEXT NOT NULL,
                timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
            )
        `);

        // In dedupe mode the index is what makes the duplicate check atomic.
        if (this.mode === 'dedupe') {
            // Rows written in append mode may repeat; keep the earliest of each pair.
            const collapsed = await this.client.execute(`
                DELETE FROM users
                WHERE rowid NOT IN (SELECT MIN(rowid) FROM users GROUP BY user_id, message)
            `);
            if (collapsed.rowsAffected > 0) {
                console.warn(`Removed ${collapsed.rowsAffected} duplicate message row(s) before enabling dedupe`);
            }
            await this.client.execute(
                'CREATE UNIQUE INDEX IF NOT EXISTS users_user_message_idx ON users (user_id, message)'
            );
        } else {
            await this.client.execute('DROP INDEX IF EXISTS users_user_message_idx');
        }

        console.log(`Message store ready (${this.mode} mode)`);
        this.initialized = true;
    }

    /**
     * Logs one inbound message. Never throws: a storage problem is logged and
     * returned as a failed result so message handling can carry on.
     */
    async recordMessage(userId: number, text: string): Promise<Result<RecordOutcome>> {
        const invalid = !Number.isSafeInteger(userId)
            ? `Invalid user id: ${userId}`
            : text.length === 0 ? 'Refusing to store an empty message' : null;
        if (invalid) {
            console.warn(`Message store skipped a message: ${invalid}`);
            return fail(new Error(invalid));
        }

        const sql = this.mode === 'dedupe'
            ? 'INSERT OR IGNORE INTO users (user_id, message) VALUES (?, ?)'
            : 'INSERT INTO users (user_id, message) VALUES (?, ?)';

        const result = await attempt(() => this.client.execute({ sql, args: [userId, text] }));
        if (!result.ok) {
            console.error(`Message store error while saving message from user ${userId}:`, result.error);
            return result;
        }
        return ok<RecordOutcome>(result.value.rowsAffected > 0 ? 'inserted' : 'duplicate');
    }

    async countDistinctUsers(): Promise<number> {
        const result = await attempt(() => this.client.execute('SELECT COUNT(DISTINCT user_id) AS users FROM users'));
        if (!result.ok) {
            console.error('Message store error while counting users:', result.error);
            return 0;
        }
        const row = result.value.rows[0];
        return row ? Number(row['users'] ?? 0) : 0;
    }

    close(): void {
        this.client.close();
    }
}
