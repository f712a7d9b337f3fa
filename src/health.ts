// src/health.ts

import express, { Express } from 'express';

export interface UserCounter {
    countDistinctUsers(): Promise<number>;
}

export function createHealthApp(store: UserCounter): Express {
    const app = express();

    app.get('/', (_req, res, next) => {
        store.countDistinctUsers()
            .then(users => res.json({ status: 'running', users }))
            .catch(next);
    });

    return app;
}
