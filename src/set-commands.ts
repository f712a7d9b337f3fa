// src/set-commands.ts

import { Telegraf } from 'telegraf';
import { loadConfig } from './config';
import { BOT_COMMANDS } from './texts';

// Registers the command menu Telegram clients show next to the input field.
async function setCommands() {
    const { botToken } = loadConfig();
    const bot = new Telegraf(botToken);
    console.log(`Setting bot commands: ${BOT_COMMANDS.map(c => `/${c.command}`).join(', ')}`);
    try {
        const result = await bot.telegram.setMyCommands(BOT_COMMANDS);
        console.log('Success! Commands were set.', result);
    } catch (error) {
        console.error('ERROR setting commands:', error);
        process.exitCode = 1;
    }
}

void setCommands();
