// src/texts.ts

// --- USER-FACING TEXTS ---
export const ASK_QUESTION_BUTTON = 'Задать вопрос';
export const ASK_QUESTION_PROMPT = 'Пожалуйста, задайте ваш вопрос.';
export const FALLBACK_NAME = 'пользователь';

export const greeting = (name: string) => `Добро пожаловать, ${name}! Чем могу вам помочь?`;

export const HELP_TEXT = [
    'Я бот, который отвечает на ваши вопросы с помощью Gemini.',
    '',
    'Доступные команды:',
    '/start - Начать диалог',
    '/help - Помощь',
].join('\n');

export const GENERIC_HANDLER_ERROR = 'Произошла ошибка при обработке запроса. Попробуйте позже.';

// --- GEMINI FALLBACKS ---
export const GEMINI_NO_ANSWER = 'Gemini не дал ответа.';
export const GEMINI_REQUEST_FAILED = 'Ошибка запроса к Gemini API. Пожалуйста, попробуйте позже.';
export const GEMINI_TIMEOUT = 'Запрос к Gemini API занял слишком много времени. Попробуйте еще раз.';
export const GEMINI_UNEXPECTED = 'Произошла ошибка при обработке вашего запроса.';

// Menu shown by Telegram clients, registered by src/set-commands.ts
export const BOT_COMMANDS = [
    { command: 'start', description: 'Начать диалог' },
    { command: 'help', description: 'Помощь' },
];
