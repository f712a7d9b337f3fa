// src/gemini.ts

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
    GEMINI_NO_ANSWER,
    GEMINI_REQUEST_FAILED,
    GEMINI_TIMEOUT,
    GEMINI_UNEXPECTED,
} from './texts';

export const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

export type GenerativeReply =
    | { kind: 'answer'; text: string }
    | { kind: 'no-answer' | 'request-failed' | 'timeout' | 'unexpected'; text: string };

export interface ReplyGenerator {
    getReply(prompt: string): Promise<GenerativeReply>;
}

export interface GeminiClientOptions {
    apiKey: string;
    model?: string;
    timeoutMs?: number;
    http?: AxiosInstance;
}

// Only the fields we read are checked; everything else in the payload is ignored.
const GenerateContentResponse = z.object({
    candidates: z.array(
        z.object({
            content: z.object({
                parts: z.array(z.object({ text: z.string() })).min(1),
            }),
        }).passthrough()
    ).optional(),
});

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class GeminiClient implements ReplyGenerator {
    private readonly http: AxiosInstance;
    private readonly apiKey: string;
    private readonly model: string;
    private readonly timeoutMs: number;

    constructor(options: GeminiClientOptions) {
        this.apiKey = options.apiKey;
        this.model = options.model ?? 'gemini-2.0-flash';
        this.timeoutMs = options.timeoutMs ?? 10_000;
        this.http = options.http ?? axios.create();
    }

    get endpoint(): string {
        return `${GEMINI_API_BASE}/models/${this.model}:generateContent`;
    }

    /** Never rejects: every failure is mapped to one of the canned replies. */
    async getReply(prompt: string): Promise<GenerativeReply> {
        try {
            const response = await this.http.post<unknown>(
                this.endpoint,
                { contents: [{ parts: [{ text: prompt }] }] },
                {
                    params: { key: this.apiKey },
                    headers: { 'Content-Type': 'application/json' },
                    timeout: this.timeoutMs,
                }
            );

            const body = GenerateContentResponse.parse(response.data);
            const first = body.candidates?.[0];
            if (!first) return { kind: 'no-answer', text: GEMINI_NO_ANSWER };

            return { kind: 'answer', text: first.content.parts[0].text };
        } catch (error) {
            return this.toFallback(error);
        }
    }

    private toFallback(error: unknown): GenerativeReply {
        if (axios.isAxiosError(error)) {
            if (error.code && TIMEOUT_CODES.has(error.code)) {
                console.error(`Gemini API request to ${this.endpoint} timed out after ${this.timeoutMs}ms`);
                return { kind: 'timeout', text: GEMINI_TIMEOUT };
            }
            const status = error.response?.status;
            console.error(
                `Gemini API request to ${this.endpoint} failed${status ? ` with status ${status}` : ''}:`,
                error.message
            );
            return { kind: 'request-failed', text: GEMINI_REQUEST_FAILED };
        }
        console.error('Unhandled error while getting a Gemini reply:', error);
        return { kind: 'unexpected', text: GEMINI_UNEXPECTED };
    }
}
