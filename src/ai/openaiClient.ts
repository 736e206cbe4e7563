import { config } from '../config';
import { isRecord } from '../core/repositories';
import { fetchWithRetryPolicy } from '../core/integrationPolicy';

export interface OpenAITextRequest {
    system: string;
    user: string;
    maxOutputTokens: number;
    temperature?: number;
    signal?: AbortSignal;
}

function isLocalAiEndpoint(baseUrl: string): boolean {
    let host: string;
    try {
        host = new URL(baseUrl).hostname.toLowerCase();
    } catch {
        return false;
    }
    if (host === 'localhost' || host === '127.0.0.1' || host === '::1' || host === '[::1]') {
        return true;
    }
    return host.endsWith('.local');
}

function safeJoinUrl(baseUrl: string, suffix: string): string {
    return `${baseUrl.replace(/\/+$/, '')}${suffix}`;
}

export function extractOutputText(payload: unknown): string {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) {
        return '';
    }
    const firstChoice: unknown = payload.choices[0];
    if (!isRecord(firstChoice) || !isRecord(firstChoice.message)) {
        return '';
    }
    const content = firstChoice.message.content;
    return typeof content === 'string' ? content.trim() : '';
}

export function isOpenAIConfigured(): boolean {
    return isLocalAiEndpoint(config.openaiBaseUrl) || !!config.openaiApiKey;
}

export async function requestOpenAIText(input: OpenAITextRequest): Promise<string> {
    const localEndpoint = isLocalAiEndpoint(config.openaiBaseUrl);
    if (!config.aiAllowRemoteEndpoint && !localEndpoint) {
        throw new Error('Remote AI endpoint blocked: point OPENAI_BASE_URL at localhost or set AI_ALLOW_REMOTE_ENDPOINT=true.');
    }
    if (!config.openaiApiKey && !localEndpoint) {
        throw new Error('OPENAI_API_KEY missing.');
    }

    const headers: Record<string, string> = {
        'content-type': 'application/json',
    };
    if (config.openaiApiKey) {
        headers.authorization = `Bearer ${config.openaiApiKey}`;
    }

    const response = await fetchWithRetryPolicy(
        safeJoinUrl(config.openaiBaseUrl, '/chat/completions'),
        {
            method: 'POST',
            headers,
            body: JSON.stringify({
                model: config.aiModel,
                messages: [
                    { role: 'system', content: input.system },
                    { role: 'user', content: input.user },
                ],
                temperature: input.temperature ?? config.aiTemperature,
                max_tokens: input.maxOutputTokens,
            }),
            signal: input.signal,
        },
        {
            integration: 'openai.chat',
            timeoutMs: config.aiRequestTimeoutMs,
            signal: input.signal,
        }
    );

    if (!response.ok) {
        const text = (await response.text().catch(() => '')).slice(0, 500);
        throw new Error(`OpenAI HTTP ${response.status}: ${response.statusText}${text ? ` ${text}` : ''}`);
    }

    const payload: unknown = await response.json().catch(() => null);
    const outputText = extractOutputText(payload);
    if (!outputText) {
        throw new Error('Empty or unparseable AI response.');
    }
    return outputText;
}
