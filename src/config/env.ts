import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';
import { DailyCapWindow } from './types';

export function loadDotEnv(): void {
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
    }
}

export function parseIntEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseFloatEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoolEnv(name: string, defaultValue: boolean): boolean {
    const val = process.env[name];
    if (val === undefined || val === '') return defaultValue;
    return val.toLowerCase() === 'true' || val === '1';
}

export function parseStringEnv(name: string, fallback: string = ''): string {
    const raw = process.env[name];
    if (raw === undefined) return fallback;
    return raw.trim();
}

export function isLocalAiEndpoint(baseUrl: string): boolean {
    try {
        const url = new URL(baseUrl);
        const host = url.hostname.toLowerCase();
        if (host === 'localhost' || host === '127.0.0.1' || host === '::1') {
            return true;
        }
        return host.endsWith('.local');
    } catch {
        return false;
    }
}

export function isAiRequestConfigured(baseUrl: string, apiKey: string): boolean {
    return isLocalAiEndpoint(baseUrl) || !!apiKey;
}

export function resolvePathFromEnv(name: string, fallbackRelativePath: string): string {
    const raw = process.env[name];
    if (!raw) {
        return path.resolve(process.cwd(), fallbackRelativePath);
    }
    if (raw === ':memory:') {
        return raw;
    }
    return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

export function parseDailyCapWindowEnv(name: string, fallback: DailyCapWindow): DailyCapWindow {
    const raw = parseStringEnv(name, fallback).toLowerCase();
    if (raw === 'calendar' || raw === 'rolling') {
        return raw;
    }
    return fallback;
}
