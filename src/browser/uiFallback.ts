/**
 * Playwright interactions over a chain of alternative selectors: the first
 * selector that works wins. Exhausting the chain is a terminal CapabilityError,
 * since repeating the same lookup on the same page cannot change the outcome.
 */

import { Locator, Page } from 'playwright-core';
import { CapabilityError } from '../core/errors';
import { logWarn } from '../telemetry/logger';
import { humanDelay } from './humanBehavior';

function toPlaywrightSelector(selector: string): string {
    return selector.startsWith('//') ? `xpath=${selector}` : selector;
}

function locate(page: Page, selector: string): Locator {
    return page.locator(toPlaywrightSelector(selector)).first();
}

async function noteFallback(label: string, level: number, selector: string): Promise<void> {
    if (level > 0) {
        await logWarn('browser.selector.fallback', { label, level, selector: selector.substring(0, 80) });
    }
}

function exhausted(label: string, count: number): CapabilityError {
    return new CapabilityError(`browser.${label}`, `no selector matched for "${label}" after ${count} attempts`, false);
}

export async function clickWithFallback(
    page: Page,
    selectors: readonly string[],
    label: string,
    timeoutPerSelector: number = 5000
): Promise<void> {
    for (let i = 0; i < selectors.length; i++) {
        const sel = selectors[i] ?? '';
        try {
            await locate(page, sel).click({ timeout: timeoutPerSelector });
        } catch {
            continue;
        }
        await noteFallback(label, i, sel);
        return;
    }
    throw exhausted(label, selectors.length);
}

/** Waits until one of the selectors appears and returns the one that did. */
export async function waitForSelectorWithFallback(
    page: Page,
    selectors: readonly string[],
    label: string,
    timeoutPerSelector: number = 7000
): Promise<string> {
    for (let i = 0; i < selectors.length; i++) {
        const sel = selectors[i] ?? '';
        try {
            await page.waitForSelector(toPlaywrightSelector(sel), { timeout: timeoutPerSelector });
        } catch {
            continue;
        }
        await noteFallback(label, i, sel);
        return sel;
    }
    throw exhausted(label, selectors.length);
}

export async function typeWithFallback(
    page: Page,
    selectors: readonly string[],
    text: string,
    label: string,
    timeoutPerSelector: number = 5000
): Promise<void> {
    for (let i = 0; i < selectors.length; i++) {
        const sel = selectors[i] ?? '';
        const target = locate(page, sel);
        try {
            await target.waitFor({ state: 'visible', timeout: timeoutPerSelector });
        } catch {
            continue;
        }
        await target.click();
        await humanDelay(page, 200, 500);
        for (const char of text) {
            await target.pressSequentially(char, { delay: Math.floor(Math.random() * 120) + 30 });
        }
        await noteFallback(label, i, sel);
        return;
    }
    throw exhausted(label, selectors.length);
}

/** True when any CSS selector of the chain is currently visible. */
export async function isAnyVisible(page: Page, selectors: readonly string[]): Promise<boolean> {
    for (const sel of selectors) {
        if (await locate(page, sel).isVisible().catch(() => false)) {
            return true;
        }
    }
    return false;
}
