/**
 * Lifecycle of the Chromium persistent contexts: one profile directory per
 * account, so cookies survive between tasks of the same account.
 */

import path from 'path';
import { BrowserContext, Page, chromium } from 'playwright-core';
import { config } from '../config';
import { errorMessage } from '../core/errors';
import { ensureDirectoryPrivate } from '../security/filesystem';
import { logWarn } from '../telemetry/logger';

const activeBrowsers = new Set<BrowserContext>();

export interface BrowserSession {
    browser: BrowserContext;
    page: Page;
}

export interface LaunchBrowserOptions {
    headless?: boolean;
    sessionDir?: string;
    accountKey?: string;
}

function profileDirectoryFor(options: LaunchBrowserOptions): string {
    const sessionDirRaw = options.sessionDir ?? config.sessionDir;
    const baseDir = path.isAbsolute(sessionDirRaw) ? sessionDirRaw : path.resolve(process.cwd(), sessionDirRaw);
    if (!options.accountKey) {
        return baseDir;
    }
    const safeKey = options.accountKey.replace(/[^a-z0-9._-]/gi, '_');
    return path.join(baseDir, safeKey);
}

export async function launchBrowser(options: LaunchBrowserOptions = {}): Promise<BrowserSession> {
    const sessionDir = profileDirectoryFor(options);
    ensureDirectoryPrivate(sessionDir);

    const contextOptions: Parameters<typeof chromium.launchPersistentContext>[1] = {
        headless: options.headless ?? config.headless,
        viewport: { width: 1366, height: 768 },
        locale: 'en-US',
        timezoneId: config.timezone,
    };
    if (config.browserExecutablePath) {
        contextOptions.executablePath = config.browserExecutablePath;
    } else {
        contextOptions.channel = 'chrome';
    }

    const browser = await chromium.launchPersistentContext(sessionDir, contextOptions);
    browser.setDefaultNavigationTimeout(config.navigationTimeoutMs);

    const existingPage = browser.pages()[0];
    const page = existingPage ?? await browser.newPage();

    page.on('response', (response) => {
        if (response.status() === 429) {
            void logWarn('browser.rate_limited', { url: response.url() });
        }
    });

    activeBrowsers.add(browser);
    return { browser, page };
}

export async function closeBrowser(session: BrowserSession): Promise<void> {
    activeBrowsers.delete(session.browser);
    await session.browser.close();
}

/** Used on shutdown; a context that refuses to close is logged and left behind. */
export async function closeAllBrowsers(): Promise<void> {
    const browsers = [...activeBrowsers];
    activeBrowsers.clear();
    for (const browser of browsers) {
        try {
            await browser.close();
        } catch (error) {
            await logWarn('browser.close_failed', { error: errorMessage(error) });
        }
    }
}
