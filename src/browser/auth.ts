/**
 * Authentication state of the persistent context and login with the
 * credentials a request carries.
 */

import { Page } from 'playwright-core';
import { CapabilityError } from '../core/errors';
import { joinSelectors, SELECTORS } from '../selectors';
import { Credentials } from '../types/domain';
import { humanDelay } from './humanBehavior';
import { clickWithFallback, typeWithFallback } from './uiFallback';

export const PLATFORM_ORIGIN = 'https://www.linkedin.com';

async function hasAuthCookie(page: Page): Promise<boolean> {
    const cookies = await page.context().cookies(PLATFORM_ORIGIN);
    return cookies.some((cookie) => cookie.name === 'li_at' && cookie.value.trim().length > 0);
}

export async function isLoggedIn(page: Page): Promise<boolean> {
    if (await hasAuthCookie(page)) {
        return true;
    }
    const count = await page.locator(joinSelectors('globalNav')).count();
    if (count > 0) {
        return true;
    }
    const currentUrl = page.url().toLowerCase();
    return !(currentUrl.includes('/login') || currentUrl.includes('/checkpoint') || currentUrl.includes('/uas/'));
}

/**
 * CAPTCHA, e-mail verification or a restricted account: nothing the
 * automation may resolve by itself.
 */
export async function detectChallenge(page: Page): Promise<boolean> {
    const currentUrl = page.url().toLowerCase();
    if (['checkpoint', 'challenge', 'captcha', 'security-verification'].some((token) => currentUrl.includes(token))) {
        return true;
    }
    const selectorMatches = await page.locator(joinSelectors('challengeSignals')).count();
    return selectorMatches > 0;
}

/**
 * Reuses the persisted cookie when there is one; otherwise signs in with the
 * given credentials. Without credentials and without a cookie the session is
 * unusable and the call fails terminally.
 */
export async function ensureAuthenticated(page: Page, credentials: Credentials | null): Promise<void> {
    await page.goto(`${PLATFORM_ORIGIN}/feed/`, { waitUntil: 'domcontentloaded' });
    if (await isLoggedIn(page) && !(await detectChallenge(page))) {
        return;
    }
    if (!credentials) {
        throw new CapabilityError('browser.login', 'no stored session and no credentials supplied', false);
    }

    await page.goto(`${PLATFORM_ORIGIN}/login`, { waitUntil: 'domcontentloaded' });
    await typeWithFallback(page, SELECTORS.loginEmail, credentials.email, 'loginEmail');
    await typeWithFallback(page, SELECTORS.loginPassword, credentials.password, 'loginPassword');
    await clickWithFallback(page, SELECTORS.loginSubmit, 'loginSubmit');
    await page.waitForLoadState('domcontentloaded');
    await humanDelay(page, 1500, 3000);

    if (await detectChallenge(page)) {
        throw new CapabilityError('browser.login', 'login requires manual verification', false);
    }
    if (!(await isLoggedIn(page))) {
        throw new CapabilityError('browser.login', 'login rejected', false);
    }
}
