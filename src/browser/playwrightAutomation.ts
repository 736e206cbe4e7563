/**
 * Browser-backed implementation of the automation ports. Everything about the
 * target site's markup lives here and in selectors.ts; the workflows only see
 * AutomationSession.
 */

import { Locator, Page } from 'playwright-core';
import { CapabilityError, errorMessage } from '../core/errors';
import { logInfo, logWarn } from '../telemetry/logger';
import { SELECTORS, joinSelectors } from '../selectors';
import {
    AutomationProvider,
    AutomationSession,
    FormActions,
    MessagingAffordance,
    SubmitOrAdvanceOutcome,
    VisibleField,
} from '../types/capabilities';
import { CompanyRecord, Credentials, EmployeeProfile, JobPosting, JobSearchQuery } from '../types/domain';
import { PLATFORM_ORIGIN, ensureAuthenticated } from './auth';
import { humanDelay, humanMouseMove, simulateHumanReading } from './humanBehavior';
import { BrowserSession, closeBrowser, launchBrowser } from './launcher';
import { clickWithFallback, isAnyVisible, typeWithFallback, waitForSelectorWithFallback } from './uiFallback';

const DESCRIPTION_MAX_CHARS = 4000;
const MAX_RESULT_PAGES = 5;

type ControlKind = 'text' | 'textarea' | 'select' | 'radio' | 'checkbox' | 'file';

interface ControlHandle {
    kind: ControlKind;
    group: Locator;
}

async function textOf(locator: Locator): Promise<string> {
    if ((await locator.count()) === 0) return '';
    const text = await locator.first().innerText().catch(() => '');
    return text.replace(/\s+/g, ' ').trim();
}

function jobIdFromHref(href: string): string | null {
    const match = /\/jobs\/view\/(\d+)/.exec(href);
    return match?.[1] ?? null;
}

function absoluteUrl(href: string): string {
    return href.startsWith('http') ? href : `${PLATFORM_ORIGIN}${href}`;
}

async function detectControlKind(group: Locator): Promise<ControlKind | null> {
    if ((await group.locator('input[type="radio"]').count()) > 0) return 'radio';
    if ((await group.locator('input[type="checkbox"]').count()) > 0) return 'checkbox';
    if ((await group.locator('input[type="file"]').count()) > 0) return 'file';
    if ((await group.locator('select').count()) > 0) return 'select';
    if ((await group.locator('textarea').count()) > 0) return 'textarea';
    if ((await group.locator('input').count()) > 0) return 'text';
    return null;
}

function controlLocator(handle: ControlHandle): Locator {
    switch (handle.kind) {
        case 'select':
            return handle.group.locator('select').first();
        case 'textarea':
            return handle.group.locator('textarea').first();
        case 'radio':
            return handle.group.locator('input[type="radio"]').first();
        case 'checkbox':
            return handle.group.locator('input[type="checkbox"]').first();
        case 'file':
            return handle.group.locator('input[type="file"]').first();
        case 'text':
            return handle.group.locator('input').first();
    }
}

export class PlaywrightAutomationSession implements AutomationSession {
    private readonly session: BrowserSession;
    private controls = new Map<string, ControlHandle>();

    constructor(session: BrowserSession) {
        this.session = session;
    }

    private get page(): Page {
        return this.session.page;
    }

    async navigate(url: string): Promise<void> {
        await this.page.goto(url, { waitUntil: 'domcontentloaded' });
        await humanDelay(this.page, 1000, 2200);
        if (await isAnyVisible(this.page, SELECTORS.easyApplyButton)) {
            await clickWithFallback(this.page, SELECTORS.easyApplyButton, 'easyApplyButton');
            await waitForSelectorWithFallback(this.page, SELECTORS.formDialog, 'formDialog');
        }
    }

    async listVisibleFields(): Promise<VisibleField[]> {
        const dialog = this.page.locator(joinSelectors('formDialog')).first();
        const groups = dialog.locator(joinSelectors('formFieldGroup'));
        const count = await groups.count();
        const fields: VisibleField[] = [];
        this.controls = new Map();

        for (let i = 0; i < count; i++) {
            const group = groups.nth(i);
            if (!(await group.isVisible())) continue;
            const kind = await detectControlKind(group);
            if (!kind) continue;

            const handle: ControlHandle = { kind, group };
            const control = controlLocator(handle);
            const domId = await control.getAttribute('id');
            const name = await control.getAttribute('name');
            const identifier = domId || name || `field-${i}`;
            this.controls.set(identifier, handle);

            const label = await textOf(group.locator('label, legend, .fb-dash-form-element__label'));
            const errorText = await textOf(group.locator(joinSelectors('formFieldError')));
            const required = (await control.getAttribute('required')) !== null
                || (await control.getAttribute('aria-required')) === 'true'
                || /\*\s*$/.test(label);

            let options: string[] = [];
            let currentValue = '';
            if (kind === 'select') {
                options = (await control.locator('option').allInnerTexts()).map((text) => text.trim());
                currentValue = await control.inputValue();
                const selectedLabel = await textOf(control.locator('option:checked'));
                if (/^select an option$/i.test(selectedLabel)) currentValue = '';
            } else if (kind === 'radio') {
                options = (await group.locator('label').allInnerTexts()).map((text) => text.trim()).filter(Boolean);
                const checked = group.locator('input[type="radio"]:checked');
                currentValue = (await checked.count()) > 0 ? (await checked.first().getAttribute('value')) ?? '' : '';
            } else if (kind === 'checkbox') {
                currentValue = (await control.isChecked()) ? 'true' : '';
            } else if (kind !== 'file') {
                currentValue = await control.inputValue();
            }

            fields.push({
                identifier,
                label: label.replace(/\*\s*$/, '').trim(),
                tagName: kind === 'select' || kind === 'textarea' ? kind : 'input',
                inputType: kind === 'text' ? await control.getAttribute('type') : kind,
                role: await control.getAttribute('role'),
                name,
                autocomplete: await control.getAttribute('autocomplete'),
                placeholder: await control.getAttribute('placeholder'),
                required,
                currentValue,
                validationError: errorText || null,
                options,
            });
        }
        return fields;
    }

    async setValue(fieldId: string, value: string): Promise<void> {
        const handle = this.controls.get(fieldId);
        if (!handle) {
            throw new CapabilityError('form.setValue', `field ${fieldId} is not on the current step`, false);
        }
        const control = controlLocator(handle);
        switch (handle.kind) {
            case 'select':
                await control.selectOption({ label: value });
                break;
            case 'radio':
                await handle.group.getByLabel(value, { exact: true }).check();
                break;
            case 'checkbox':
                await control.setChecked(value === 'true');
                break;
            case 'file':
                await control.setInputFiles(value);
                break;
            case 'text':
            case 'textarea':
                await control.fill(value);
                if ((await control.getAttribute('role')) === 'combobox') {
                    await humanDelay(this.page, 600, 1200);
                    await control.press('ArrowDown');
                    await control.press('Enter');
                }
                break;
        }
        await humanDelay(this.page, 200, 600);
    }

    async listFormActions(): Promise<FormActions> {
        return {
            advance: await isAnyVisible(this.page, SELECTORS.formNextButton),
            submit: await isAnyVisible(this.page, SELECTORS.formSubmitButton),
        };
    }

    async submitOrAdvance(): Promise<SubmitOrAdvanceOutcome> {
        if (await isAnyVisible(this.page, SELECTORS.formSubmitButton)) {
            await clickWithFallback(this.page, SELECTORS.formSubmitButton, 'formSubmitButton');
            await humanDelay(this.page, 1500, 3000);
            if (await isAnyVisible(this.page, SELECTORS.formDismissButton)) {
                await clickWithFallback(this.page, SELECTORS.formDismissButton, 'formDismissButton');
            }
            return 'submitted';
        }
        if (await isAnyVisible(this.page, SELECTORS.formNextButton)) {
            await clickWithFallback(this.page, SELECTORS.formNextButton, 'formNextButton');
            await humanDelay(this.page, 800, 1600);
            return 'advanced';
        }
        return 'blocked';
    }

    async searchJobs(query: JobSearchQuery): Promise<JobPosting[]> {
        const params = new URLSearchParams({ keywords: query.job_title, f_AL: 'true' });
        if (query.location) params.set('location', query.location);
        await this.page.goto(`${PLATFORM_ORIGIN}/jobs/search/?${params.toString()}`, { waitUntil: 'domcontentloaded' });
        await waitForSelectorWithFallback(this.page, SELECTORS.jobCard, 'jobCard');

        const postings: JobPosting[] = [];
        const cards = this.page.locator(joinSelectors('jobCard'));
        const count = Math.min(await cards.count(), query.limit);
        for (let i = 0; i < count; i++) {
            const card = cards.nth(i);
            const link = card.locator(joinSelectors('jobCardTitle')).first();
            const href = (await link.getAttribute('href')) ?? '';
            const id = (await card.getAttribute('data-occludable-job-id'))
                ?? (await card.getAttribute('data-job-id'))
                ?? jobIdFromHref(href);
            if (!id) continue;

            await link.click();
            await humanDelay(this.page, 700, 1500);
            const description = await textOf(this.page.locator(joinSelectors('jobDescription')));
            postings.push({
                id,
                title: await textOf(link),
                company: await textOf(card.locator(joinSelectors('jobCardCompany'))),
                location: await textOf(card.locator(joinSelectors('jobCardLocation'))),
                url: `${PLATFORM_ORIGIN}/jobs/view/${id}/`,
                description: description.slice(0, DESCRIPTION_MAX_CHARS),
            });
        }
        await logInfo('browser.jobs.searched', { query: query.job_title, found: postings.length });
        return postings;
    }

    async searchEmployees(company: CompanyRecord, limit: number): Promise<EmployeeProfile[]> {
        const target = company.linkedin_url
            ? `${company.linkedin_url.replace(/\/+$/, '')}/people/`
            : `${PLATFORM_ORIGIN}/search/results/people/?${new URLSearchParams({ keywords: company.name }).toString()}`;
        await this.page.goto(target, { waitUntil: 'domcontentloaded' });
        await waitForSelectorWithFallback(this.page, SELECTORS.peopleCard, 'peopleCard');

        const cards = this.page.locator(joinSelectors('peopleCard'));
        for (let pageIndex = 1; pageIndex < MAX_RESULT_PAGES && (await cards.count()) < limit; pageIndex++) {
            if (!(await isAnyVisible(this.page, SELECTORS.showMoreButton))) break;
            await clickWithFallback(this.page, SELECTORS.showMoreButton, 'showMoreButton');
            await simulateHumanReading(this.page);
        }

        const employees: EmployeeProfile[] = [];
        const count = await cards.count();
        for (let i = 0; i < count && employees.length < limit; i++) {
            const card = cards.nth(i);
            const href = await card.locator(joinSelectors('peopleLink')).first().getAttribute('href').catch(() => null);
            const name = await textOf(card.locator(joinSelectors('peopleName')));
            // hidden members render as "LinkedIn Member" without a profile link
            if (!href || !name || /^linkedin member$/i.test(name)) continue;
            employees.push({
                name,
                title: await textOf(card.locator(joinSelectors('peopleTitle'))),
                profile_url: absoluteUrl(href.split('?')[0] ?? href),
            });
        }
        return employees;
    }

    private async openProfile(profileUrl: string): Promise<void> {
        if (this.page.url().split('?')[0] === profileUrl) return;
        await this.page.goto(profileUrl, { waitUntil: 'domcontentloaded' });
        await humanDelay(this.page, 1200, 2500);
    }

    async detectAffordance(profileUrl: string): Promise<MessagingAffordance> {
        await this.openProfile(profileUrl);
        const canConnect = await isAnyVisible(this.page, SELECTORS.connectButtonPrimary);
        if (!canConnect && await isAnyVisible(this.page, SELECTORS.messageButton)) {
            return 'direct_message';
        }
        if (canConnect) {
            return 'connection_request';
        }
        if (await isAnyVisible(this.page, SELECTORS.moreActionsButton)) {
            await clickWithFallback(this.page, SELECTORS.moreActionsButton, 'moreActionsButton');
            const inMenu = await isAnyVisible(this.page, SELECTORS.connectInMoreMenu);
            await this.page.keyboard.press('Escape');
            if (inMenu) return 'connection_request';
        }
        return 'none';
    }

    async sendDirectMessage(profileUrl: string, text: string): Promise<void> {
        await this.openProfile(profileUrl);
        await humanMouseMove(this.page, joinSelectors('messageButton'));
        await clickWithFallback(this.page, SELECTORS.messageButton, 'messageButton');
        await typeWithFallback(this.page, SELECTORS.messageTextbox, text, 'messageTextbox');
        await clickWithFallback(this.page, SELECTORS.messageSendButton, 'messageSendButton');
        await humanDelay(this.page, 800, 1600);
        await this.page.keyboard.press('Escape');
    }

    async sendConnectionRequest(profileUrl: string, note: string): Promise<void> {
        await this.openProfile(profileUrl);
        if (await isAnyVisible(this.page, SELECTORS.connectButtonPrimary)) {
            await humanMouseMove(this.page, joinSelectors('connectButtonPrimary'));
            await clickWithFallback(this.page, SELECTORS.connectButtonPrimary, 'connectButtonPrimary');
        } else {
            await clickWithFallback(this.page, SELECTORS.moreActionsButton, 'moreActionsButton');
            await clickWithFallback(this.page, SELECTORS.connectInMoreMenu, 'connectInMoreMenu');
        }
        await humanDelay(this.page, 600, 1400);
        if (note) {
            await clickWithFallback(this.page, SELECTORS.addNoteButton, 'addNoteButton');
            await typeWithFallback(this.page, SELECTORS.noteTextarea, note, 'noteTextarea');
        }
        await clickWithFallback(this.page, SELECTORS.sendWithNote, 'sendWithNote');
        await humanDelay(this.page, 800, 1600);
    }

    async close(): Promise<void> {
        await closeBrowser(this.session);
    }
}

export class PlaywrightAutomationProvider implements AutomationProvider {
    async openSession(accountKey: string, credentials: Credentials | null): Promise<AutomationSession> {
        const session = await launchBrowser({ accountKey });
        try {
            await ensureAuthenticated(session.page, credentials);
        } catch (error) {
            await closeBrowser(session).catch((closeError: unknown) =>
                logWarn('browser.close_failed', { error: errorMessage(closeError) })
            );
            throw error;
        }
        return new PlaywrightAutomationSession(session);
    }
}
