/**
 * Centralized selectors with explicit priority arrays.
 *
 * Each key returns an array of selectors, ordered from most-specific (primary)
 * to least-specific (text-based XPath fallback). `clickWithFallback` and
 * `waitForSelectorWithFallback` iterate the array in order and log a warning
 * when they degrade to a fallback tier.
 */
export const SELECTORS = {

    globalNav: [
        '.global-nav__me',
        '[data-test-global-nav-me] button',
        'button[aria-label*="Me"]',
    ],

    challengeSignals: [
        'input[name="captcha"]',
        'iframe[src*="captcha"]',
        'form[action*="checkpoint"]',
        'h1:has-text("Security verification")',
        'div:has-text("temporarily blocked")',
    ],

    loginEmail: [
        'input#username',
        'input[name="session_key"]',
    ],

    loginPassword: [
        'input#password',
        'input[name="session_password"]',
    ],

    loginSubmit: [
        'button[type="submit"][aria-label*="Sign in"]',
        'button[type="submit"]',
        '//button[contains(.,"Sign in")]',
    ],

    jobCard: [
        'li[data-occludable-job-id]',
        'div.job-card-container[data-job-id]',
        'li.jobs-search-results__list-item',
    ],

    jobCardTitle: [
        'a.job-card-list__title',
        'a.job-card-container__link',
        'a[href*="/jobs/view/"]',
    ],

    jobCardCompany: [
        '.artdeco-entity-lockup__subtitle',
        '.job-card-container__primary-description',
        '.job-card-container__company-name',
    ],

    jobCardLocation: [
        '.job-card-container__metadata-item',
        '.artdeco-entity-lockup__caption li',
    ],

    jobDescription: [
        '#job-details',
        '.jobs-description__content',
        '.jobs-box__html-content',
    ],

    easyApplyButton: [
        'button.jobs-apply-button',
        'button[aria-label*="Easy Apply"]',
        '//button[contains(.,"Easy Apply")]',
    ],

    formDialog: [
        'div.jobs-easy-apply-modal',
        'div[role="dialog"][aria-labelledby*="easy-apply"]',
        'div[role="dialog"]',
    ],

    formNextButton: [
        'button[aria-label="Continue to next step"]',
        'button[aria-label="Review your application"]',
        'div[role="dialog"] button:has-text("Next")',
        'div[role="dialog"] button:has-text("Review")',
    ],

    formSubmitButton: [
        'button[aria-label="Submit application"]',
        'div[role="dialog"] button:has-text("Submit application")',
    ],

    formDismissButton: [
        'button[aria-label="Dismiss"]',
        'div[role="dialog"] button[data-test-modal-close-btn]',
    ],

    formFieldGroup: [
        '.jobs-easy-apply-form-section__grouping',
        '.fb-dash-form-element',
        'div[data-test-form-element]',
    ],

    formFieldError: [
        '.artdeco-inline-feedback--error',
        '[data-test-form-element-error-messages]',
    ],

    peopleCard: [
        'li.org-people-profile-card__profile-card-spacing',
        'li.reusable-search__result-container',
        'div.org-people-profile-card',
    ],

    peopleName: [
        '.artdeco-entity-lockup__title',
        'span.entity-result__title-text a span[aria-hidden="true"]',
    ],

    peopleTitle: [
        '.artdeco-entity-lockup__subtitle',
        '.entity-result__primary-subtitle',
    ],

    peopleLink: [
        'a.app-aware-link[href*="/in/"]',
        'a[href*="/in/"]',
    ],

    showMoreButton: [
        'button.scaffold-finite-scroll__load-button',
        'button:has-text("Show more results")',
        '//button[contains(.,"Show more")]',
    ],

    messageButton: [
        'button[aria-label^="Message"]',
        'a.message-anywhere-button',
        'button:has-text("Message")',
        '//button[starts-with(@aria-label,"Message")]',
    ],

    connectButtonPrimary: [
        'button.artdeco-button--primary:has-text("Connect")',
        'button[aria-label*="Invite"][aria-label*="connect"]',
        'button[aria-label*="Connect"]',
    ],

    moreActionsButton: [
        'button[aria-label="More actions"]',
        'button.artdeco-dropdown__trigger:has-text("More")',
        '//button[contains(@aria-label,"More")]',
    ],

    connectInMoreMenu: [
        'div.artdeco-dropdown__content-inner li [role="button"]:has-text("Connect")',
        '.artdeco-dropdown__content button:has-text("Connect")',
        '//div[contains(@class,"dropdown")]//*[@role="button" and contains(.,"Connect")]',
    ],

    addNoteButton: [
        'button[aria-label="Add a note"]',
        'button:has-text("Add a note")',
        '//button[contains(.,"Add a note")]',
    ],

    noteTextarea: [
        'div[role="dialog"] textarea',
        'div[role="dialog"] div[contenteditable="true"]',
    ],

    sendWithNote: [
        'div[role="dialog"] button[aria-label="Send invitation"]',
        'div[role="dialog"] button.artdeco-button--primary:has-text("Send")',
        '//div[@role="dialog"]//button[contains(@class,"primary") and contains(.,"Send")]',
    ],

    messageTextbox: [
        'div.msg-form__contenteditable[role="textbox"]',
        'div[contenteditable="true"][role="textbox"]',
    ],

    messageSendButton: [
        'button.msg-form__send-button',
        'button:has-text("Send"):not([aria-label*="invitation"])',
        '//button[contains(@class,"send-button")]',
    ],
} as const;

export type SelectorKey = keyof typeof SELECTORS;

/**
 * Concatenates every CSS selector of a key into one comma-separated selector
 * (XPath entries are excluded), for `page.locator()` any-match lookups.
 */
export function joinSelectors(key: SelectorKey): string {
    return SELECTORS[key]
        .filter((s) => !s.startsWith('//'))
        .join(', ');
}
