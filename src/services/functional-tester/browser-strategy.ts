import { chromium } from 'playwright';
import type { Browser, LaunchOptions, Page } from 'playwright';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/tools';
import type { ProbeOutcome, ProbeSession, ProbeStrategy } from './probes';

const BUTTON_SELECTOR = 'button, input[type="button"], input[type="submit"]';
const LINK_SELECTOR = 'a[href], [role="link"]';
const FIELD_SELECTOR = 'input[type="text"], input[type="email"], input:not([type]), textarea';
const NAVIGATION_SETTLE_MS = 1000;
const PAGE_LOAD_TIMEOUT = 15000;

class BrowserProbeSession implements ProbeSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly actionTimeout: number
  ) {}

  renderedText(): Promise<string> {
    return this.page.locator('body').innerText({ timeout: this.actionTimeout });
  }

  pageContent(): Promise<string> {
    return this.page.content();
  }

  async probeButtons(): Promise<ProbeOutcome> {
    const buttons = this.page.locator(BUTTON_SELECTOR);
    const count = await buttons.count();
    if (count === 0) {
      return { status: 'absent', detail: 'no buttons found' };
    }
    try {
      await buttons.first().click({ timeout: this.actionTimeout });
      return { status: 'pass', detail: `clicked the first of ${count} buttons` };
    } catch (error) {
      return { status: 'partial', detail: `found ${count} buttons but clicking failed: ${errorMessage(error)}` };
    }
  }

  async probeForms(): Promise<ProbeOutcome> {
    const fields = this.page.locator(FIELD_SELECTOR);
    const count = await fields.count();
    if (count === 0) {
      return { status: 'absent', detail: 'no form fields found' };
    }
    try {
      await fields.first().fill('test', { timeout: this.actionTimeout });
      return { status: 'pass', detail: `filled the first of ${count} form fields` };
    } catch (error) {
      return { status: 'fail', detail: `found ${count} form fields but filling failed: ${errorMessage(error)}` };
    }
  }

  async probeNavigation(): Promise<ProbeOutcome> {
    const links = this.page.locator(LINK_SELECTOR);
    const count = await links.count();
    if (count === 0) {
      return { status: 'absent', detail: 'no links found' };
    }
    const urlBefore = this.page.url();
    const textBefore = await this.renderedText();
    try {
      await links.first().click({ timeout: this.actionTimeout });
      await this.page.waitForTimeout(NAVIGATION_SETTLE_MS);
    } catch (error) {
      return { status: 'partial', detail: `found ${count} links but clicking failed: ${errorMessage(error)}` };
    }
    const changed = this.page.url() !== urlBefore || (await this.renderedText()) !== textBefore;
    return changed
      ? { status: 'pass', detail: 'clicking a link changed the page' }
      : { status: 'partial', detail: `found ${count} links but clicking did not change the page` };
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Drives the app in Chromium through playwright.
 * The same class serves the bundled browser and an installed Chrome (channel 'chrome').
 */
export class PlaywrightProbeStrategy implements ProbeStrategy {
  constructor(
    readonly name: string,
    private readonly launchOptions: LaunchOptions,
    private readonly actionTimeout: number = config.timeouts.browserAction
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      const browser = await chromium.launch(this.launchOptions);
      await browser.close();
      return true;
    } catch (error) {
      logger.debug(`${this.name} unavailable: ${errorMessage(error)}`);
      return false;
    }
  }

  async open(url: string): Promise<ProbeSession> {
    const browser = await chromium.launch(this.launchOptions);
    try {
      const page = await browser.newPage();
      await page.goto(url, { waitUntil: 'networkidle', timeout: PAGE_LOAD_TIMEOUT });
      return new BrowserProbeSession(browser, page, this.actionTimeout);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}

export function bundledChromiumStrategy(headless = config.functionalTests.headless): PlaywrightProbeStrategy {
  return new PlaywrightProbeStrategy('playwright-chromium', { headless });
}

export function systemChromeStrategy(headless = config.functionalTests.headless): PlaywrightProbeStrategy {
  return new PlaywrightProbeStrategy('playwright-chrome', { headless, channel: 'chrome' });
}
