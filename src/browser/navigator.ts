import crypto from 'node:crypto';
import type { PacingStrategy } from '../compliance/pacing.js';
import {
  ContentNotFoundError,
  NavigationError,
  StalePageError,
  errorMessage,
} from '../errors.js';
import type { DropdownControl, InterstitialRule, PaginationControl } from '../types/profile.js';
import { logger } from '../utils/logger.js';
import type { BrowserPage, SessionHandle } from './session.js';

export const DEFAULT_INTERSTITIALS: InterstitialRule[] = [
  // Rendered by a script some seconds after the document loads
  { name: 'cookie-consent', selector: '#onetrust-accept-btn-handler', appearsWithinMs: 10_000 },
  { name: 'advert', selector: '#advertClose' },
];

/** Modals can fade out between the visibility check and the click. */
const DISMISS_CLICK_TIMEOUT_MS = 2000;

export interface NavigatorOptions {
  /** Bound on page loads, marker waits and clicks */
  timeoutMs: number;
  /** Extra content checks after a pagination click or season switch before giving up */
  paginationRetries: number;
  interstitials?: InterstitialRule[];
}

/**
 * Drives the single browser tab of a session. Every action is preceded by a
 * pacing wait, and modals are cleared after anything that can bring them back.
 */
export class PageNavigator {
  private readonly page: BrowserPage;
  private readonly interstitials: InterstitialRule[];
  // Rules whose late rendering has already been waited for once
  private readonly awaited = new Set<string>();
  private currentPage = 1;

  constructor(
    session: SessionHandle,
    private readonly pacing: PacingStrategy,
    private readonly options: NavigatorOptions,
  ) {
    this.page = session.page;
    this.interstitials = options.interstitials ?? DEFAULT_INTERSTITIALS;
  }

  async open(url: string): Promise<void> {
    await this.pacing.wait();
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.timeoutMs });
    } catch (err) {
      throw new NavigationError(url, { cause: err });
    }
    this.currentPage = 1;
    logger.debug({ url }, 'Page opened');
  }

  /** Closes whichever known modals are showing. Returns how many were closed. */
  async dismissInterstitials(): Promise<number> {
    let dismissed = 0;
    for (const rule of this.interstitials) {
      if (rule.appearsWithinMs !== undefined && !this.awaited.has(rule.name)) {
        this.awaited.add(rule.name);
        await this.awaitInterstitial(rule, rule.appearsWithinMs);
      }
      if (!(await this.page.isVisible(rule.selector))) continue;

      await this.pacing.wait();
      try {
        await this.page.click(rule.selector, { timeout: DISMISS_CLICK_TIMEOUT_MS });
        dismissed++;
        logger.debug({ modal: rule.name }, 'Interstitial dismissed');
      } catch (err) {
        logger.warn({ modal: rule.name, err: errorMessage(err) }, 'Interstitial vanished before dismissal');
      }
    }
    return dismissed;
  }

  async readyCheck(marker: string): Promise<void> {
    try {
      await this.page.waitForSelector(marker, { timeout: this.options.timeoutMs });
    } catch (err) {
      throw new ContentNotFoundError(marker, `absent after ${this.options.timeoutMs}ms`, { cause: err });
    }
  }

  /**
   * Picks a dropdown entry and waits until the content it controls has been
   * replaced. Nothing is clicked when the trigger already shows the entry.
   */
  async selectOption(control: DropdownControl, position: number): Promise<void> {
    const option = control.option(position);
    const wanted = await this.readText(option);
    if (wanted !== '' && (await this.readText(control.trigger)) === wanted) {
      logger.debug({ option: wanted }, 'Option already selected');
      return;
    }

    const before = await this.fingerprint(control.content);
    await this.clickControl(control.trigger);
    await this.clickControl(option);
    await this.awaitContentChange(control.content, before, `selecting option ${position}`);
    this.currentPage = 1;
    await this.dismissInterstitials();
  }

  async scroll(deltaY: number): Promise<void> {
    await this.pacing.wait();
    await this.page.mouse.wheel(0, deltaY);
    await this.dismissInterstitials();
  }

  hasControl(selector: string): Promise<boolean> {
    return this.page.isVisible(selector);
  }

  /**
   * Steps forward with the control's next button until `pageNumber` is shown.
   * Each step must visibly replace the content, otherwise the snapshot taken
   * afterwards would silently duplicate the previous page.
   */
  async paginate(pageNumber: number, control: PaginationControl): Promise<void> {
    if (pageNumber <= this.currentPage) {
      throw new RangeError(`Cannot paginate from page ${this.currentPage} to page ${pageNumber}`);
    }

    while (this.currentPage < pageNumber) {
      const expected = this.currentPage + 1;
      const before = await this.fingerprint(control.content);
      await this.clickControl(control.next);
      await this.awaitContentChange(
        control.content,
        before,
        `pagination to page ${expected}`,
        expected,
        () => this.indicatorShows(control, expected),
      );
      this.currentPage = expected;
      logger.debug({ page: expected }, 'Paginated');
      await this.dismissInterstitials();
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }

  private async awaitContentChange(
    selector: string,
    before: string,
    action: string,
    page?: number,
    settled: () => Promise<boolean> = async () => true,
  ): Promise<void> {
    const attempts = this.options.paginationRetries + 1;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      await this.pacing.wait();
      await this.readyCheck(selector);
      const after = await this.fingerprint(selector);
      if (after !== before && (await settled())) return;
      logger.debug({ action, attempt }, 'Content not replaced yet');
    }
    throw new StalePageError(action, attempts, page);
  }

  private async awaitInterstitial(rule: InterstitialRule, timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForSelector(rule.selector, { state: 'visible', timeout: timeoutMs });
    } catch (err) {
      logger.debug({ modal: rule.name, err: errorMessage(err) }, 'Interstitial did not appear');
    }
  }

  private async readText(selector: string): Promise<string> {
    try {
      const text = await this.page.textContent(selector, { timeout: this.options.timeoutMs });
      return (text ?? '').replace(/\s+/g, ' ').trim();
    } catch (err) {
      logger.debug({ selector, err: errorMessage(err) }, 'No text to compare');
      return '';
    }
  }

  private async indicatorShows(control: PaginationControl, expected: number): Promise<boolean> {
    if (!control.indicator) return true;
    const text = await this.page.textContent(control.indicator, { timeout: this.options.timeoutMs });
    return parseInt((text ?? '').replace(/\D/g, ''), 10) === expected;
  }

  private async fingerprint(selector: string): Promise<string> {
    let text: string | null;
    try {
      text = await this.page.textContent(selector, { timeout: this.options.timeoutMs });
    } catch (err) {
      throw new ContentNotFoundError(selector, 'cannot fingerprint content', { cause: err });
    }
    return crypto.createHash('sha256').update(text ?? '').digest('hex');
  }

  private async clickControl(selector: string): Promise<void> {
    await this.pacing.wait();
    try {
      await this.page.click(selector, { timeout: this.options.timeoutMs });
    } catch (err) {
      throw new ContentNotFoundError(selector, 'control not clickable', { cause: err });
    }
  }
}
