import { describe, it, expect, beforeEach } from 'vitest';
import { PageNavigator } from '../../src/browser/navigator.js';
import { ContentNotFoundError, NavigationError, StalePageError } from '../../src/errors.js';
import type { DropdownControl, PaginationControl } from '../../src/types/profile.js';
import { CountingPacing, FakePage } from '../helpers/fake-page.js';

const control: PaginationControl = {
  next: '.paginationNextContainer',
  content: '.statsTableContainer',
};

const dropdown: DropdownControl = {
  trigger: '.mobile > .current',
  option: (p) => `.mobile li:nth-child(${p})`,
  content: '.statsTableContainer',
};

const CONSENT = '#onetrust-accept-btn-handler';

describe('PageNavigator', () => {
  let page: FakePage;
  let pacing: CountingPacing;
  let navigator: PageNavigator;

  beforeEach(() => {
    page = new FakePage();
    pacing = new CountingPacing();
    navigator = new PageNavigator({ page }, pacing, { timeoutMs: 1000, paginationRetries: 3 });
  });

  describe('open', () => {
    it('should pace before loading the URL', async () => {
      await navigator.open('https://example.com/tables');
      expect(page.calls).toEqual(['goto https://example.com/tables']);
      expect(pacing.count).toBe(1);
    });

    it('should raise NavigationError when the page does not load', async () => {
      page.gotoError = new Error('net::ERR_TIMED_OUT');
      await expect(navigator.open('https://example.com/tables')).rejects.toBeInstanceOf(NavigationError);
      await expect(navigator.open('https://example.com/tables')).rejects.toMatchObject({
        url: 'https://example.com/tables',
      });
    });
  });

  describe('dismissInterstitials', () => {
    it('should close every visible modal', async () => {
      page.visible.add(CONSENT);
      page.visible.add('#advertClose');

      expect(await navigator.dismissInterstitials()).toBe(2);
      expect(page.calls).toEqual([`wait ${CONSENT}`, `click ${CONSENT}`, 'click #advertClose']);
      expect(pacing.count).toBe(2);
    });

    it('should treat missing modals as nothing to do', async () => {
      expect(await navigator.dismissInterstitials()).toBe(0);
      expect(page.calls).toEqual([`wait ${CONSENT}`]);
      expect(pacing.count).toBe(0);
    });

    it('should close a consent banner that renders while it waits', async () => {
      page.onWait = (selector) => {
        if (selector === CONSENT) page.visible.add(CONSENT);
      };

      expect(await navigator.dismissInterstitials()).toBe(1);
      expect(page.calls).toEqual([`wait ${CONSENT}`, `click ${CONSENT}`]);
    });

    it('should wait for a late banner only once per session', async () => {
      await navigator.dismissInterstitials();
      await navigator.dismissInterstitials();

      expect(page.calls).toEqual([`wait ${CONSENT}`]);
    });

    it('should carry on when a modal vanishes before the click', async () => {
      page.visible.add('#advertClose');
      page.onClick = () => {
        throw new Error('Element is not attached to the DOM');
      };

      expect(await navigator.dismissInterstitials()).toBe(0);
    });

    it('should use custom interstitial rules when given', async () => {
      navigator = new PageNavigator({ page }, pacing, {
        timeoutMs: 1000,
        paginationRetries: 0,
        interstitials: [{ name: 'newsletter', selector: '.newsletter-close' }],
      });
      page.visible.add('.newsletter-close');
      page.visible.add('#advertClose');

      expect(await navigator.dismissInterstitials()).toBe(1);
      expect(page.calls).toEqual(['click .newsletter-close']);
    });
  });

  describe('readyCheck', () => {
    it('should resolve once the marker is present', async () => {
      page.present.add('.league-table__tbody');
      await expect(navigator.readyCheck('.league-table__tbody')).resolves.toBeUndefined();
    });

    it('should raise ContentNotFoundError when the marker never appears', async () => {
      await expect(navigator.readyCheck('.league-table__tbody')).rejects.toBeInstanceOf(ContentNotFoundError);
      await expect(navigator.readyCheck('.league-table__tbody')).rejects.toMatchObject({
        marker: '.league-table__tbody',
      });
    });
  });

  describe('selectOption', () => {
    beforeEach(() => {
      navigator = new PageNavigator({ page }, pacing, { timeoutMs: 1000, paginationRetries: 1, interstitials: [] });
      page.visible.add(dropdown.trigger);
      page.visible.add(dropdown.option(3));
      page.present.add(dropdown.content);
      page.texts.set(dropdown.content, 'Attack 2023_24');
    });

    it('should open the dropdown, pick the entry and wait for the new content', async () => {
      page.onClick = (selector) => {
        if (selector === dropdown.option(3)) page.texts.set(dropdown.content, 'Attack 2022_23');
      };

      await navigator.selectOption(dropdown, 3);

      expect(page.calls).toEqual([
        'click .mobile > .current',
        'click .mobile li:nth-child(3)',
        'wait .statsTableContainer',
      ]);
      // one wait per click, one before the content check
      expect(pacing.count).toBe(3);
    });

    it('should raise StalePageError when the content stays the same', async () => {
      await expect(navigator.selectOption(dropdown, 3)).rejects.toBeInstanceOf(StalePageError);
      expect(page.calls.filter((c) => c === 'wait .statsTableContainer')).toHaveLength(2);
    });

    it('should skip the dropdown when the trigger already shows the entry', async () => {
      page.texts.set(dropdown.trigger, '2022/23');
      page.texts.set(dropdown.option(3), '2022/23');

      await navigator.selectOption(dropdown, 3);

      expect(page.calls).toEqual([]);
      expect(pacing.count).toBe(0);
    });

    it('should raise ContentNotFoundError when the entry is missing', async () => {
      await expect(navigator.selectOption(dropdown, 9)).rejects.toBeInstanceOf(ContentNotFoundError);
    });
  });

  describe('scroll', () => {
    it('should pace, scroll and look for modals again', async () => {
      page.visible.add('#advertClose');
      await navigator.scroll(600);
      expect(page.calls).toEqual(['wheel 0,600', `wait ${CONSENT}`, 'click #advertClose']);
      expect(pacing.count).toBe(2);
    });
  });

  describe('paginate', () => {
    beforeEach(() => {
      page.visible.add(control.next);
      page.present.add(control.content);
      page.texts.set(control.content, 'Page 1 stats');
    });

    it('should advance when the content changes', async () => {
      page.onClick = () => page.texts.set(control.content, 'Page 2 stats');

      await navigator.paginate(2, control);

      expect(page.calls.filter((c) => c.startsWith('click'))).toEqual(['click .paginationNextContainer']);
      // one wait before the click, one before the first content check
      expect(pacing.count).toBe(2);
      await expect(navigator.paginate(2, control)).rejects.toBeInstanceOf(RangeError);
    });

    it('should step through intermediate pages', async () => {
      let shown = 1;
      page.onClick = () => {
        shown++;
        page.texts.set(control.content, `Page ${shown} stats`);
      };

      await navigator.paginate(3, control);

      expect(page.calls.filter((c) => c.startsWith('click'))).toHaveLength(2);
      await expect(navigator.paginate(3, control)).rejects.toBeInstanceOf(RangeError);
    });

    it('should raise StalePageError once the retry budget is spent', async () => {
      await expect(navigator.paginate(2, control)).rejects.toBeInstanceOf(StalePageError);
    });

    it('should check the content once plus once per retry, pacing before each check', async () => {
      await expect(navigator.paginate(2, control)).rejects.toMatchObject({
        action: 'pagination to page 2',
        page: 2,
        attempts: 4,
      });
      expect(page.calls.filter((c) => c === 'wait .statsTableContainer')).toHaveLength(4);
      expect(page.calls.filter((c) => c.startsWith('click'))).toHaveLength(1);
      expect(pacing.count).toBe(5);
    });

    it('should accept content that changes on a later check', async () => {
      let checks = 0;
      page.onWait = (selector) => {
        if (selector !== control.content) return;
        checks++;
        if (checks === 3) page.texts.set(control.content, 'Page 2 stats');
      };

      await navigator.paginate(2, control);
      expect(checks).toBe(3);
    });

    it('should require the page indicator to match when the control has one', async () => {
      const withIndicator: PaginationControl = { ...control, indicator: '.paginationCurrent' };
      page.texts.set('.paginationCurrent', '1');
      page.onClick = () => page.texts.set(control.content, 'Page 2 stats');

      await expect(navigator.paginate(2, withIndicator)).rejects.toBeInstanceOf(StalePageError);

      page.texts.set(control.content, 'Page 1 stats');
      page.onClick = () => {
        page.texts.set(control.content, 'Page 2 stats');
        page.texts.set('.paginationCurrent', 'Page 2');
      };
      await expect(navigator.paginate(2, withIndicator)).resolves.toBeUndefined();
    });

    it('should reject a page at or before the current one', async () => {
      await expect(navigator.paginate(1, control)).rejects.toBeInstanceOf(RangeError);
    });

    it('should raise ContentNotFoundError when there is no next control', async () => {
      page.visible.delete(control.next);
      await expect(navigator.paginate(2, control)).rejects.toBeInstanceOf(ContentNotFoundError);
    });

    it('should start counting from page 1 after opening a new URL', async () => {
      let shown = 1;
      page.onClick = () => {
        shown++;
        page.texts.set(control.content, `Page ${shown} stats`);
      };
      await navigator.paginate(2, control);
      await navigator.open('https://example.com/clubs/arsenal/stats');

      await expect(navigator.paginate(2, control)).resolves.toBeUndefined();
    });
  });
});
