import type { FetchTarget, PageCategory } from './target.js';

/** A modal that can cover the page and has to be clicked away. */
export interface InterstitialRule {
  name: string;
  /** Close/accept button */
  selector: string;
  /**
   * How long the first check of a session waits for the modal to render.
   * Unset: only an already visible modal is dismissed.
   */
  appearsWithinMs?: number;
}

export interface DropdownControl {
  /** Element that opens the dropdown */
  trigger: string;
  /** Selector of the entry at a 1-based position */
  option(position: number): string;
  /** Container whose text changes once the chosen entry has been applied */
  content: string;
}

export interface PaginationControl {
  /** Button advancing to the next page */
  next: string;
  /** Container whose text changes when the page changes */
  content: string;
  /** Element whose text is the current page number, when the site shows one */
  indicator?: string;
  /** Scroll distance that brings the next button into view */
  revealScrollPx?: number;
}

/** How to reach one category of page and recognise it as loaded. */
export interface PageProfile {
  category: PageCategory;
  url(target: FetchTarget): string;
  /** Present when the season is switched in-page rather than through the URL */
  seasonDropdown?: DropdownControl;
  /** Marker that only exists once the data-bearing subtree has rendered */
  readyMarker: string;
  pagination?: PaginationControl;
}
