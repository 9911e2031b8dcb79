import type { FetchTarget } from '../types/target.js';
import type { PageProfile } from '../types/profile.js';
import type { SeasonInfo } from '../types/reference.js';
import type { PageNavigator } from './navigator.js';

export type CaptureResult =
  | { status: 'captured'; url: string; html: string }
  /** The requested page lies beyond the last page the site offers */
  | { status: 'absent'; url: string };

/**
 * Brings one target to its ready state:
 * Navigating -> ModalCheck -> ContentWait -> (SeasonSwitch -> ContentWait) -> Ready,
 * then for later pages Paginating -> ContentWait -> Ready. Any navigator
 * error ends the target.
 */
export async function capturePage(
  navigator: PageNavigator,
  profile: PageProfile,
  target: FetchTarget,
  season: SeasonInfo,
): Promise<CaptureResult> {
  if (target.category !== profile.category) {
    throw new RangeError(`Profile for ${profile.category} cannot capture a ${target.category} page`);
  }
  if (target.season !== season.id) {
    throw new RangeError(`Target season ${target.season} does not match ${season.id}`);
  }

  const url = profile.url(target);
  await navigator.open(url);
  await navigator.dismissInterstitials();
  await navigator.readyCheck(profile.readyMarker);

  if (profile.seasonDropdown) {
    // First entry is "all seasons"; waits for the default season's content to be replaced
    await navigator.selectOption(profile.seasonDropdown, season.dropdownIndex + 1);
  }

  if (target.page > 1) {
    const pagination = profile.pagination;
    if (!pagination) {
      throw new RangeError(`${profile.category} pages are not paginated`);
    }
    if (pagination.revealScrollPx !== undefined) {
      await navigator.scroll(pagination.revealScrollPx);
    }
    if (!(await navigator.hasControl(pagination.next))) {
      return { status: 'absent', url };
    }
    await navigator.paginate(target.page, pagination);
  }

  return { status: 'captured', url, html: await navigator.content() };
}
