/**
 * Loading-screen presentations.
 *
 * The manager only knows `Presentation.show/hide`. `adaptPresentation`
 * wraps loading screens that expose some subset of the usual visibility and
 * fade methods.
 */

import type { Presentation } from './types';

/** Presentation that does nothing; the default when none is configured. */
export class NullPresentation implements Presentation {
  show(): void {}

  hide(): void {}
}

export interface LoadingScreenLike {
  setVisible?(visible: boolean): void;
  show?(): Promise<void> | void;
  hide?(): Promise<void> | void;
  fadeIn?(): Promise<void> | void;
  fadeOut?(): Promise<void> | void;
  showLoading?(): Promise<void> | void;
  hideLoading?(): Promise<void> | void;
}

/**
 * Map a duck-typed loading screen onto `Presentation`.
 *
 * show: make visible (`setVisible(true)`, else `show()`), then run the
 * intro animation (`fadeIn()`, else `showLoading()`).
 * hide: run the outro (`fadeOut()`, else `hideLoading()`, else `hide()`),
 * then `setVisible(false)`.
 */
export function adaptPresentation(screen: LoadingScreenLike): Presentation {
  return {
    async show() {
      if (screen.setVisible) {
        screen.setVisible(true);
      } else if (screen.show) {
        await screen.show();
      }

      if (screen.fadeIn) {
        await screen.fadeIn();
      } else if (screen.showLoading) {
        await screen.showLoading();
      }
    },
    async hide() {
      if (screen.fadeOut) {
        await screen.fadeOut();
      } else if (screen.hideLoading) {
        await screen.hideLoading();
      } else if (screen.hide) {
        await screen.hide();
      }
      screen.setVisible?.(false);
    },
  };
}
