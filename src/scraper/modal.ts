import type { Logger } from 'pino';
import type { ProductConfig } from '../config.js';
import type { PageDriver } from '../browser/driver.js';
import { ModalFailure, describeError } from '../errors.js';

export const MODAL_TIMEOUTS = {
  appear: 5_000,
  input: 5_000,
  suggestion: 10_000,
  dismiss: 10_000,
  settle: 2_000,
  action: 5_000,
} as const;

export function suggestionSelector(pincode: string): string {
  return `xpath=//p[contains(@class, 'item-name') and text()='${pincode}']`;
}

/**
 * Clears the location (pincode) overlay some product pages show before their content.
 * Resolves `true` when there was nothing to do or the overlay was dismissed, `false`
 * when an overlay was present but could not be handled.
 */
export async function resolveLocationModal(driver: PageDriver, product: ProductConfig, log: Logger): Promise<boolean> {
  const { pincode, selectors } = product;
  if (!pincode) return true;

  try {
    const active =
      (await driver.waitForVisible(selectors.modal, MODAL_TIMEOUTS.appear)) &&
      (await driver.waitForInteractable(selectors.input, MODAL_TIMEOUTS.input));
    if (!active) {
      log.info({ product: product.name }, 'No active pincode modal found');
      return true;
    }
    log.info({ product: product.name }, 'Pincode modal detected and active');

    await driver.fill(selectors.input, pincode, MODAL_TIMEOUTS.action);
    log.info({ product: product.name, pincode }, 'Entered pincode');

    if (await driver.clickWhenVisible(suggestionSelector(pincode), MODAL_TIMEOUTS.suggestion)) {
      log.info({ product: product.name, pincode }, 'Selected matching pincode from dropdown');
    } else {
      log.warn({ product: product.name, pincode }, 'Pincode not found in dropdown, trying to proceed without it');
    }

    if (await driver.clickIfPresent(selectors.submit, MODAL_TIMEOUTS.action)) {
      log.info({ product: product.name }, 'Clicked submit button');
    } else {
      await driver.press(selectors.input, 'Enter', MODAL_TIMEOUTS.action);
      log.info({ product: product.name }, 'Pressed Enter on pincode input');
    }

    await driver.waitForHidden(selectors.modal, MODAL_TIMEOUTS.dismiss);
    await driver.pause(MODAL_TIMEOUTS.settle);

    log.info({ product: product.name }, 'Pincode modal handled successfully');
    return true;
  } catch (err) {
    const failure = new ModalFailure(describeError(err), { cause: err });
    log.error({ product: product.name, err: failure }, 'Failed to handle pincode modal');
    return false;
  }
}
