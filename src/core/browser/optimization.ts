/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";

const BLOCKED_RESOURCE_TYPES = new Set(["image", "font", "media"]);

/**
 * Aborts image, font and media requests. Stylesheets stay: the crawler waits
 * for product links to become visible.
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  await page.route("**/*", (route) => {
    if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
      return route.abort();
    }
    return route.continue();
  });
}
