/**
 * Watchlist re-check: re-parses every watched product, stores the new
 * prices and forwards the alerts that raised
 */

import { MONITOR_CONSTANTS } from "../constants/index";
import type { ProductParser } from "../product/parser";
import type { MovieRepository } from "../database/repository";
import type { ProductSink } from "../types/index";
import { Logger } from "../utils/logger";
import { type Sleep, sleep } from "../utils/retry";
import type { NotificationService } from "./notifications";

export interface MonitorResult {
  checked: number;
  alertsSent: number;
}

export interface PriceMonitorOptions {
  itemDelayMs?: number;
  sleep?: Sleep;
}

export class PriceMonitor {
  private readonly sleep: Sleep;

  constructor(
    private readonly repository: Pick<
      MovieRepository,
      "getWatchlist" | "getUnnotifiedAlerts" | "markAlertsNotified"
    >,
    private readonly parser: Pick<ProductParser, "parseProductPage">,
    private readonly sink: ProductSink,
    private readonly notifier: Pick<NotificationService, "sendNotifications">,
    private readonly options: PriceMonitorOptions = {},
  ) {
    this.sleep = options.sleep ?? sleep;
  }

  async checkWatchlistPrices(): Promise<MonitorResult> {
    const items = this.repository.getWatchlist();
    if (items.length === 0) {
      Logger.info("No items in watchlist");
      return { checked: 0, alertsSent: 0 };
    }

    Logger.info(`Checking ${items.length} watchlist items...`, { count: items.length });
    const delay = this.options.itemDelayMs ?? MONITOR_CONSTANTS.ITEM_DELAY_MS;
    let checked = 0;

    for (const item of items) {
      try {
        Logger.debug(`Checking: ${item.title}`, { url: item.url });
        const record = await this.parser.parseProductPage(item.url);
        if (record && (await this.sink.save(record))) checked++;
      } catch (error) {
        Logger.error(`Error checking ${item.title}`, error, { url: item.url });
      }
      await this.sleep(delay);
    }

    const alerts = this.repository.getUnnotifiedAlerts();
    if (alerts.length > 0) {
      await this.notifier.sendNotifications(alerts);
      this.repository.markAlertsNotified(alerts.map((a) => a.id));
    }
    return { checked, alertsSent: alerts.length };
  }
}
