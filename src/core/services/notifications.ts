/**
 * Price alert delivery: always to the log, to Discord when a webhook is set
 */

import { NOTIFY_CONSTANTS } from "../constants/index";
import type { PriceAlertWithTitle } from "../types/index";
import { Logger } from "../utils/logger";

export interface DiscordEmbed {
  title: string;
  description: string;
  url: string;
  color: number;
}

export function discordEmbed(alert: PriceAlertWithTitle): DiscordEmbed {
  return {
    title: alert.title,
    description:
      alert.alertType === "back_in_stock"
        ? `Back in stock at €${alert.newPrice}`
        : `Price: €${alert.oldPrice} → €${alert.newPrice}`,
    url: alert.url,
    color:
      alert.alertType === "price_drop"
        ? NOTIFY_CONSTANTS.PRICE_DROP_COLOR
        : NOTIFY_CONSTANTS.DEFAULT_COLOR,
  };
}

export class NotificationService {
  constructor(private readonly discordWebhook?: string) {}

  async sendNotifications(alerts: PriceAlertWithTitle[]): Promise<void> {
    if (alerts.length === 0) return;

    for (const alert of alerts) {
      const meta = { url: alert.url, movieId: alert.movieId, kind: alert.alertType };
      if (alert.alertType === "target_reached") {
        Logger.info(`Target price reached: ${alert.title} at €${alert.newPrice}`, meta);
      } else if (alert.alertType === "back_in_stock") {
        Logger.info(`Back in stock: ${alert.title} at €${alert.newPrice}`, meta);
      } else {
        Logger.info(`Price dropped: ${alert.title} €${alert.oldPrice} -> €${alert.newPrice}`, meta);
      }
    }

    if (this.discordWebhook) {
      await this.sendDiscordNotification(this.discordWebhook, alerts);
    }
  }

  /**
   * One webhook message per alert. Stops at the first failure, which is
   * logged rather than thrown.
   */
  async sendDiscordNotification(webhook: string, alerts: PriceAlertWithTitle[]): Promise<void> {
    try {
      for (const alert of alerts) {
        const res = await fetch(webhook, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ embeds: [discordEmbed(alert)] }),
          signal: AbortSignal.timeout(NOTIFY_CONSTANTS.TIMEOUT_MS),
        });
        if (!res.ok) throw new Error(`Discord webhook responded with HTTP ${res.status}`);
      }
      Logger.info(`Discord notifications sent`, { count: alerts.length });
    } catch (error) {
      Logger.error("Failed to send Discord notification", error);
    }
  }
}
