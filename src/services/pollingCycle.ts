import { EnrichedDeal } from "../types/deal";
import { escapeHtml } from "../utils/html";
import { createLogger, describeError } from "../utils/log";
import { DealDetector } from "./dealDetector";
import { EmailSender } from "./emailClient";
import { OnboardingManager } from "./onboardingManager";
import { OnboardingStore, RESUMABLE_STATUSES } from "./onboardingStore";

const log = createLogger("cycle");

const SUBJECT_PREFIX = "[Onboardings]";

export type CycleSummary = {
  new_deals: number;
  retried: number;
  failed: number;
};

type ProcessOrigin = "new_deal" | "retry";

export class PollingCycle {
  constructor(
    private readonly detector: Pick<DealDetector, "detectNewDeals" | "enrichDealById">,
    private readonly manager: Pick<OnboardingManager, "processDeal">,
    private readonly store: Pick<OnboardingStore, "listByStatus">,
    private readonly email: EmailSender,
    private readonly adminEmail: string,
  ) {}

  /**
   * New deals first, then records left pending, then one summary email for
   * everything FAILED. Faults escaping this method are for the caller to
   * hand to `notifyCriticalError`.
   */
  async run(): Promise<CycleSummary> {
    log.info("polling_cycle_started");

    const handled = await this.processNewDeals();
    const retried = await this.retryPending(handled);
    const failed = await this.notifyFailedSummary();

    const summary = { new_deals: handled.size, retried, failed };
    log.info("polling_cycle_completed", summary);
    return summary;
  }

  /** Never throws. */
  async notifyCriticalError(error: unknown, stack?: string | null): Promise<void> {
    const errorName = error instanceof Error ? error.name : typeof error;
    const trace = stack ?? (error instanceof Error ? error.stack : undefined) ?? "No stack trace";

    const html = [
      "<h2>The polling cycle failed with an unhandled error.</h2>",
      `<p><strong>Error:</strong> ${escapeHtml(errorName)}: ${escapeHtml(describeError(error))}</p>`,
      `<pre>${escapeHtml(trace)}</pre>`,
    ].join("\n");

    try {
      await this.email.send({
        to: this.adminEmail,
        subject: `${SUBJECT_PREFIX} CRITICAL ERROR in polling cycle`,
        html,
      });
      log.info("admin_notified_critical_error");
    } catch (sendError) {
      log.critical("admin_notification_failed", {
        error: describeError(sendError),
        original_error: describeError(error),
      });
    }
  }

  private async processNewDeals(): Promise<Set<string>> {
    const deals = await this.detector.detectNewDeals();
    log.info("new_deals_detected", { count: deals.length });

    const handled = new Set<string>();
    for (const deal of deals) {
      await this.safeProcessDeal(deal, "new_deal");
      handled.add(deal.deal_id);
    }
    return handled;
  }

  /**
   * Retries every resumable record except the deals handled earlier in this
   * cycle. Those wait for the next cycle: retrying them now would run a
   * waiting deal twice and ping its department responsible twice.
   */
  private async retryPending(handled: ReadonlySet<string>): Promise<number> {
    const pending = (await this.store.listByStatus(RESUMABLE_STATUSES)).filter(
      (record) => !handled.has(record.deal_id),
    );
    if (pending.length === 0) {
      return 0;
    }

    log.info("pending_onboardings_found", { count: pending.length });
    let retried = 0;

    for (const record of pending) {
      const recordLog = log.child({ onboarding_id: record.id, deal_id: record.deal_id });

      let enriched: EnrichedDeal | null;
      try {
        enriched = await this.detector.enrichDealById(record.deal_id);
      } catch (error) {
        recordLog.error("reenrich_failed", { error: describeError(error) });
        continue;
      }

      if (!enriched) {
        recordLog.warn("deal_not_enrichable");
        continue;
      }

      await this.safeProcessDeal(enriched, "retry");
      retried += 1;
    }

    return retried;
  }

  private async safeProcessDeal(deal: EnrichedDeal, origin: ProcessOrigin): Promise<void> {
    const dealLog = log.child({ deal_id: deal.deal_id, origin });
    try {
      const record = await this.manager.processDeal(deal);
      dealLog.info("deal_processed", { status: record.status });
    } catch (error) {
      dealLog.error("deal_processing_error", { error: describeError(error) });
    }
  }

  private async notifyFailedSummary(): Promise<number> {
    const failed = await this.store.listByStatus(["failed"]);
    if (failed.length === 0) {
      return 0;
    }

    log.warn("failed_onboardings_exist", { count: failed.length });

    const items = failed
      .map(
        (record) =>
          `<li>Deal ${escapeHtml(record.deal_id)}: ${escapeHtml(record.deal_name)} ` +
          `(department: ${escapeHtml(record.department ?? "unassigned")})</li>`,
      )
      .join("\n");

    try {
      await this.email.send({
        to: this.adminEmail,
        subject: `${SUBJECT_PREFIX} ${failed.length} onboarding(s) with errors`,
        html: `<p>${failed.length} onboarding(s) with errors:</p>\n<ul>\n${items}\n</ul>`,
      });
      log.info("admin_notified_failed_summary", { count: failed.length });
    } catch (error) {
      log.error("failed_summary_email_error", { error: describeError(error) });
    }

    return failed.length;
  }
}
