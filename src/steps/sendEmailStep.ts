import { DEPARTMENT_LABELS } from "../types/team";
import { escapeHtml } from "../utils/html";
import { createLogger } from "../utils/log";
import { EmailSender } from "../services/emailClient";
import {
  BaseStep,
  hubspotDealUrl,
  StepContext,
  StepResult,
  stepCompleted,
  stepFailed,
} from "./baseStep";

const log = createLogger("step.send_email");

const CELL_STYLE = "padding: 8px; border: 1px solid #ddd;";

export function onboardingEmailSubject(ctx: StepContext): string {
  return `New onboarding: ${ctx.company_name} - ${ctx.service_name}`;
}

function detailRow(label: string, value: string): string {
  return [
    "<tr>",
    `<td style="${CELL_STYLE} font-weight: bold;">${label}</td>`,
    `<td style="${CELL_STYLE}">${escapeHtml(value)}</td>`,
    "</tr>",
  ].join("");
}

function linkItem(label: string, url: string | null, text: string): string {
  if (!url) {
    return "";
  }
  return `<li><strong>${label}:</strong> <a href="${escapeHtml(url)}">${text}</a></li>`;
}

export function buildOnboardingEmailHtml(ctx: StepContext): string {
  const links = [
    linkItem("Google Drive", ctx.drive_folder_url, "Client folder"),
    linkItem("Holded", ctx.holded_contact_url, "Billing contact"),
    linkItem("HubSpot", hubspotDealUrl(ctx), "Deal"),
  ].join("");

  return `<div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
  <h2>New onboarding assigned</h2>
  <p>Hi ${escapeHtml(ctx.technician.short_name)},</p>
  <p>A new deal has been assigned to you:</p>
  <table style="border-collapse: collapse; width: 100%; margin: 16px 0;">
    ${detailRow("Deal", ctx.deal_name)}
    ${detailRow("Company", ctx.company_name)}
    ${detailRow("Service", ctx.service_name)}
    ${detailRow("Department", DEPARTMENT_LABELS[ctx.department])}
  </table>
  <h3>Links</h3>
  <ul>${links}</ul>
  <div style="background-color: #fff3cd; border: 1px solid #ffc107; border-radius: 4px; padding: 12px; margin: 16px 0;">
    <strong>Important:</strong> the Holded billing contact was created automatically and
    <strong>has not been reviewed</strong>. Check its details before starting work.
  </div>
</div>`;
}

export class SendEmailStep extends BaseStep {
  readonly name = "send_email" as const;

  constructor(private readonly email: EmailSender) {
    super();
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const to = ctx.technician.email.trim();
    if (!to) {
      return stepFailed(`Technician ${ctx.technician.full_name} has no email address.`);
    }

    const messageId = await this.email.send({
      to,
      subject: onboardingEmailSubject(ctx),
      html: buildOnboardingEmailHtml(ctx),
    });

    log.info("email_sent_to_technician", {
      deal_id: ctx.deal_id,
      technician: ctx.technician.short_name,
      message_id: messageId,
    });

    return stepCompleted({ email_message_id: messageId });
  }
}
