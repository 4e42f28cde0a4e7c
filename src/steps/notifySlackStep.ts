import { createLogger } from "../utils/log";
import { ChatClient } from "../services/slackClient";
import { BaseStep, StepContext, StepResult, stepCompleted, stepFailed } from "./baseStep";

const log = createLogger("step.notify_slack");

export function buildTechnicianMessage(ctx: StepContext): string {
  return [
    `Hi ${ctx.technician.short_name} :wave:`,
    "",
    `You have been assigned a new deal: *${ctx.deal_name}*`,
    `Company: *${ctx.company_name}*`,
    `Service: *${ctx.service_name}*`,
    "",
    "Check your inbox for the onboarding details.",
  ].join("\n");
}

export class NotifySlackStep extends BaseStep {
  readonly name = "notify_slack" as const;

  constructor(private readonly slack: ChatClient) {
    super();
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const slackId = ctx.technician.slack_id;
    if (!slackId) {
      return stepFailed(`Technician ${ctx.technician.email} has no Slack id.`);
    }

    const ts = await this.slack.sendDirectMessage(slackId, buildTechnicianMessage(ctx));
    log.info("slack_dm_sent_to_technician", {
      deal_id: ctx.deal_id,
      technician: ctx.technician.short_name,
      slack_id: slackId,
      ts,
    });

    return stepCompleted({ slack_ts: ts });
  }
}
