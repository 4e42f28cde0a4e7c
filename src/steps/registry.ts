import { EmailSender } from "../services/emailClient";
import { FolderStore } from "../services/googleDriveClient";
import { BillingClient } from "../services/holdedClient";
import { CrmClient } from "../services/hubspotClient";
import { ChatClient } from "../services/slackClient";
import { BaseStep } from "./baseStep";
import { CreateDriveFolderStep } from "./createDriveFolderStep";
import { CreateHoldedContactStep } from "./createHoldedContactStep";
import { NotifySlackStep } from "./notifySlackStep";
import { SendEmailStep } from "./sendEmailStep";

export type StepDependencies = {
  crm: Pick<CrmClient, "updateCompany">;
  drive: FolderStore;
  holded: BillingClient;
  slack: ChatClient;
  email: EmailSender;
  driveParentFolderId: string;
};

/** Email goes last: it links to what the earlier steps created. */
export function buildPipeline(deps: StepDependencies): BaseStep[] {
  return [
    new CreateDriveFolderStep(deps.drive, deps.crm, deps.driveParentFolderId),
    new CreateHoldedContactStep(deps.holded, deps.crm),
    new NotifySlackStep(deps.slack),
    new SendEmailStep(deps.email),
  ];
}
