import { DEPARTMENT_DRIVE_SUBFOLDER } from "../types/team";
import { createLogger } from "../utils/log";
import { FolderStore } from "../services/googleDriveClient";
import { CrmClient } from "../services/hubspotClient";
import { BaseStep, StepContext, StepResult, stepCompleted } from "./baseStep";

const log = createLogger("step.create_drive_folder");

/**
 * Client folder under the shared parent, plus the department's subfolder
 * when it has one. The folder id is written back to the CRM company so the
 * next cycle can find it.
 */
export class CreateDriveFolderStep extends BaseStep {
  readonly name = "create_drive_folder" as const;

  constructor(
    private readonly drive: FolderStore,
    private readonly crm: Pick<CrmClient, "updateCompany">,
    private readonly parentFolderId: string,
  ) {
    super();
  }

  async checkAlreadyDone(ctx: StepContext): Promise<boolean> {
    const folderId = ctx.company.drive_folder_id;
    if (!folderId) {
      return false;
    }

    const subfolderName = DEPARTMENT_DRIVE_SUBFOLDER[ctx.department];
    let subfolderId: string | null = null;
    if (subfolderName) {
      subfolderId = await this.drive.findFolder(subfolderName, folderId);
      if (!subfolderId) {
        return false;
      }
    }

    ctx.drive_folder_id = folderId;
    ctx.drive_folder_url = ctx.company.drive_folder_url ?? this.drive.folderUrl(folderId);
    ctx.drive_subfolder_id = subfolderId;
    return true;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const stepLog = log.child({ deal_id: ctx.deal_id, company: ctx.company_name });
    const storedFolderId = ctx.company.drive_folder_id;

    const folderId =
      storedFolderId ??
      (await this.drive.findOrCreateFolder(ctx.company_name, this.parentFolderId));
    const folderUrl = this.drive.folderUrl(folderId);

    ctx.drive_folder_id = folderId;
    ctx.drive_folder_url = folderUrl;
    stepLog.info("drive_client_folder_ready", { folder_id: folderId, reused: Boolean(storedFolderId) });

    if (!storedFolderId) {
      await this.crm.updateCompany(ctx.company.company_id, {
        drive_folder_id: folderId,
        drive_folder_url: folderUrl,
      });
      stepLog.info("crm_drive_ids_written", { company_id: ctx.company.company_id });
    }

    let subfolderId: string | null = null;
    const subfolderName = DEPARTMENT_DRIVE_SUBFOLDER[ctx.department];
    if (subfolderName) {
      subfolderId = await this.drive.findOrCreateFolder(subfolderName, folderId);
      ctx.drive_subfolder_id = subfolderId;
      stepLog.info("drive_subfolder_ready", { subfolder_name: subfolderName, subfolder_id: subfolderId });
    }

    return stepCompleted({
      drive_folder_id: folderId,
      drive_folder_url: folderUrl,
      drive_subfolder_id: subfolderId,
    });
  }
}
