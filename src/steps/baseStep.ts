import { CompanyInfo, ContactPersonInfo, EnrichedDeal } from "../types/deal";
import { StepName, StepResultData } from "../types/onboarding";
import { Department, TeamMember } from "../types/team";

/**
 * Mutable state shared by the steps of one pipeline run. Steps write the ids
 * they create (folder, billing contact) so later steps can link to them.
 */
export type StepContext = {
  deal_id: string;
  deal_name: string;
  company_name: string;
  service_name: string;
  hubspot_portal_id: string | null;

  company: CompanyInfo;
  contact_person: ContactPersonInfo;

  department: Department;
  technician: TeamMember;

  drive_folder_id: string | null;
  drive_folder_url: string | null;
  drive_subfolder_id: string | null;
  holded_contact_id: string | null;
  holded_contact_url: string | null;
};

export type StepResult =
  | { ok: true; skipped: boolean; data: StepResultData }
  | { ok: false; error: string };

export function createStepContext(
  deal: EnrichedDeal,
  department: Department,
  technician: TeamMember,
  hubspotPortalId: string | null = null,
): StepContext {
  return {
    deal_id: deal.deal_id,
    deal_name: deal.deal_name,
    company_name: deal.company_name,
    service_name: deal.service_name,
    hubspot_portal_id: hubspotPortalId,
    company: deal.company,
    contact_person: deal.contact_person,
    department,
    technician,
    drive_folder_id: null,
    drive_folder_url: null,
    drive_subfolder_id: null,
    holded_contact_id: deal.company.holded_id,
    holded_contact_url: null,
  };
}

export function hubspotDealUrl(ctx: StepContext): string | null {
  if (!ctx.hubspot_portal_id) {
    return null;
  }
  return `https://app.hubspot.com/contacts/${ctx.hubspot_portal_id}/deal/${ctx.deal_id}`;
}

export function stepCompleted(data: StepResultData): StepResult {
  return { ok: true, skipped: false, data };
}

export function stepFailed(error: string): StepResult {
  return { ok: false, error };
}

/**
 * One provisioning action. `run` skips `execute` when the work is already
 * visible outside this system; `execute` reports expected problems as a
 * failed result and only throws on faults nobody planned for.
 */
export abstract class BaseStep {
  abstract readonly name: StepName;

  async run(ctx: StepContext): Promise<StepResult> {
    if (await this.checkAlreadyDone(ctx)) {
      return { ok: true, skipped: true, data: { skipped: true } };
    }
    return this.execute(ctx);
  }

  // Overrides that return true must also fill the context fields later steps read.
  async checkAlreadyDone(_ctx: StepContext): Promise<boolean> {
    return false;
  }

  abstract execute(ctx: StepContext): Promise<StepResult>;
}
