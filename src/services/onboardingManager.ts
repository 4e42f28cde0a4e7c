import { EnrichedDeal } from "../types/deal";
import { OnboardingRecord, TechnicianInfo } from "../types/onboarding";
import {
  Department,
  DEPARTMENT_LABELS,
  DEPARTMENT_TECHNICIAN_PROPERTIES,
  TeamMember,
} from "../types/team";
import { createLogger, describeError } from "../utils/log";
import { BaseStep, createStepContext } from "../steps/baseStep";
import { OnboardingNotFoundError, OnboardingStore } from "./onboardingStore";
import { PipelineEngine } from "./pipelineEngine";
import {
  DepartmentNotAssignedError,
  ServiceMapper,
  ServiceNotFoundError,
} from "./serviceMapper";
import { ChatClient } from "./slackClient";

const log = createLogger("manager");

export class OnboardingStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OnboardingStateError";
  }
}

export type OnboardingManagerOptions = {
  hubspotPortalId?: string | null;
};

/**
 * Candidates whose source property belongs to the department. A technician
 * listed under two properties keeps only the first.
 */
export function departmentTechnicians(
  technicians: readonly TechnicianInfo[],
  department: Department,
): TechnicianInfo[] {
  const properties = DEPARTMENT_TECHNICIAN_PROPERTIES[department] ?? [];
  const seen = new Set<string>();

  return technicians.filter((technician) => {
    if (!properties.includes(technician.property_name) || seen.has(technician.hubspot_tec_id)) {
      return false;
    }
    seen.add(technician.hubspot_tec_id);
    return true;
  });
}

export function buildWaitingTechnicianMessage(
  deal: EnrichedDeal,
  department: Department,
): string {
  return [
    ":warning: New deal without an assigned technician:",
    `*${deal.deal_name}*`,
    `Company: *${deal.company_name}*`,
    `Service: *${deal.service_name}*`,
    `Department: *${DEPARTMENT_LABELS[department]}*`,
    "",
    "Please assign a technician in HubSpot.",
  ].join("\n");
}

export class OnboardingManager {
  constructor(
    private readonly store: OnboardingStore,
    private readonly mapper: ServiceMapper,
    private readonly engine: PipelineEngine,
    private readonly slack: ChatClient,
    private readonly steps: readonly BaseStep[],
    private readonly options: OnboardingManagerOptions = {},
  ) {}

  async processDeal(deal: EnrichedDeal): Promise<OnboardingRecord> {
    const dealLog = log.child({ deal_id: deal.deal_id, company: deal.company_name });
    const existing = await this.store.findByDealId(deal.deal_id);

    if (existing?.status === "completed") {
      dealLog.info("onboarding_already_completed");
      return existing;
    }

    let department: Department;
    try {
      department = await this.mapper.resolveDepartment(deal.service_name);
    } catch (error) {
      if (error instanceof ServiceNotFoundError || error instanceof DepartmentNotAssignedError) {
        dealLog.warn("department_unresolved", {
          service: deal.service_name,
          reason: error.name,
        });
        return this.saveFailed(deal, error.message, existing);
      }
      throw error;
    }

    const technician = await this.resolveTechnician(deal, department);
    if (!technician) {
      return this.handleWaitingTechnician(deal, department, existing);
    }

    const technicians = departmentTechnicians(deal.technicians, department);
    let record: OnboardingRecord;
    if (existing) {
      await this.store.updateAssignment(existing.id, department, technicians);
      record = { ...existing, department, technicians };
    } else {
      record = await this.store.create({
        deal_id: deal.deal_id,
        deal_name: deal.deal_name,
        company_name: deal.company_name,
        service_name: deal.service_name,
        department,
        hubspot_owner_id: deal.hubspot_owner_id,
        technicians,
        status: "pending",
      });
    }

    const ctx = createStepContext(
      deal,
      department,
      technician,
      this.options.hubspotPortalId ?? null,
    );

    dealLog.info("running_pipeline", { department, technician: technician.short_name });
    return this.engine.run(record, ctx, this.steps);
  }

  /**
   * Departments with technician properties take the first matching candidate
   * that is also in the directory. The others are staffed by their responsible.
   */
  async resolveTechnician(
    deal: EnrichedDeal,
    department: Department,
  ): Promise<TeamMember | null> {
    if (!DEPARTMENT_TECHNICIAN_PROPERTIES[department]) {
      const responsible = await this.mapper.responsible(department);
      if (responsible) {
        log.info("technician_resolved_responsible", {
          department,
          technician: responsible.short_name,
        });
      }
      return responsible;
    }

    const candidate = departmentTechnicians(deal.technicians, department)[0];
    if (!candidate) {
      log.info("no_technician_in_deal", { deal_id: deal.deal_id, department });
      return null;
    }

    const members = await this.mapper.teamMembers(department);
    const technician =
      members.find((member) => member.hubspot_tec_id === candidate.hubspot_tec_id) ?? null;

    if (!technician) {
      log.warn("technician_not_in_directory", {
        deal_id: deal.deal_id,
        hubspot_tec_id: candidate.hubspot_tec_id,
        department,
      });
      return null;
    }

    log.info("technician_resolved", { department, technician: technician.short_name });
    return technician;
  }

  /** Moves a FAILED record back to PENDING so the next cycle runs it again. */
  async resetForRetry(dealId: string): Promise<OnboardingRecord> {
    const record = await this.store.findByDealId(dealId);
    if (!record) {
      throw new OnboardingNotFoundError(`No onboarding for deal ${dealId}.`);
    }
    if (record.status !== "failed") {
      throw new OnboardingStateError(
        `Onboarding for deal ${dealId} is ${record.status}; only failed onboardings can be retried.`,
      );
    }

    await this.store.updateStatus(record.id, "pending");
    log.info("onboarding_reset_for_retry", { deal_id: dealId });
    return { ...record, status: "pending", current_step: null, error_message: null };
  }

  private async handleWaitingTechnician(
    deal: EnrichedDeal,
    department: Department,
    existing: OnboardingRecord | null,
  ): Promise<OnboardingRecord> {
    const dealLog = log.child({ deal_id: deal.deal_id, department });
    const technicians = departmentTechnicians(deal.technicians, department);

    let record: OnboardingRecord;
    if (existing) {
      await this.store.updateAssignment(existing.id, department, technicians);
      await this.store.updateStatus(existing.id, "waiting_technician");
      record = {
        ...existing,
        department,
        technicians,
        status: "waiting_technician",
        current_step: null,
        error_message: null,
      };
    } else {
      record = await this.store.create({
        deal_id: deal.deal_id,
        deal_name: deal.deal_name,
        company_name: deal.company_name,
        service_name: deal.service_name,
        department,
        hubspot_owner_id: deal.hubspot_owner_id,
        technicians,
        status: "waiting_technician",
      });
    }

    dealLog.warn("onboarding_waiting_technician");

    const responsible = await this.mapper.responsible(department);
    if (!responsible?.slack_id) {
      dealLog.warn("no_responsible_slack_id");
      return record;
    }

    try {
      await this.slack.sendDirectMessage(
        responsible.slack_id,
        buildWaitingTechnicianMessage(deal, department),
      );
      dealLog.info("responsible_notified_no_technician", {
        responsible: responsible.short_name,
      });
    } catch (error) {
      dealLog.error("slack_notify_responsible_failed", { error: describeError(error) });
    }

    return record;
  }

  private async saveFailed(
    deal: EnrichedDeal,
    errorMessage: string,
    existing: OnboardingRecord | null,
  ): Promise<OnboardingRecord> {
    let record: OnboardingRecord;
    if (existing) {
      await this.store.updateStatus(existing.id, "failed", { errorMessage });
      record = { ...existing, status: "failed", current_step: null, error_message: errorMessage };
    } else {
      record = await this.store.create({
        deal_id: deal.deal_id,
        deal_name: deal.deal_name,
        company_name: deal.company_name,
        service_name: deal.service_name,
        department: null,
        hubspot_owner_id: deal.hubspot_owner_id,
        technicians: [],
        status: "failed",
        error_message: errorMessage,
      });
    }

    log.error("onboarding_failed_before_pipeline", {
      deal_id: deal.deal_id,
      error: errorMessage,
    });
    return record;
  }
}
