import { asc, desc, eq, inArray } from "drizzle-orm";

import { OnboardingDatabase } from "../db";
import {
  onboardings,
  onboardingSteps,
  onboardingTechnicians,
  type NewOnboardingRow,
  type NewOnboardingStepRow,
  type OnboardingRow,
  type OnboardingStepRow,
  type OnboardingTechnicianRow,
} from "../db/schema";
import {
  isOnboardingStatus,
  isStepName,
  isStepStatus,
  NewOnboardingRecord,
  OnboardingRecord,
  OnboardingStatus,
  StepRecord,
  StepResultData,
  TechnicianInfo,
} from "../types/onboarding";
import { createLogger } from "../utils/log";
import {
  DuplicateOnboardingError,
  OnboardingNotFoundError,
  OnboardingStore,
  StatusUpdate,
} from "./onboardingStore";

const log = createLogger("store");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function nowIso(): string {
  return new Date().toISOString();
}

function isStepResultData(value: unknown): value is StepResultData {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  return Object.values(value).every(
    (entry) =>
      entry === null ||
      typeof entry === "string" ||
      typeof entry === "number" ||
      typeof entry === "boolean",
  );
}

function parseResultData(json: string | null): StepResultData | null {
  if (!json) return null;
  const parsed: unknown = JSON.parse(json);
  return isStepResultData(parsed) ? parsed : null;
}

function rowToRecord(
  row: OnboardingRow,
  technicians: TechnicianInfo[],
): OnboardingRecord {
  const status = row.status;
  if (!isOnboardingStatus(status)) {
    throw new Error(`Onboarding ${row.id} has unknown status "${status}"`);
  }

  const currentStep = row.currentStep;
  if (currentStep !== null && !isStepName(currentStep)) {
    throw new Error(`Onboarding ${row.id} has unknown current step "${currentStep}"`);
  }

  return {
    id: row.id,
    deal_id: row.dealId,
    deal_name: row.dealName,
    company_name: row.companyName,
    service_name: row.serviceName,
    department: row.department,
    hubspot_owner_id: row.hubspotOwnerId,
    technicians,
    status,
    current_step: currentStep,
    error_message: row.errorMessage,
    created_at_iso: row.createdAt,
    updated_at_iso: row.updatedAt,
  };
}

function rowToTechnician(row: OnboardingTechnicianRow): TechnicianInfo {
  return {
    hubspot_tec_id: row.hubspotTecId,
    property_name: row.propertyName,
  };
}

function newRecordToRow(input: NewOnboardingRecord, now: string): NewOnboardingRow {
  return {
    dealId: input.deal_id,
    dealName: input.deal_name,
    companyName: input.company_name,
    serviceName: input.service_name,
    department: input.department,
    hubspotOwnerId: input.hubspot_owner_id,
    status: input.status,
    currentStep: null,
    errorMessage: input.error_message ?? null,
    createdAt: now,
    updatedAt: now,
  };
}

function rowToStep(row: OnboardingStepRow): StepRecord {
  const stepName = row.stepName;
  const status = row.status;
  if (!isStepName(stepName) || !isStepStatus(status)) {
    throw new Error(
      `Onboarding ${row.onboardingId} has an unreadable step row (${stepName}/${status})`,
    );
  }

  return {
    onboarding_id: row.onboardingId,
    step_name: stepName,
    status,
    result_data: parseResultData(row.resultData),
    error_message: row.errorMessage,
    started_at_iso: row.startedAt,
    completed_at_iso: row.completedAt,
  };
}

function stepToRow(step: StepRecord): NewOnboardingStepRow {
  return {
    onboardingId: step.onboarding_id,
    stepName: step.step_name,
    status: step.status,
    resultData: step.result_data ? JSON.stringify(step.result_data) : null,
    errorMessage: step.error_message,
    startedAt: step.started_at_iso,
    completedAt: step.completed_at_iso,
  };
}

// ---------------------------------------------------------------------------
// DrizzleOnboardingStore
// ---------------------------------------------------------------------------

export class DrizzleOnboardingStore implements OnboardingStore {
  constructor(private readonly database: OnboardingDatabase) {}

  private async withTechnicians(rows: OnboardingRow[]): Promise<OnboardingRecord[]> {
    if (rows.length === 0) return [];

    const technicianRows = await this.database
      .select()
      .from(onboardingTechnicians)
      .where(
        inArray(
          onboardingTechnicians.onboardingId,
          rows.map((row) => row.id),
        ),
      )
      .orderBy(asc(onboardingTechnicians.id));

    const byOnboarding = new Map<number, TechnicianInfo[]>();
    for (const technician of technicianRows) {
      const list = byOnboarding.get(technician.onboardingId) ?? [];
      list.push(rowToTechnician(technician));
      byOnboarding.set(technician.onboardingId, list);
    }

    return rows.map((row) => rowToRecord(row, byOnboarding.get(row.id) ?? []));
  }

  async list(): Promise<OnboardingRecord[]> {
    const rows = await this.database
      .select()
      .from(onboardings)
      .orderBy(desc(onboardings.id));
    return this.withTechnicians(rows);
  }

  async listByStatus(
    statuses: readonly OnboardingStatus[],
  ): Promise<OnboardingRecord[]> {
    if (statuses.length === 0) return [];

    const rows = await this.database
      .select()
      .from(onboardings)
      .where(inArray(onboardings.status, [...statuses]))
      .orderBy(asc(onboardings.createdAt), asc(onboardings.id));
    return this.withTechnicians(rows);
  }

  async findByDealId(dealId: string): Promise<OnboardingRecord | null> {
    const rows = await this.database
      .select()
      .from(onboardings)
      .where(eq(onboardings.dealId, dealId))
      .limit(1);

    if (rows.length === 0) return null;
    const [record] = await this.withTechnicians(rows);
    return record ?? null;
  }

  async create(input: NewOnboardingRecord): Promise<OnboardingRecord> {
    const existing = await this.findByDealId(input.deal_id);
    if (existing) {
      throw new DuplicateOnboardingError(
        `Onboarding already exists for deal ${input.deal_id}.`,
      );
    }

    const now = nowIso();
    const row = this.database.transaction((tx) => {
      const inserted = tx
        .insert(onboardings)
        .values(newRecordToRow(input, now))
        .returning()
        .get();
      if (!inserted) {
        throw new Error(`Insert for deal ${input.deal_id} returned no row`);
      }

      if (input.technicians.length > 0) {
        tx.insert(onboardingTechnicians)
          .values(
            input.technicians.map((technician) => ({
              onboardingId: inserted.id,
              hubspotTecId: technician.hubspot_tec_id,
              propertyName: technician.property_name,
            })),
          )
          .onConflictDoNothing()
          .run();
      }

      return inserted;
    });

    log.info("onboarding_created", { deal_id: input.deal_id, id: row.id });
    // Technicians are read back: the (onboarding, technician id) key drops repeats.
    const [record] = await this.withTechnicians([row]);
    return record ?? rowToRecord(row, []);
  }

  async updateStatus(
    id: number,
    status: OnboardingStatus,
    update: StatusUpdate = {},
  ): Promise<void> {
    const result = await this.database
      .update(onboardings)
      .set({
        status,
        currentStep: update.currentStep ?? null,
        errorMessage: update.errorMessage ?? null,
        updatedAt: nowIso(),
      })
      .where(eq(onboardings.id, id));

    if (result.changes === 0) {
      throw new OnboardingNotFoundError(`Onboarding ${id} not found.`);
    }
  }

  async updateAssignment(
    id: number,
    department: string,
    technicians: TechnicianInfo[],
  ): Promise<void> {
    this.database.transaction((tx) => {
      const result = tx
        .update(onboardings)
        .set({ department, updatedAt: nowIso() })
        .where(eq(onboardings.id, id))
        .run();

      if (result.changes === 0) {
        throw new OnboardingNotFoundError(`Onboarding ${id} not found.`);
      }

      tx.delete(onboardingTechnicians)
        .where(eq(onboardingTechnicians.onboardingId, id))
        .run();

      if (technicians.length > 0) {
        tx.insert(onboardingTechnicians)
          .values(
            technicians.map((technician) => ({
              onboardingId: id,
              hubspotTecId: technician.hubspot_tec_id,
              propertyName: technician.property_name,
            })),
          )
          .onConflictDoNothing()
          .run();
      }
    });
  }

  async upsertStep(step: StepRecord): Promise<void> {
    const row = stepToRow(step);

    await this.database
      .insert(onboardingSteps)
      .values(row)
      .onConflictDoUpdate({
        target: [onboardingSteps.onboardingId, onboardingSteps.stepName],
        set: {
          status: row.status,
          resultData: row.resultData,
          errorMessage: row.errorMessage,
          startedAt: row.startedAt,
          completedAt: row.completedAt,
        },
      });
  }

  async listSteps(onboardingId: number): Promise<StepRecord[]> {
    const rows = await this.database
      .select()
      .from(onboardingSteps)
      .where(eq(onboardingSteps.onboardingId, onboardingId))
      .orderBy(asc(onboardingSteps.id));
    return rows.map(rowToStep);
  }
}
