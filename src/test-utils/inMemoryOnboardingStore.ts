import {
  NewOnboardingRecord,
  OnboardingRecord,
  OnboardingStatus,
  StepRecord,
  TechnicianInfo,
} from "../types/onboarding";
import {
  DuplicateOnboardingError,
  OnboardingNotFoundError,
  OnboardingStore,
  StatusUpdate,
} from "../services/onboardingStore";

const FIXED_ISO = "2026-03-02T09:00:00.000Z";

/** Keeps every step write in `stepWrites` so tests can count them. */
export class InMemoryOnboardingStore implements OnboardingStore {
  readonly records: OnboardingRecord[] = [];

  readonly steps: StepRecord[] = [];

  readonly stepWrites: StepRecord[] = [];

  private nextId = 1;

  async list(): Promise<OnboardingRecord[]> {
    return [...this.records].reverse().map((record) => ({ ...record }));
  }

  async listByStatus(statuses: readonly OnboardingStatus[]): Promise<OnboardingRecord[]> {
    return this.records
      .filter((record) => statuses.includes(record.status))
      .map((record) => ({ ...record }));
  }

  async findByDealId(dealId: string): Promise<OnboardingRecord | null> {
    const record = this.records.find((entry) => entry.deal_id === dealId);
    return record ? { ...record } : null;
  }

  async create(input: NewOnboardingRecord): Promise<OnboardingRecord> {
    if (this.records.some((record) => record.deal_id === input.deal_id)) {
      throw new DuplicateOnboardingError(`Onboarding for deal ${input.deal_id} already exists.`);
    }

    const record: OnboardingRecord = {
      ...input,
      id: this.nextId++,
      technicians: [...input.technicians],
      current_step: null,
      error_message: input.error_message ?? null,
      created_at_iso: FIXED_ISO,
      updated_at_iso: FIXED_ISO,
    };
    this.records.push(record);
    return { ...record };
  }

  async updateStatus(
    id: number,
    status: OnboardingStatus,
    update: StatusUpdate = {},
  ): Promise<void> {
    const record = this.require(id);
    record.status = status;
    record.current_step = update.currentStep ?? null;
    record.error_message = update.errorMessage ?? null;
  }

  async updateAssignment(
    id: number,
    department: string,
    technicians: TechnicianInfo[],
  ): Promise<void> {
    const record = this.require(id);
    record.department = department;
    record.technicians = [...technicians];
  }

  async upsertStep(step: StepRecord): Promise<void> {
    this.stepWrites.push({ ...step });
    const index = this.steps.findIndex(
      (entry) => entry.onboarding_id === step.onboarding_id && entry.step_name === step.step_name,
    );
    if (index >= 0) {
      this.steps[index] = { ...step };
    } else {
      this.steps.push({ ...step });
    }
  }

  async listSteps(onboardingId: number): Promise<StepRecord[]> {
    return this.steps.filter((step) => step.onboarding_id === onboardingId);
  }

  private require(id: number): OnboardingRecord {
    const record = this.records.find((entry) => entry.id === id);
    if (!record) {
      throw new OnboardingNotFoundError(`Onboarding ${id} not found.`);
    }
    return record;
  }
}
