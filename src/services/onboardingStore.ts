import {
  NewOnboardingRecord,
  OnboardingRecord,
  OnboardingStatus,
  StepName,
  StepRecord,
  TechnicianInfo,
} from "../types/onboarding";

/** Statuses a polling cycle picks back up. */
export const RESUMABLE_STATUSES: readonly OnboardingStatus[] = [
  "pending",
  "waiting_technician",
  "in_progress",
];

export type StatusUpdate = {
  currentStep?: StepName | null;
  /** Stored with the status; omitted means cleared. */
  errorMessage?: string | null;
};

export interface OnboardingStore {
  list(): Promise<OnboardingRecord[]>;
  listByStatus(statuses: readonly OnboardingStatus[]): Promise<OnboardingRecord[]>;
  findByDealId(dealId: string): Promise<OnboardingRecord | null>;
  create(record: NewOnboardingRecord): Promise<OnboardingRecord>;
  updateStatus(id: number, status: OnboardingStatus, update?: StatusUpdate): Promise<void>;
  updateAssignment(
    id: number,
    department: string,
    technicians: TechnicianInfo[],
  ): Promise<void>;
  upsertStep(step: StepRecord): Promise<void>;
  listSteps(onboardingId: number): Promise<StepRecord[]>;
}

export class DuplicateOnboardingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DuplicateOnboardingError";
  }
}

export class OnboardingNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OnboardingNotFoundError";
  }
}
