export const ONBOARDING_STATUSES = [
  "pending",
  "waiting_technician",
  "in_progress",
  "completed",
  "failed",
] as const;

export type OnboardingStatus = (typeof ONBOARDING_STATUSES)[number];

export const STEP_STATUSES = [
  "pending",
  "in_progress",
  "completed",
  "failed",
  "skipped",
] as const;

export type StepStatus = (typeof STEP_STATUSES)[number];

// Pipeline order lives in steps/registry.ts, not here.
export const STEP_NAMES = [
  "create_drive_folder",
  "create_holded_contact",
  "notify_slack",
  "send_email",
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export function isOnboardingStatus(value: string): value is OnboardingStatus {
  return ONBOARDING_STATUSES.some((status) => status === value);
}

export function isStepStatus(value: string): value is StepStatus {
  return STEP_STATUSES.some((status) => status === value);
}

export function isStepName(value: string): value is StepName {
  return STEP_NAMES.some((name) => name === value);
}

/** A technician id read from one of the contact's "assigned technician" properties. */
export type TechnicianInfo = {
  hubspot_tec_id: string;
  property_name: string;
};

export type StepResultData = Record<string, string | number | boolean | null>;

export type StepRecord = {
  onboarding_id: number;
  step_name: StepName;
  status: StepStatus;
  result_data: StepResultData | null;
  error_message: string | null;
  started_at_iso: string | null;
  completed_at_iso: string | null;
};

export type OnboardingRecord = {
  id: number;
  deal_id: string;
  deal_name: string;
  company_name: string;
  service_name: string;
  department: string | null;
  hubspot_owner_id: string | null;
  technicians: TechnicianInfo[];
  status: OnboardingStatus;
  current_step: StepName | null;
  error_message: string | null;
  created_at_iso: string;
  updated_at_iso: string;
};

export type NewOnboardingRecord = {
  deal_id: string;
  deal_name: string;
  company_name: string;
  service_name: string;
  department: string | null;
  hubspot_owner_id: string | null;
  technicians: TechnicianInfo[];
  status: OnboardingStatus;
  error_message?: string | null;
};
