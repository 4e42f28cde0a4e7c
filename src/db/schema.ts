import { integer, sqliteTable, text, unique } from "drizzle-orm/sqlite-core";

export const onboardings = sqliteTable("onboardings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  dealId: text("deal_id").notNull().unique(), // CRM deal id, one onboarding per deal
  dealName: text("deal_name").notNull(),
  companyName: text("company_name").notNull(),
  serviceName: text("service_name").notNull(),
  department: text("department"), // null until the service resolves
  hubspotOwnerId: text("hubspot_owner_id"),

  status: text("status").notNull().default("pending"),
  // "pending" | "waiting_technician" | "in_progress" | "completed" | "failed"
  currentStep: text("current_step"),
  errorMessage: text("error_message"),

  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export type OnboardingRow = typeof onboardings.$inferSelect;
export type NewOnboardingRow = typeof onboardings.$inferInsert;

// ---------------------------------------------------------------------------
// Technicians read from the contact, limited to the resolved department
// ---------------------------------------------------------------------------

export const onboardingTechnicians = sqliteTable(
  "onboarding_technicians",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    onboardingId: integer("onboarding_id")
      .notNull()
      .references(() => onboardings.id),
    hubspotTecId: text("hubspot_tec_id").notNull(),
    propertyName: text("property_name").notNull(),
  },
  (table) => ({
    onboardingTechnician: unique().on(table.onboardingId, table.hubspotTecId),
  }),
);

export type OnboardingTechnicianRow = typeof onboardingTechnicians.$inferSelect;

// ---------------------------------------------------------------------------
// Step progress, one row per (onboarding, step)
// ---------------------------------------------------------------------------

export const onboardingSteps = sqliteTable(
  "onboarding_steps",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    onboardingId: integer("onboarding_id")
      .notNull()
      .references(() => onboardings.id),
    stepName: text("step_name").notNull(),
    status: text("status").notNull().default("pending"),
    resultData: text("result_data"), // JSON string
    errorMessage: text("error_message"),
    startedAt: text("started_at"),
    completedAt: text("completed_at"),
  },
  (table) => ({
    onboardingStep: unique().on(table.onboardingId, table.stepName),
  }),
);

export type OnboardingStepRow = typeof onboardingSteps.$inferSelect;
export type NewOnboardingStepRow = typeof onboardingSteps.$inferInsert;
