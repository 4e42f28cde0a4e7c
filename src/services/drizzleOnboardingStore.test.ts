import { beforeEach, describe, expect, it } from "vitest";

import { openDatabase } from "../db";
import { NewOnboardingRecord } from "../types/onboarding";
import { DrizzleOnboardingStore } from "./drizzleOnboardingStore";
import { DuplicateOnboardingError, OnboardingNotFoundError } from "./onboardingStore";

function buildNewRecord(overrides: Partial<NewOnboardingRecord> = {}): NewOnboardingRecord {
  return {
    deal_id: "1001",
    deal_name: "ACME SL - CFO",
    company_name: "ACME SL",
    service_name: "CFO",
    department: "FI",
    hubspot_owner_id: "77",
    technicians: [{ hubspot_tec_id: "tec-1", property_name: "cfo_asignado" }],
    status: "pending",
    ...overrides,
  };
}

describe("DrizzleOnboardingStore", () => {
  let store: DrizzleOnboardingStore;

  beforeEach(() => {
    store = new DrizzleOnboardingStore(openDatabase(":memory:"));
  });

  it("creates a record and reads it back with its technicians", async () => {
    const created = await store.create(buildNewRecord());

    const found = await store.findByDealId("1001");

    expect(found).toMatchObject({
      id: created.id,
      deal_id: "1001",
      department: "FI",
      status: "pending",
      current_step: null,
      error_message: null,
      technicians: [{ hubspot_tec_id: "tec-1", property_name: "cfo_asignado" }],
    });
  });

  it("returns the technicians that were actually stored", async () => {
    const created = await store.create(
      buildNewRecord({
        technicians: [
          { hubspot_tec_id: "tec-1", property_name: "cfo_asignado" },
          { hubspot_tec_id: "tec-1", property_name: "cfo_asignado_ii" },
        ],
      }),
    );

    const found = await store.findByDealId("1001");

    expect(created.technicians).toEqual([
      { hubspot_tec_id: "tec-1", property_name: "cfo_asignado" },
    ]);
    expect(found?.technicians).toEqual(created.technicians);
  });

  it("returns null for an unknown deal", async () => {
    expect(await store.findByDealId("missing")).toBeNull();
  });

  it("refuses a second record for the same deal", async () => {
    await store.create(buildNewRecord());

    await expect(store.create(buildNewRecord())).rejects.toBeInstanceOf(
      DuplicateOnboardingError,
    );
  });

  it("writes status, step pointer and error message together", async () => {
    const created = await store.create(buildNewRecord());

    await store.updateStatus(created.id, "in_progress", {
      currentStep: "notify_slack",
    });
    expect(await store.findByDealId("1001")).toMatchObject({
      status: "in_progress",
      current_step: "notify_slack",
    });

    await store.updateStatus(created.id, "failed", { errorMessage: "boom" });
    expect(await store.findByDealId("1001")).toMatchObject({
      status: "failed",
      current_step: null,
      error_message: "boom",
    });

    await store.updateStatus(created.id, "pending");
    expect((await store.findByDealId("1001"))?.error_message).toBeNull();
  });

  it("rejects status writes for unknown onboardings", async () => {
    await expect(store.updateStatus(999, "failed")).rejects.toBeInstanceOf(
      OnboardingNotFoundError,
    );
  });

  it("keeps one step row per onboarding and step name", async () => {
    const created = await store.create(buildNewRecord());

    await store.upsertStep({
      onboarding_id: created.id,
      step_name: "create_drive_folder",
      status: "in_progress",
      result_data: null,
      error_message: null,
      started_at_iso: "2026-03-01T10:00:00.000Z",
      completed_at_iso: null,
    });
    await store.upsertStep({
      onboarding_id: created.id,
      step_name: "create_drive_folder",
      status: "completed",
      result_data: { drive_folder_id: "folder-1", drive_subfolder_id: null },
      error_message: null,
      started_at_iso: "2026-03-01T10:00:00.000Z",
      completed_at_iso: "2026-03-01T10:00:02.000Z",
    });

    expect(await store.listSteps(created.id)).toEqual([
      {
        onboarding_id: created.id,
        step_name: "create_drive_folder",
        status: "completed",
        result_data: { drive_folder_id: "folder-1", drive_subfolder_id: null },
        error_message: null,
        started_at_iso: "2026-03-01T10:00:00.000Z",
        completed_at_iso: "2026-03-01T10:00:02.000Z",
      },
    ]);
  });

  it("lists records by status in creation order", async () => {
    const first = await store.create(buildNewRecord({ deal_id: "1" }));
    await store.create(buildNewRecord({ deal_id: "2", status: "completed" }));
    const third = await store.create(
      buildNewRecord({ deal_id: "3", status: "waiting_technician" }),
    );

    const resumable = await store.listByStatus(["pending", "waiting_technician"]);

    expect(resumable.map((record) => record.id)).toEqual([first.id, third.id]);
    expect(await store.listByStatus([])).toEqual([]);
  });

  it("replaces department and technicians on reassignment", async () => {
    const created = await store.create(
      buildNewRecord({ department: null, technicians: [], status: "waiting_technician" }),
    );

    await store.updateAssignment(created.id, "SU", [
      { hubspot_tec_id: "tec-9", property_name: "tecnico_enisa_asignado" },
    ]);

    expect(await store.findByDealId("1001")).toMatchObject({
      department: "SU",
      technicians: [{ hubspot_tec_id: "tec-9", property_name: "tecnico_enisa_asignado" }],
    });
  });
});
