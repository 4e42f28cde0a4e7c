import { describe, expect, it } from "vitest";

import { BaseStep, StepContext, StepResult } from "../steps/baseStep";
import { FakeChatClient, FakeTeamDirectory } from "../test-utils/fakes";
import { InMemoryOnboardingStore } from "../test-utils/inMemoryOnboardingStore";
import {
  buildEnrichedDeal,
  CFO_TECHNICIAN,
  LEGAL_RESPONSIBLE,
  SERVICES,
  TEAM,
} from "../test-utils/onboardingFixtures";
import { OnboardingNotFoundError } from "./onboardingStore";
import {
  departmentTechnicians,
  OnboardingManager,
  OnboardingStateError,
} from "./onboardingManager";
import { PipelineEngine } from "./pipelineEngine";
import { ServiceMapper } from "./serviceMapper";

class RecordingStep extends BaseStep {
  readonly name = "notify_slack" as const;

  readonly contexts: StepContext[] = [];

  async execute(ctx: StepContext): Promise<StepResult> {
    this.contexts.push(ctx);
    return { ok: true, skipped: false, data: {} };
  }
}

function createManager(store = new InMemoryOnboardingStore()) {
  const slack = new FakeChatClient();
  const step = new RecordingStep();
  const manager = new OnboardingManager(
    store,
    new ServiceMapper(new FakeTeamDirectory(TEAM, SERVICES)),
    new PipelineEngine(store),
    slack,
    [step],
    { hubspotPortalId: "12345" },
  );
  return { manager, store, slack, step };
}

describe("departmentTechnicians", () => {
  it("keeps only candidates from the department's properties", () => {
    const technicians = [
      { hubspot_tec_id: "tec-1", property_name: "tecnico_enisa_asignado" },
      { hubspot_tec_id: "tec-2", property_name: "cfo_asignado_ii" },
    ];

    expect(departmentTechnicians(technicians, "FI")).toEqual([technicians[1]]);
    expect(departmentTechnicians(technicians, "LE")).toEqual([]);
  });

  it("keeps the first property when one technician fills two of them", () => {
    const technicians = [
      { hubspot_tec_id: "tec-100", property_name: "cfo_asignado" },
      { hubspot_tec_id: "tec-100", property_name: "cfo_asignado_ii" },
    ];

    expect(departmentTechnicians(technicians, "FI")).toEqual([
      { hubspot_tec_id: "tec-100", property_name: "cfo_asignado" },
    ]);
  });
});

describe("OnboardingManager", () => {
  it("creates the record and runs the pipeline with the resolved technician", async () => {
    const { manager, store, step } = createManager();

    const record = await manager.processDeal(buildEnrichedDeal());

    expect(record.status).toBe("completed");
    expect(store.records[0]).toMatchObject({
      deal_id: "deal-1",
      department: "FI",
      technicians: [{ hubspot_tec_id: "tec-100", property_name: "cfo_asignado" }],
    });
    expect(step.contexts[0]?.technician).toEqual(CFO_TECHNICIAN);
    expect(step.contexts[0]?.hubspot_portal_id).toBe("12345");
  });

  it("returns a completed record untouched", async () => {
    const { manager, store, step } = createManager();
    await manager.processDeal(buildEnrichedDeal());

    const again = await manager.processDeal(buildEnrichedDeal());

    expect(again.status).toBe("completed");
    expect(step.contexts).toHaveLength(1);
    expect(store.stepWrites).toHaveLength(2);
  });

  it("marks the record failed when the service is unknown", async () => {
    const { manager, store, step } = createManager();

    const record = await manager.processDeal(
      buildEnrichedDeal({ service_name: "Servicio inventado" }),
    );

    expect(record.status).toBe("failed");
    expect(record.error_message).toBe(
      'Service not found in the service directory: "Servicio inventado".',
    );
    expect(store.records[0]?.department).toBeNull();
    expect(step.contexts).toEqual([]);
  });

  it("marks the record failed when the service has no department", async () => {
    const { manager } = createManager();

    const record = await manager.processDeal(
      buildEnrichedDeal({ service_name: "Servicio huérfano" }),
    );

    expect(record.error_message).toBe('Service has no department assigned: "Servicio huérfano".');
  });

  it("waits for a technician and tells the department responsible", async () => {
    const { manager, slack, store, step } = createManager();

    const record = await manager.processDeal(buildEnrichedDeal({ technicians: [] }));

    expect(record.status).toBe("waiting_technician");
    expect(store.records[0]?.department).toBe("FI");
    expect(step.contexts).toEqual([]);
    expect(slack.messages).toHaveLength(1);
    expect(slack.messages[0]?.userId).toBe("U-CFO-LEAD");
    expect(slack.messages[0]?.text).toContain("Department: *CFO*");
  });

  it("waits when the candidate is missing from the directory", async () => {
    const { manager } = createManager();

    const record = await manager.processDeal(
      buildEnrichedDeal({
        technicians: [{ hubspot_tec_id: "tec-unknown", property_name: "cfo_asignado" }],
      }),
    );

    expect(record.status).toBe("waiting_technician");
  });

  it("still records the waiting state when the chat notice fails", async () => {
    const { manager, slack } = createManager();
    slack.failWith = new Error("channel_not_found");

    const record = await manager.processDeal(buildEnrichedDeal({ technicians: [] }));

    expect(record.status).toBe("waiting_technician");
  });

  it("staffs departments without technician properties with their responsible", async () => {
    const { manager, step } = createManager();

    await manager.processDeal(
      buildEnrichedDeal({
        deal_name: "ACME SL - Contrato marco",
        service_name: "Contrato marco",
      }),
    );

    expect(step.contexts[0]?.technician).toEqual(LEGAL_RESPONSIBLE);
    expect(step.contexts[0]?.department).toBe("LE");
  });

  it("runs a waiting record once a technician appears", async () => {
    const { manager, store } = createManager();
    await manager.processDeal(buildEnrichedDeal({ technicians: [] }));

    const record = await manager.processDeal(buildEnrichedDeal());

    expect(record.status).toBe("completed");
    expect(store.records).toHaveLength(1);
    expect(store.records[0]?.technicians).toEqual([
      { hubspot_tec_id: "tec-100", property_name: "cfo_asignado" },
    ]);
  });

  it("moves only failed records back to pending", async () => {
    const { manager, store } = createManager();
    await manager.processDeal(buildEnrichedDeal({ service_name: "Servicio inventado" }));
    await manager.processDeal(buildEnrichedDeal({ deal_id: "deal-2" }));

    const reset = await manager.resetForRetry("deal-1");

    expect(reset.status).toBe("pending");
    expect(store.records[0]).toMatchObject({ status: "pending", error_message: null });
    await expect(manager.resetForRetry("deal-2")).rejects.toBeInstanceOf(OnboardingStateError);
    await expect(manager.resetForRetry("deal-404")).rejects.toBeInstanceOf(
      OnboardingNotFoundError,
    );
  });
});
