import { describe, expect, it } from "vitest";

import { BaseStep, createStepContext, StepContext, StepResult } from "../steps/baseStep";
import { InMemoryOnboardingStore } from "../test-utils/inMemoryOnboardingStore";
import { buildEnrichedDeal, CFO_TECHNICIAN } from "../test-utils/onboardingFixtures";
import { OnboardingRecord, StepName } from "../types/onboarding";
import { PipelineEngine } from "./pipelineEngine";

class ScriptedStep extends BaseStep {
  executions = 0;

  constructor(
    readonly name: StepName,
    private readonly outcome: () => StepResult,
    private readonly alreadyDone: (ctx: StepContext) => boolean = () => false,
  ) {
    super();
  }

  async checkAlreadyDone(ctx: StepContext): Promise<boolean> {
    return this.alreadyDone(ctx);
  }

  async execute(): Promise<StepResult> {
    this.executions += 1;
    return this.outcome();
  }
}

const succeed = () => ({ ok: true as const, skipped: false, data: { done: true } });

async function createRecord(store: InMemoryOnboardingStore): Promise<OnboardingRecord> {
  return store.create({
    deal_id: "deal-1",
    deal_name: "ACME SL - CFO",
    company_name: "ACME SL",
    service_name: "CFO",
    department: "FI",
    hubspot_owner_id: null,
    technicians: [],
    status: "pending",
  });
}

function buildContext(): StepContext {
  return createStepContext(buildEnrichedDeal(), "FI", CFO_TECHNICIAN);
}

describe("PipelineEngine", () => {
  it("writes an in-progress and a terminal record for every step", async () => {
    const store = new InMemoryOnboardingStore();
    const record = await createRecord(store);
    const steps = [
      new ScriptedStep("create_drive_folder", succeed),
      new ScriptedStep("create_holded_contact", succeed),
      new ScriptedStep("notify_slack", succeed),
    ];

    const result = await new PipelineEngine(store).run(record, buildContext(), steps);

    expect(result.status).toBe("completed");
    expect(result.current_step).toBeNull();
    expect(store.stepWrites.map((write) => `${write.step_name}:${write.status}`)).toEqual([
      "create_drive_folder:in_progress",
      "create_drive_folder:completed",
      "create_holded_contact:in_progress",
      "create_holded_contact:completed",
      "notify_slack:in_progress",
      "notify_slack:completed",
    ]);
    expect(store.steps[0]?.result_data).toEqual({ done: true });
    expect(store.records[0]?.status).toBe("completed");
  });

  it("keeps running after a failed step and a throwing step", async () => {
    const store = new InMemoryOnboardingStore();
    const record = await createRecord(store);
    const last = new ScriptedStep("send_email", succeed);
    const steps = [
      new ScriptedStep("create_drive_folder", () => ({ ok: false, error: "quota exceeded" })),
      new ScriptedStep("create_holded_contact", () => {
        throw new Error("socket closed");
      }),
      last,
    ];

    const result = await new PipelineEngine(store).run(record, buildContext(), steps);

    expect(last.executions).toBe(1);
    expect(store.stepWrites).toHaveLength(6);
    expect(store.steps.map((step) => [step.step_name, step.status, step.error_message])).toEqual([
      ["create_drive_folder", "failed", "quota exceeded"],
      ["create_holded_contact", "failed", "Unhandled exception: socket closed"],
      ["send_email", "completed", null],
    ]);
    expect(result.status).toBe("failed");
    expect(store.records[0]?.error_message).toBe(
      "Failed steps: create_drive_folder, create_holded_contact",
    );
  });

  it("records a skipped step without executing it and keeps context fields", async () => {
    const store = new InMemoryOnboardingStore();
    const record = await createRecord(store);
    const ctx = buildContext();
    const step = new ScriptedStep("create_drive_folder", succeed, (context) => {
      context.drive_folder_id = "folder-1";
      return true;
    });

    const result = await new PipelineEngine(store).run(record, ctx, [step]);

    expect(step.executions).toBe(0);
    expect(store.steps[0]).toMatchObject({ status: "skipped", result_data: { skipped: true } });
    expect(ctx.drive_folder_id).toBe("folder-1");
    expect(result.status).toBe("completed");
  });

  it("completes immediately with no steps", async () => {
    const store = new InMemoryOnboardingStore();
    const record = await createRecord(store);

    const result = await new PipelineEngine(store).run(record, buildContext(), []);

    expect(result.status).toBe("completed");
    expect(store.stepWrites).toEqual([]);
  });

  it("stamps start and finish times on the step record", async () => {
    const store = new InMemoryOnboardingStore();
    const record = await createRecord(store);
    const times = [new Date("2026-03-02T10:00:00.000Z"), new Date("2026-03-02T10:00:05.000Z")];
    const engine = new PipelineEngine(store, () => times.shift() ?? new Date("2026-03-02T11:00:00.000Z"));

    await engine.run(record, buildContext(), [new ScriptedStep("notify_slack", succeed)]);

    expect(store.steps[0]).toMatchObject({
      started_at_iso: "2026-03-02T10:00:00.000Z",
      completed_at_iso: "2026-03-02T10:00:05.000Z",
    });
  });
});
