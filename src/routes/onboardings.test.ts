import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { createApp } from "../app";
import { CycleScheduler } from "../services/cycleScheduler";
import { OnboardingManager } from "../services/onboardingManager";
import { PipelineEngine } from "../services/pipelineEngine";
import { CycleSummary } from "../services/pollingCycle";
import { ServiceMapper } from "../services/serviceMapper";
import { FakeChatClient, FakeTeamDirectory } from "../test-utils/fakes";
import { InMemoryOnboardingStore } from "../test-utils/inMemoryOnboardingStore";
import { SERVICES, TEAM } from "../test-utils/onboardingFixtures";
import { OnboardingStatus } from "../types/onboarding";

class StubCycle {
  runs = 0;

  failure: Error | null = null;

  async run(): Promise<CycleSummary> {
    this.runs += 1;
    if (this.failure) {
      throw this.failure;
    }
    return { new_deals: 2, retried: 1, failed: 0 };
  }

  async notifyCriticalError(): Promise<void> {}
}

describe("onboardings routes", () => {
  let store: InMemoryOnboardingStore;
  let cycle: StubCycle;
  let app: ReturnType<typeof createApp>;

  async function seed(dealId: string, status: OnboardingStatus) {
    return store.create({
      deal_id: dealId,
      deal_name: `Company ${dealId} - CFO`,
      company_name: `Company ${dealId}`,
      service_name: "CFO",
      department: "FI",
      hubspot_owner_id: null,
      technicians: [],
      status,
    });
  }

  beforeEach(() => {
    store = new InMemoryOnboardingStore();
    cycle = new StubCycle();
    const manager = new OnboardingManager(
      store,
      new ServiceMapper(new FakeTeamDirectory(TEAM, SERVICES)),
      new PipelineEngine(store),
      new FakeChatClient(),
      [],
    );
    const scheduler = new CycleScheduler(cycle, { times: ["10:00"], timeZone: "UTC" });
    app = createApp({ store, manager, scheduler });
  });

  it("reports health", async () => {
    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: "ok", cycle_running: false });
  });

  it("lists onboardings, optionally by status", async () => {
    await seed("1", "failed");
    await seed("2", "completed");

    const all = await request(app).get("/api/onboardings");
    const failed = await request(app).get("/api/onboardings?status=failed");

    expect(all.body.onboardings.map((record: { deal_id: string }) => record.deal_id)).toEqual([
      "2",
      "1",
    ]);
    expect(failed.body.onboardings).toHaveLength(1);
    expect(failed.body.onboardings[0].deal_id).toBe("1");
  });

  it("rejects an unknown status filter", async () => {
    const response = await request(app).get("/api/onboardings?status=lost");

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe(
      "status must be one of: pending, waiting_technician, in_progress, completed, failed.",
    );
  });

  it("returns one onboarding with its steps", async () => {
    const record = await seed("7", "failed");
    await store.upsertStep({
      onboarding_id: record.id,
      step_name: "notify_slack",
      status: "failed",
      result_data: null,
      error_message: "no slack id",
      started_at_iso: null,
      completed_at_iso: null,
    });

    const response = await request(app).get("/api/onboardings/7");

    expect(response.status).toBe(200);
    expect(response.body.onboarding.deal_id).toBe("7");
    expect(response.body.steps).toEqual([
      {
        onboarding_id: record.id,
        step_name: "notify_slack",
        status: "failed",
        result_data: null,
        error_message: "no slack id",
        started_at_iso: null,
        completed_at_iso: null,
      },
    ]);
  });

  it("returns 404 for an unknown deal", async () => {
    const response = await request(app).get("/api/onboardings/404");

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe("Onboarding not found.");
  });

  it("resets a failed onboarding and refuses other states", async () => {
    await seed("1", "failed");
    await seed("2", "completed");

    const reset = await request(app).post("/api/onboardings/1/retry");
    const conflict = await request(app).post("/api/onboardings/2/retry");
    const missing = await request(app).post("/api/onboardings/3/retry");

    expect(reset.status).toBe(200);
    expect(reset.body.onboarding.status).toBe("pending");
    expect(conflict.status).toBe(409);
    expect(missing.status).toBe(404);
  });

  it("runs a cycle on demand", async () => {
    const response = await request(app).post("/api/cycles");

    expect(response.status).toBe(200);
    expect(response.body.summary).toEqual({ new_deals: 2, retried: 1, failed: 0 });
    expect(cycle.runs).toBe(1);
  });

  it("reports a failing cycle as a server error", async () => {
    cycle.failure = new Error("HubSpot 401");

    const response = await request(app).post("/api/cycles");

    expect(response.status).toBe(500);
    expect(response.body.error.message).toBe("HubSpot 401");
  });
});
