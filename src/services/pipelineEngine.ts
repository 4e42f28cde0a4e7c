import { OnboardingRecord, StepName, StepRecord } from "../types/onboarding";
import { createLogger, describeError } from "../utils/log";
import { BaseStep, StepContext, StepResult } from "../steps/baseStep";
import { OnboardingStore } from "./onboardingStore";

const log = createLogger("engine");

/**
 * Runs steps in order against one persisted record. A failed or throwing
 * step is recorded and the next step still runs; the record ends FAILED if
 * any step failed and COMPLETED otherwise.
 */
export class PipelineEngine {
  constructor(
    private readonly store: Pick<OnboardingStore, "updateStatus" | "upsertStep">,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(
    record: OnboardingRecord,
    ctx: StepContext,
    steps: readonly BaseStep[],
  ): Promise<OnboardingRecord> {
    const runLog = log.child({ onboarding_id: record.id, deal_id: record.deal_id });
    runLog.info("pipeline_started", { steps_count: steps.length });

    await this.store.updateStatus(record.id, "in_progress");
    const failedSteps: StepName[] = [];

    for (const step of steps) {
      const stepLog = runLog.child({ step: step.name });
      const startedAt = this.now().toISOString();

      await this.store.upsertStep({
        onboarding_id: record.id,
        step_name: step.name,
        status: "in_progress",
        result_data: null,
        error_message: null,
        started_at_iso: startedAt,
        completed_at_iso: null,
      });
      await this.store.updateStatus(record.id, "in_progress", { currentStep: step.name });
      stepLog.info("step_started");

      let result: StepResult;
      try {
        result = await step.run(ctx);
      } catch (error) {
        stepLog.error("step_exception", { error: describeError(error) });
        result = { ok: false, error: `Unhandled exception: ${describeError(error)}` };
      }

      const finished: StepRecord = {
        onboarding_id: record.id,
        step_name: step.name,
        status: "completed",
        result_data: null,
        error_message: null,
        started_at_iso: startedAt,
        completed_at_iso: this.now().toISOString(),
      };

      if (!result.ok) {
        finished.status = "failed";
        finished.error_message = result.error;
        failedSteps.push(step.name);
        stepLog.warn("step_failed", { error: result.error });
      } else if (result.skipped) {
        finished.status = "skipped";
        finished.result_data = result.data;
        stepLog.info("step_skipped");
      } else {
        finished.result_data = result.data;
        stepLog.info("step_completed", { data: result.data });
      }

      await this.store.upsertStep(finished);
    }

    const finalStatus = failedSteps.length > 0 ? "failed" : "completed";
    const errorMessage =
      failedSteps.length > 0 ? `Failed steps: ${failedSteps.join(", ")}` : null;

    await this.store.updateStatus(record.id, finalStatus, { currentStep: null, errorMessage });

    if (finalStatus === "failed") {
      runLog.warn("pipeline_completed_with_failures", { failed_steps: failedSteps });
    } else {
      runLog.info("pipeline_completed_successfully");
    }

    return {
      ...record,
      status: finalStatus,
      current_step: null,
      error_message: errorMessage,
      updated_at_iso: this.now().toISOString(),
    };
  }
}
