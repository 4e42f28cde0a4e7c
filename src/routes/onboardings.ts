import express, { Request, Response } from "express";

import { CycleAlreadyRunningError, CycleScheduler } from "../services/cycleScheduler";
import { OnboardingManager, OnboardingStateError } from "../services/onboardingManager";
import { OnboardingNotFoundError, OnboardingStore } from "../services/onboardingStore";
import { isOnboardingStatus, ONBOARDING_STATUSES } from "../types/onboarding";

function sendError(res: Response, status: number, message: string): void {
  res.status(status).json({
    error: {
      message,
    },
  });
}

function internalErrorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

export function createOnboardingsRouter(
  store: Pick<OnboardingStore, "list" | "listByStatus" | "findByDealId" | "listSteps">,
  manager: Pick<OnboardingManager, "resetForRetry">,
  scheduler: Pick<CycleScheduler, "runNow">,
) {
  const router = express.Router();

  router.get("/onboardings", async (req: Request, res: Response) => {
    const status = req.query.status;

    if (status !== undefined && (typeof status !== "string" || !isOnboardingStatus(status))) {
      sendError(res, 400, `status must be one of: ${ONBOARDING_STATUSES.join(", ")}.`);
      return;
    }

    try {
      const onboardings = status ? await store.listByStatus([status]) : await store.list();
      res.json({ onboardings });
    } catch (error) {
      sendError(res, 500, internalErrorMessage(error, "Failed to list onboardings."));
    }
  });

  router.get("/onboardings/:dealId", async (req: Request, res: Response) => {
    try {
      const onboarding = await store.findByDealId(req.params.dealId);
      if (!onboarding) {
        sendError(res, 404, "Onboarding not found.");
        return;
      }

      const steps = await store.listSteps(onboarding.id);
      res.json({ onboarding, steps });
    } catch (error) {
      sendError(res, 500, internalErrorMessage(error, "Failed to load onboarding."));
    }
  });

  router.post("/onboardings/:dealId/retry", async (req: Request, res: Response) => {
    try {
      const onboarding = await manager.resetForRetry(req.params.dealId);
      res.json({ onboarding });
    } catch (error) {
      if (error instanceof OnboardingNotFoundError) {
        sendError(res, 404, error.message);
        return;
      }
      if (error instanceof OnboardingStateError) {
        sendError(res, 409, error.message);
        return;
      }
      sendError(res, 500, internalErrorMessage(error, "Failed to reset onboarding."));
    }
  });

  router.post("/cycles", async (_req: Request, res: Response) => {
    try {
      const summary = await scheduler.runNow();
      res.json({ summary });
    } catch (error) {
      if (error instanceof CycleAlreadyRunningError) {
        sendError(res, 409, error.message);
        return;
      }
      sendError(res, 500, internalErrorMessage(error, "Polling cycle failed."));
    }
  });

  return router;
}
