import cors from "cors";
import express, { NextFunction, Request, Response } from "express";

import { AppConfig } from "./config";
import { openDatabase } from "./db";
import { createOnboardingsRouter } from "./routes/onboardings";
import { CycleScheduler } from "./services/cycleScheduler";
import { DealDetector } from "./services/dealDetector";
import { DrizzleOnboardingStore } from "./services/drizzleOnboardingStore";
import { ResendEmailSender } from "./services/emailClient";
import { GoogleAuth } from "./services/googleAuth";
import { GoogleDriveClient } from "./services/googleDriveClient";
import { GoogleSheetsClient } from "./services/googleSheetsClient";
import { HoldedClient } from "./services/holdedClient";
import { HubSpotClient } from "./services/hubspotClient";
import { OnboardingManager } from "./services/onboardingManager";
import { OnboardingStore } from "./services/onboardingStore";
import { PipelineEngine } from "./services/pipelineEngine";
import { PollingCycle } from "./services/pollingCycle";
import { ServiceMapper } from "./services/serviceMapper";
import { SlackClient } from "./services/slackClient";
import { SheetTeamDirectory } from "./services/teamDirectory";
import { buildPipeline } from "./steps/registry";
import { createTimeoutFetch } from "./utils/http";
import { createLogger } from "./utils/log";

const log = createLogger("http");

export type Services = {
  store: OnboardingStore;
  manager: OnboardingManager;
  cycle: PollingCycle;
  scheduler: CycleScheduler;
};

export function createServices(config: AppConfig): Services {
  const fetchImpl = createTimeoutFetch(config.requestTimeoutMs);
  const store = new DrizzleOnboardingStore(openDatabase(config.databasePath));

  const hubspot = new HubSpotClient({
    token: config.hubspot.token,
    pipelineId: config.hubspot.pipelineId,
    wonStageId: config.hubspot.wonStageId,
    fetchImpl,
  });
  const googleAuth = new GoogleAuth({
    clientId: config.google.clientId,
    clientSecret: config.google.clientSecret,
    refreshToken: config.google.refreshToken,
    fetchImpl,
  });
  const directory = new SheetTeamDirectory(
    new GoogleSheetsClient(googleAuth, config.google.spreadsheetId, fetchImpl),
    {
      usersRange: config.google.usersRange,
      servicesRange: config.google.servicesRange,
      ttlMs: config.google.sheetsCacheTtlMs,
    },
  );
  const slack = new SlackClient(config.slack.botToken, fetchImpl);
  const email = new ResendEmailSender(config.email.from, {
    apiKey: config.email.resendApiKey,
    timeoutMs: config.requestTimeoutMs,
  });

  const steps = buildPipeline({
    crm: hubspot,
    drive: new GoogleDriveClient(googleAuth, fetchImpl),
    holded: new HoldedClient(config.holded.apiKey, fetchImpl),
    slack,
    email,
    driveParentFolderId: config.google.driveParentFolderId,
  });

  const manager = new OnboardingManager(
    store,
    new ServiceMapper(directory),
    new PipelineEngine(store),
    slack,
    steps,
    { hubspotPortalId: config.hubspot.portalId },
  );
  const detector = new DealDetector(hubspot, store, {
    lookbackDays: config.dealLookbackDays,
  });
  const cycle = new PollingCycle(detector, manager, store, email, config.email.adminEmail);
  const scheduler = new CycleScheduler(cycle, {
    times: config.schedule.times,
    timeZone: config.schedule.timeZone,
  });

  return { store, manager, cycle, scheduler };
}

export function createApp(services: Pick<Services, "store" | "manager" | "scheduler">) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      timestamp: Date.now(),
      cycle_running: services.scheduler.isRunning,
    });
  });

  app.use(
    "/api",
    createOnboardingsRouter(services.store, services.manager, services.scheduler),
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : "Internal server error";
    log.error("request_failed", { error: message });

    res.status(500).json({
      error: {
        message,
      },
    });
  });

  return app;
}
