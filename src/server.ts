import "dotenv/config";

import { createApp, createServices } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./utils/log";

const log = createLogger("server");

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

app.listen(config.port, () => {
  services.scheduler.start();

  log.info("server_started", {
    port: config.port,
    health_url: `http://localhost:${config.port}/health`,
    onboardings_url: `http://localhost:${config.port}/api/onboardings`,
    onboarding_detail_url: `http://localhost:${config.port}/api/onboardings/:dealId`,
    retry_url: `http://localhost:${config.port}/api/onboardings/:dealId/retry`,
    cycles_url: `http://localhost:${config.port}/api/cycles`,
    poll_times: config.schedule.times,
    poll_time_zone: config.schedule.timeZone,
  });
});
