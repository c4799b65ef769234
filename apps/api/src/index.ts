import { createApp } from "./app";
import { env, isProduction } from "./lib/env";
import { logger } from "./lib/logger";
import { startSessionSweeper } from "./jobs/sessionSweeper";

const app = createApp();

if (isProduction) startSessionSweeper();

app.listen(env.PORT, () => logger.info(`Listening :${env.PORT}`));
