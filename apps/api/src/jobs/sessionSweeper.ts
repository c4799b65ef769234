import cron from "node-cron";
import { getLogger } from "../lib/logger";
import { purgeExpiredSessions } from "../lib/session";

const log = getLogger("sweeper");

export function sweepSessions(now = new Date()) {
  try {
    const removed = purgeExpiredSessions(now);
    if (removed > 0) log.info({ removed }, "expired sessions purged");
    return removed;
  } catch (err) {
    log.error({ err }, "session purge failed");
    return 0;
  }
}

/** Purges expired sessions at the top of every hour. */
export function startSessionSweeper(expression = "0 * * * *") {
  return cron.schedule(expression, () => {
    sweepSessions();
  });
}
