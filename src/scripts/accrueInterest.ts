import "dotenv/config";
import { createLogger } from "../common/logger";
import { config } from "../config";
import { createContainer } from "../di";
import { closePool } from "../infra/postgres/pool";

// One-shot accrual for cron-style deployments; exits non-zero if any account failed.
async function main() {
  const logger = createLogger(config.LOG_LEVEL, "accrue-interest");
  const container = createContainer({ logger });

  try {
    const summary = await container.interestService.accrueDaily();
    process.exitCode = summary.failed > 0 ? 1 : 0;
  } finally {
    container.mutexMap.destroy();
    if (config.REPO_PROVIDER === "postgres") {
      await closePool();
    }
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
