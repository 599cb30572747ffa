// demo/loadgen.ts
import { loadClientOptionsFromEnv } from "../src/config.js";
import { createClient } from "../src/factory.js";
import { logger } from "../src/logger.js";

const ENDPOINT = process.env.ENDPOINT ?? "/flaky";
const TARGET_RPS = Number(process.env.TARGET_RPS ?? 20);
const DURATION_SEC = Number(process.env.DURATION_SEC ?? 10);

const client = createClient({
  ...loadClientOptionsFromEnv(),
  baseUrl: process.env.API_BASE_URL ?? "http://127.0.0.1:3001",
  metrics: true,
});

client.on("breaker:state", (e: { from: string; to: string }) => {
  logger.warn(e, "breaker transition");
});

async function main(): Promise<void> {
  try {
    const result = await client.loadTest(ENDPOINT, { targetRps: TARGET_RPS, durationSec: DURATION_SEC });
    result.print();
    client.printMetrics();
    logger.info(client.snapshot(), "final snapshot");
  } finally {
    await client.close();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, "load generation failed");
  process.exit(1);
});
