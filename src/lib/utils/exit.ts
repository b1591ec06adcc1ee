import { runCleanup } from "./cleanup";
import { createDebugLog } from "./debug";

const log = createDebugLog("exit");

const underTestRunner = () =>
  Boolean(process.env.VITEST) || process.env.NODE_ENV === "test";

/**
 * Runs registered cleanup (open demo/service servers) and exits with `code`,
 * or with `process.exitCode` when none is given. Under the test runner only
 * the exit code is recorded.
 */
export async function gracefulExit(code?: number): Promise<void> {
  const exitCode = code ?? process.exitCode ?? 0;
  const finalCode = typeof exitCode === "number" ? exitCode : Number(exitCode) || 0;

  await runCleanup();
  log(`cleanup done, exit code ${finalCode}`);

  if (underTestRunner()) {
    process.exitCode = finalCode;
    return;
  }
  process.exit(finalCode);
}
