// worldcore/utils/runtimeEnv.ts

/** True when running under `node --test` (or when a test harness says so). */
export function isNodeTestRuntime(): boolean {
  return (
    process.execArgv.includes("--test") ||
    process.argv.includes("--test") ||
    process.env.NODE_TEST_CONTEXT !== undefined ||
    process.env.NODE_ENV === "test" ||
    process.env.WORLDCORE_TEST === "1"
  );
}
