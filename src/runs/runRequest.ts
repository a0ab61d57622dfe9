import { ConfigurationError } from "../core/errors.js";
import { EXECUTION_MODES, RUNNER_KINDS, type RunRequest, type RunRequestInput } from "../core/testRun.js";
import type { PolicyEngine } from "../policy/policy.js";

/**
 * Validates a request against the policy and fills in defaults. Throws
 * ConfigurationError (or PolicyDeniedError) before anything runs.
 */
export async function normalizeRunRequest(input: RunRequestInput, policy: PolicyEngine): Promise<RunRequest> {
  if (!RUNNER_KINDS.includes(input.runner)) {
    throw new ConfigurationError(`unknown runner: ${String(input.runner)}`);
  }
  policy.assertRunnerAllowed(input.runner);

  const mode = input.mode ?? "local";
  if (!EXECUTION_MODES.includes(mode)) {
    throw new ConfigurationError(`unknown mode: ${String(mode)}`);
  }

  const maxFailures = input.maxFailures ?? null;
  if (maxFailures !== null && (!Number.isInteger(maxFailures) || maxFailures < 1)) {
    throw new ConfigurationError(`max_failures must be an integer >= 1`);
  }

  const projectPath = await policy.resolveProjectPath(input.projectPath);
  const testPath = (input.testPath ?? "").trim();
  // validated here so a bad test_path fails before a record exists
  await policy.resolveTestTarget(projectPath, testPath);

  return {
    projectPath,
    testPath,
    runner: input.runner,
    mode,
    containerImage: mode === "container" ? policy.containerImage(input.containerImage) : null,
    maxTokens: policy.enforceMaxTokens(input.maxTokens),
    maxFailures,
    runLastFailed: input.runLastFailed ?? false,
    timeoutSeconds: policy.enforceTimeoutSeconds(input.timeoutSeconds),
    additionalArgs: policy.enforceAdditionalArgs(input.runner, input.additionalArgs ?? [])
  };
}
