import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError, PolicyDeniedError } from "../core/errors.js";
import { RUNNER_KINDS, type RunnerKind, type RunTarget } from "../core/testRun.js";
import { safeJoin } from "../execution/workspace.js";

// option name -> whether it takes a value
const zOptionTable = z.record(z.string().regex(/^--?[A-Za-z0-9]/), z.boolean());

const zPolicyConfig = z.object({
  version: z.number(),
  tool_allowlist: z.array(z.string()),
  projects: z.object({
    root_allowlist: z.array(z.string()),
    deny_symlinks: z.boolean().optional()
  }),
  runners: z.object({
    allowlist: z.array(z.enum(RUNNER_KINDS)),
    python: z.string().min(1).optional(),
    extra_args: z
      .object({
        pytest: zOptionTable.optional(),
        unittest: zOptionTable.optional(),
        nose2: zOptionTable.optional()
      })
      .optional()
  }),
  defaults: z
    .object({
      max_tokens: z.number().int().positive().optional(),
      timeout_seconds: z.number().positive().optional(),
      container_image: z.string().min(1).optional()
    })
    .optional(),
  quotas: z.object({
    min_tokens: z.number().int().positive().optional(),
    max_tokens: z.number().int().positive(),
    max_timeout_seconds: z.number().positive(),
    kill_grace_seconds: z.number().nonnegative().optional()
  }),
  container: z
    .object({
      network_mode: z.enum(["none", "bridge"]).optional(),
      image_allowlist: z.array(z.string()),
      setup_command: z.string().nullable().optional(),
      env: z.record(z.string(), z.string()).optional(),
      fallback_to_local: z.boolean().optional()
    })
    .optional()
});

export type PolicyConfig = z.infer<typeof zPolicyConfig>;

export const MIN_TOKEN_FLOOR = 50;
const DEFAULT_MAX_TOKENS = 4000;
const DEFAULT_TIMEOUT_SECONDS = 300;
const DEFAULT_CONTAINER_IMAGE = "python:3.11-slim";

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed);
  const m2 = m1 ? null : /^\$([A-Z0-9_]+)$/.exec(trimmed);
  const varName = m1?.[1] ?? m2?.[1];
  if (m1 || m2) {
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

function expandPolicyEnv(policy: PolicyConfig): PolicyConfig {
  const roots = policy.projects.root_allowlist
    .map((p) => expandEnvToken(p))
    .filter((p): p is string => typeof p === "string" && p.trim().length > 0);

  return {
    ...policy,
    projects: {
      ...policy.projects,
      root_allowlist: roots
    }
  };
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (value && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

async function realpathOrNull(p: string): Promise<string | null> {
  try {
    return await fs.realpath(p);
  } catch {
    return null;
  }
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(private readonly policy: PolicyConfig) {
    this.policyHash = `sha256:${createHash("sha256").update(stableStringify(policy)).digest("hex")}`;
  }

  static fromConfig(value: unknown, source = "policy"): PolicyEngine {
    const parsed = zPolicyConfig.safeParse(value);
    if (!parsed.success) {
      throw new ConfigurationError(`invalid ${source}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    }
    return new PolicyEngine(expandPolicyEnv(parsed.data));
  }

  static async loadFromFile(filePath: string): Promise<PolicyEngine> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed: unknown = YAML.parse(raw);
    return PolicyEngine.fromConfig(parsed, `policy at ${filePath}`);
  }

  snapshot(): PolicyConfig {
    return structuredClone(this.policy);
  }

  assertToolAllowed(toolName: string): void {
    if (!this.policy.tool_allowlist.includes(toolName)) {
      throw new PolicyDeniedError(`policy denied tool: ${toolName}`);
    }
  }

  assertRunnerAllowed(runner: RunnerKind): void {
    if (!this.policy.runners.allowlist.includes(runner)) {
      throw new PolicyDeniedError(`policy denied runner: ${runner}`);
    }
  }

  /**
   * Only options listed under runners.extra_args for this runner pass. A value
   * is taken from the next argument or from `--name=value`.
   */
  enforceAdditionalArgs(runner: RunnerKind, args: readonly string[]): string[] {
    if (!args.length) return [];
    const table = this.policy.runners.extra_args?.[runner] ?? {};
    const out: string[] = [];
    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? "";
      const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
      const name = eq > 0 ? arg.slice(0, eq) : arg;
      if (!Object.hasOwn(table, name)) {
        throw new PolicyDeniedError(`policy denied ${runner} argument: ${arg}`);
      }
      out.push(arg);
      const takesValue = table[name] === true;
      if (takesValue && eq < 0) {
        const value = args[i + 1];
        if (value === undefined) throw new ConfigurationError(`${runner} argument ${name} needs a value`);
        out.push(value);
        i++;
      } else if (!takesValue && eq > 0) {
        throw new ConfigurationError(`${runner} argument ${name} takes no value`);
      }
    }
    return out;
  }

  pythonExecutable(): string {
    return this.policy.runners.python ?? "python3";
  }

  killGraceMs(): number {
    return Math.round((this.policy.quotas.kill_grace_seconds ?? 5) * 1000);
  }

  enforceMaxTokens(requested: number | undefined): number {
    const floor = Math.max(MIN_TOKEN_FLOOR, this.policy.quotas.min_tokens ?? MIN_TOKEN_FLOOR);
    const value = requested ?? this.policy.defaults?.max_tokens ?? DEFAULT_MAX_TOKENS;
    if (!Number.isInteger(value) || value < floor) {
      throw new ConfigurationError(`max_tokens must be an integer >= ${floor}`);
    }
    const max = this.policy.quotas.max_tokens;
    if (value > max) {
      throw new PolicyDeniedError(`policy denied max_tokens=${value} (max ${max})`);
    }
    return value;
  }

  enforceTimeoutSeconds(requested: number | undefined): number {
    const value = requested ?? this.policy.defaults?.timeout_seconds ?? DEFAULT_TIMEOUT_SECONDS;
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`timeout_seconds must be > 0`);
    }
    const max = this.policy.quotas.max_timeout_seconds;
    if (value > max) {
      throw new PolicyDeniedError(`policy denied timeout_seconds=${value} (max ${max})`);
    }
    return value;
  }

  containerImage(requested: string | null | undefined): string {
    const image = requested ?? this.policy.defaults?.container_image ?? DEFAULT_CONTAINER_IMAGE;
    const allowlist = this.policy.container?.image_allowlist ?? [];
    if (!allowlist.length) {
      throw new PolicyDeniedError(`policy denied container image (no allowlist configured): ${image}`);
    }
    if (!allowlist.includes(image)) {
      throw new PolicyDeniedError(`policy denied container image: ${image}`);
    }
    return image;
  }

  containerNetworkMode(): "none" | "bridge" {
    return this.policy.container?.network_mode ?? "none";
  }

  containerSetupCommand(): string | null {
    const cmd = this.policy.container?.setup_command?.trim();
    return cmd ? cmd : null;
  }

  containerEnv(): Record<string, string> {
    return { ...(this.policy.container?.env ?? {}) };
  }

  containerFallbackToLocal(): boolean {
    return this.policy.container?.fallback_to_local ?? false;
  }

  /** Real path of an allowed project directory. */
  async resolveProjectPath(projectPath: string): Promise<string> {
    if (!path.isAbsolute(projectPath)) {
      throw new ConfigurationError(`project_path must be absolute: ${projectPath}`);
    }
    const resolved = path.resolve(projectPath);
    const real = await realpathOrNull(resolved);
    if (!real) {
      throw new ConfigurationError(`project_path does not exist: ${resolved}`);
    }

    const denySymlinks = this.policy.projects.deny_symlinks ?? true;
    if (denySymlinks && real !== resolved) {
      throw new PolicyDeniedError(`policy denied symlinked project_path: ${resolved}`);
    }

    const allow = await Promise.all(
      this.policy.projects.root_allowlist.map(async (prefix) => {
        const resolvedPrefix = path.resolve(prefix);
        const realPrefix = (await realpathOrNull(resolvedPrefix)) ?? resolvedPrefix;
        return real === realPrefix || real.startsWith(realPrefix + path.sep);
      })
    );

    if (!allow.some(Boolean)) {
      throw new PolicyDeniedError(`policy denied project_path outside allowlist: ${real}`);
    }

    const st = await fs.stat(real);
    if (!st.isDirectory()) {
      throw new ConfigurationError(`project_path is not a directory: ${real}`);
    }

    return real;
  }

  /**
   * Resolves test_path (optionally "file.py::node::id") inside a resolved
   * project. An empty test_path targets the whole project.
   */
  async resolveTestTarget(projectReal: string, testPath: string): Promise<RunTarget> {
    const trimmed = testPath.trim();
    if (!trimmed) return { kind: "project" };

    const [filePart = ""] = trimmed.split("::");
    if (!filePart || path.isAbsolute(filePart)) {
      throw new ConfigurationError(`test_path must be relative to project_path: ${testPath}`);
    }

    let joined: string;
    try {
      joined = safeJoin(projectReal, filePart);
    } catch {
      throw new ConfigurationError(`test_path escapes project_path: ${testPath}`);
    }

    const real = await realpathOrNull(joined);
    if (!real) {
      throw new ConfigurationError(`test_path does not exist: ${filePart}`);
    }
    if (real !== projectReal && !real.startsWith(projectReal + path.sep)) {
      throw new PolicyDeniedError(`policy denied test_path outside project: ${testPath}`);
    }

    const st = await fs.stat(real);
    if (st.isDirectory() && trimmed.includes("::")) {
      throw new ConfigurationError(`test_path node id requires a file: ${testPath}`);
    }
    const relative = path.relative(projectReal, joined) || ".";
    const suffix = trimmed.slice(filePart.length);
    return { kind: "path", path: `${relative.split(path.sep).join("/")}${suffix}`, directory: st.isDirectory() };
  }
}
