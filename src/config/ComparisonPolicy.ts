import { COMPARISON_DEFAULTS, REPORT_DEFAULTS } from "./constants";

export interface ComparisonPolicy {
  /** Max versions fetched + extracted at once */
  concurrency: number;
  /** Whole-call budget; 0 disables the timeout */
  timeoutMs: number;
  /** Attempts per object fetch (transient failures only) */
  fetchAttempts: number;
  fetchInitialDelayMs: number;
  maxLinesPerSection: number;
}

export const DEFAULT_COMPARISON_POLICY: ComparisonPolicy = {
  concurrency: COMPARISON_DEFAULTS.CONCURRENCY,
  timeoutMs: COMPARISON_DEFAULTS.TIMEOUT_MS,
  fetchAttempts: COMPARISON_DEFAULTS.FETCH_ATTEMPTS,
  fetchInitialDelayMs: COMPARISON_DEFAULTS.FETCH_INITIAL_DELAY_MS,
  maxLinesPerSection: REPORT_DEFAULTS.MAX_LINES_PER_SECTION,
};

const ENV_KEYS: Record<Exclude<keyof ComparisonPolicy, "fetchInitialDelayMs">, string> = {
  concurrency: "VERSION_COMPARE_CONCURRENCY",
  timeoutMs: "VERSION_COMPARE_TIMEOUT_MS",
  fetchAttempts: "VERSION_COMPARE_FETCH_ATTEMPTS",
  maxLinesPerSection: "VERSION_COMPARE_MAX_REPORT_LINES",
};

function readInt(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) return undefined;
  return value;
}

/**
 * Defaults, then environment, then explicit overrides.
 * Malformed environment values are ignored.
 */
export function resolveComparisonPolicy(
  overrides: Partial<ComparisonPolicy> = {},
  env: NodeJS.ProcessEnv = process.env
): ComparisonPolicy {
  const fromEnv: Partial<ComparisonPolicy> = {};

  const concurrency = readInt(env, ENV_KEYS.concurrency, 1);
  if (concurrency !== undefined) fromEnv.concurrency = concurrency;

  const timeoutMs = readInt(env, ENV_KEYS.timeoutMs, 0);
  if (timeoutMs !== undefined) fromEnv.timeoutMs = timeoutMs;

  const fetchAttempts = readInt(env, ENV_KEYS.fetchAttempts, 1);
  if (fetchAttempts !== undefined) fromEnv.fetchAttempts = fetchAttempts;

  const maxLines = readInt(env, ENV_KEYS.maxLinesPerSection, 1);
  if (maxLines !== undefined) fromEnv.maxLinesPerSection = maxLines;

  return { ...DEFAULT_COMPARISON_POLICY, ...fromEnv, ...stripUndefined(overrides) };
}

function stripUndefined(policy: Partial<ComparisonPolicy>): Partial<ComparisonPolicy> {
  const out: Partial<ComparisonPolicy> = {};
  if (policy.concurrency !== undefined) out.concurrency = policy.concurrency;
  if (policy.timeoutMs !== undefined) out.timeoutMs = policy.timeoutMs;
  if (policy.fetchAttempts !== undefined) out.fetchAttempts = policy.fetchAttempts;
  if (policy.fetchInitialDelayMs !== undefined) out.fetchInitialDelayMs = policy.fetchInitialDelayMs;
  if (policy.maxLinesPerSection !== undefined) out.maxLinesPerSection = policy.maxLinesPerSection;
  return out;
}
