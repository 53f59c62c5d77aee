/**
 * Process-wide switches, read from BCASTIR_* environment variables.
 *
 * Every switch can be overridden per call through PipelineOptions.
 */

export type BcastirConfig = {
  /** Passes log through debugLog(). */
  debug: boolean;
  /** Re-verify the IR after every pass. */
  verifyEach: boolean;
  enableCSE: boolean;
  enableDCE: boolean;
};

type Env = Record<string, string | undefined>;

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  return raw !== "0" && raw.toLowerCase() !== "false";
}

export function readConfig(env: Env): BcastirConfig {
  return {
    debug: flag(env, "BCASTIR_DEBUG", false),
    verifyEach: flag(env, "BCASTIR_VERIFY_EACH", true),
    enableCSE: flag(env, "BCASTIR_CSE", true),
    enableDCE: flag(env, "BCASTIR_DCE", true),
  };
}

export const config: BcastirConfig = readConfig(
  typeof process !== "undefined" ? process.env : {},
);
