import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { AppConfigSchema, type AppConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { logEvent, type EventLogger } from "./logger.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Pass --config <path> pointing at a YAML or JSON config file.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun `seqrun-dispatch validate-config`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Config at ${configPath} is invalid:\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAppConfig(configPath: string): AppConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse config at ${absolutePath}${locationDetail}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [] });

    const parsed = AppConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(details, parsed.error);
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    // Relative directories are resolved against the config file, not the cwd.
    return {
      ...cfg,
      fastq_by_run_dir: path.resolve(configDir, cfg.fastq_by_run_dir),
      analysis_output_dir: path.resolve(configDir, cfg.analysis_output_dir),
      analysis_work_dir: path.resolve(configDir, cfg.analysis_work_dir),
      executor: {
        ...cfg.executor,
        cache_dir: path.resolve(configDir, cfg.executor.cache_dir),
      },
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

/**
 * Reloads the config for a new scan cycle. Any load failure is reported and
 * the previous config is returned instead; with no previous config the
 * failure is rethrown.
 */
export function reloadAppConfig(
  configPath: string,
  lastGood: AppConfig | null,
  logger: EventLogger,
): AppConfig {
  const absolutePath = path.resolve(configPath);
  logEvent(logger, "debug", "load_config_start", { config_file: absolutePath });

  try {
    return loadAppConfig(absolutePath);
  } catch (err) {
    if (!lastGood) {
      throw err;
    }

    logEvent(logger, "error", "load_config_failed", {
      config_file: absolutePath,
      error: formatErrorMessage(err),
      using_last_good_config: true,
    });
    return lastGood;
  }
}
