import { PipelineConfigError } from "./errors.js";

export type PipelineIdentity = {
  qualifiedName: string;
  namespace: string;
  shortName: string;
  version: string;
  minorVersion: string;
};

export function pipelineShortName(qualifiedName: string): string {
  const parts = qualifiedName.split("/");
  if (parts.length !== 2 || parts[0].length === 0 || parts[1].length === 0) {
    throw new PipelineConfigError(
      `Pipeline name "${qualifiedName}" must have the form namespace/name.`,
    );
  }
  return parts[1];
}

/**
 * Drops the last dot-separated component: "1.2.3" -> "1.2". Output and
 * marker paths are keyed on this, so patch releases share one location.
 */
export function minorVersion(version: string): string {
  const lastDot = version.lastIndexOf(".");
  return lastDot === -1 ? version : version.slice(0, lastDot);
}

export function resolvePipelineIdentity(qualifiedName: string, version: string): PipelineIdentity {
  const shortName = pipelineShortName(qualifiedName);
  return {
    qualifiedName,
    namespace: qualifiedName.slice(0, qualifiedName.length - shortName.length - 1),
    shortName,
    version,
    minorVersion: minorVersion(version),
  };
}
