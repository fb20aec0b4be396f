import { stat } from "node:fs/promises";
import path from "node:path";

import type { StructuredLogger } from "../../logger.js";
import type { ToolResult } from "../types.js";

/** Where the file tools may operate. */
export interface ProjectAccessConfig {
  /** Base directory holding one sub-directory per project. */
  readonly projectDir: string | null;
  /** Regular expression a project name must match in full. */
  readonly projectFilter: string | null;
}

export type ProjectResolution =
  | { readonly ok: true; readonly baseDir: string; readonly projectDir: string }
  | { readonly ok: false; readonly error: string };

/** Serialises a status payload as the single text item of a tool result. */
export function statusResult(payload: Record<string, unknown>): ToolResult {
  return [{ type: "text", text: JSON.stringify(payload) }];
}

export function failedResult(error: string): ToolResult {
  return statusResult({ status: "failed", error });
}

/** `true` when `candidate` equals `root` or lives below it. */
export function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves `projectName` to its directory after checking the base directory,
 * the project filter and traversal out of the base directory.
 */
export async function resolveProject(
  config: ProjectAccessConfig,
  projectName: string,
  logger: StructuredLogger,
): Promise<ProjectResolution> {
  if (!config.projectDir || config.projectDir.trim().length === 0) {
    logger.error("project_dir_missing", { project: projectName });
    return { ok: false, error: "Project base directory is not configured" };
  }
  const baseDir = path.resolve(config.projectDir);
  if (!(await pathExists(baseDir))) {
    logger.error("project_dir_not_found", { base_dir: baseDir });
    return { ok: false, error: `Project base directory does not exist: ${baseDir}` };
  }

  if (config.projectFilter && config.projectFilter.trim().length > 0) {
    let filter: RegExp;
    try {
      filter = new RegExp(`^(?:${config.projectFilter})$`);
    } catch (error) {
      logger.error("project_filter_invalid", {
        filter: config.projectFilter,
        message: error instanceof Error ? error.message : String(error),
      });
      return { ok: false, error: "Invalid project filter" };
    }
    if (!filter.test(projectName)) {
      logger.warn("project_filter_denied", { project: projectName });
      return { ok: false, error: `Project name '${projectName}' is not allowed by filter` };
    }
  }

  const projectDir = path.resolve(baseDir, projectName);
  if (!isInside(baseDir, projectDir)) {
    logger.warn("project_traversal_denied", { project: projectName });
    return { ok: false, error: "Project directory is outside base directory, access denied" };
  }
  if (!(await pathExists(projectDir))) {
    logger.warn("project_not_found", { project: projectName });
    return { ok: false, error: `Project directory does not exist: ${projectName}` };
  }
  return { ok: true, baseDir, projectDir };
}

/** Resolves `pathInProject` below `projectDir`, or `null` on traversal. */
export function resolveInProject(projectDir: string, pathInProject: string): string | null {
  const target = path.resolve(projectDir, pathInProject);
  return isInside(projectDir, target) ? target : null;
}

/** Project-relative path with forward slashes. */
export function toProjectPath(projectDir: string, target: string): string {
  return path.relative(projectDir, target).split(path.sep).join("/");
}
