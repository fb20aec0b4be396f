import { stat } from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";
import { z } from "zod";

import type { StructuredLogger } from "../../logger.js";
import { defineDirectTool } from "../directTool.js";
import type { DirectToolImplementation } from "../types.js";
import {
  failedResult,
  isInside,
  type ProjectAccessConfig,
  resolveInProject,
  resolveProject,
  statusResult,
  toProjectPath,
} from "./projectAccess.js";

export const FIND_FILES_TOOL_NAME = "find_files_by_glob";

const PARENT_SEGMENT = /(^|[\\/])\.\.([\\/]|$)/;

/** Patterns must stay below the project directory. */
function escapesProject(pattern: string): boolean {
  return path.isAbsolute(pattern) || path.win32.isAbsolute(pattern) || PARENT_SEGMENT.test(pattern);
}

const FindFilesInputSchema = z.object({
  projectName: z.string().min(1),
  globPattern: z.string().min(1).default("**/*.*"),
  fileCountLimit: z.number().int().optional(),
  subDirectoryRelativePath: z.string().optional(),
});

/**
 * Lists project files matching a glob. Paths in the answer are relative to the
 * project directory, sorted, and capped to `fileCountLimit`.
 */
export function createFindFilesByGlobTool(config: ProjectAccessConfig, logger: StructuredLogger): DirectToolImplementation {
  return defineDirectTool(
    Object.freeze({
      name: FIND_FILES_TOOL_NAME,
      title: "Find Files by Glob",
      description: "Finds files in the specified project matching the given glob pattern if access conditions are met.",
      inputSchema: Object.freeze({
        type: "object" as const,
        properties: Object.freeze({
          projectName: { type: "string", description: "Name of the project" },
          globPattern: {
            type: "string",
            description: "Glob pattern for matching files relative to the project directory, e.g. **/*.ts",
          },
          fileCountLimit: { type: "integer", description: "Optional maximum number of files to return" },
          subDirectoryRelativePath: {
            type: "string",
            description: "Optional subdirectory path relative to the project root where the search should be limited to, e.g. src/",
          },
        }),
        required: Object.freeze(["projectName", "globPattern"]),
      }),
    }),
    FindFilesInputSchema,
    async (input) => {
      const project = await resolveProject(config, input.projectName, logger);
      if (!project.ok) {
        return failedResult(project.error);
      }

      if (escapesProject(input.globPattern)) {
        logger.warn("project_path_traversal_denied", { pattern: input.globPattern });
        return failedResult("Glob pattern must be relative to the project directory, access denied");
      }

      let searchRoot = project.projectDir;
      const subDirectory = input.subDirectoryRelativePath?.trim();
      if (subDirectory) {
        const resolved = resolveInProject(project.projectDir, subDirectory);
        if (!resolved) {
          logger.warn("project_path_traversal_denied", { path: subDirectory });
          return failedResult("Subdirectory path resolves outside project directory, access denied");
        }
        let isDirectory: boolean;
        try {
          isDirectory = (await stat(resolved)).isDirectory();
        } catch {
          return failedResult(`Subdirectory does not exist: ${subDirectory}`);
        }
        if (!isDirectory) {
          return failedResult(`Subdirectory path is not a directory: ${subDirectory}`);
        }
        searchRoot = resolved;
      }

      const limit = input.fileCountLimit ?? Number.POSITIVE_INFINITY;
      if (limit <= 0) {
        return statusResult({
          status: "success",
          files: [],
          fileCount: 0,
          message: "No files returned due to zero or negative limit",
        });
      }

      let entries: fg.Entry[];
      try {
        entries = await fg(input.globPattern, { cwd: project.projectDir, absolute: true, dot: false, stats: true });
      } catch (error) {
        logger.error("project_glob_failed", {
          pattern: input.globPattern,
          message: error instanceof Error ? error.message : String(error),
        });
        return failedResult(`Failed to process glob pattern '${input.globPattern}' for '${input.projectName}'`);
      }

      // Matching is relative to the project; the subdirectory only narrows the results.
      const files = entries
        .filter((entry) => isInside(project.projectDir, entry.path) && isInside(searchRoot, entry.path))
        .map((entry) => ({ path: toProjectPath(project.projectDir, entry.path), size: entry.stats?.size ?? -1 }))
        .sort((left, right) => left.path.localeCompare(right.path))
        .slice(0, limit);
      return statusResult({
        status: "success",
        files,
        fileCount: files.length,
        message: `Found ${files.length} file(s) matching pattern`,
      });
    },
  );
}
