import { readFile, stat } from "node:fs/promises";

import { z } from "zod";

import type { StructuredLogger } from "../../logger.js";
import { defineDirectTool } from "../directTool.js";
import type { DirectToolImplementation } from "../types.js";
import {
  failedResult,
  type ProjectAccessConfig,
  resolveInProject,
  resolveProject,
  statusResult,
  toProjectPath,
} from "./projectAccess.js";

export const READ_TEXT_FILE_TOOL_NAME = "get_file_text_by_path";

const ReadTextFileInputSchema = z.object({
  projectName: z.string().min(1),
  pathInProject: z.string().min(1),
  maxLinesCount: z.number().int().nonnegative().optional(),
});

/** Reads the text of a project file, optionally capped to its first lines. */
export function createReadTextFileTool(config: ProjectAccessConfig, logger: StructuredLogger): DirectToolImplementation {
  return defineDirectTool(
    Object.freeze({
      name: READ_TEXT_FILE_TOOL_NAME,
      title: "Read File Text by Path",
      description: "Reads text content from a file in the specified project if access conditions are met.",
      inputSchema: Object.freeze({
        type: "object" as const,
        properties: Object.freeze({
          projectName: { type: "string", description: "Name of the project" },
          pathInProject: { type: "string", description: "Path of the file relative to the project directory" },
          maxLinesCount: { type: "integer", description: "Optional maximum number of lines to read from the file" },
        }),
        required: Object.freeze(["projectName", "pathInProject"]),
      }),
    }),
    ReadTextFileInputSchema,
    async (input) => {
      const project = await resolveProject(config, input.projectName, logger);
      if (!project.ok) {
        return failedResult(project.error);
      }
      const target = resolveInProject(project.projectDir, input.pathInProject);
      if (!target) {
        logger.warn("project_path_traversal_denied", { path: input.pathInProject });
        return failedResult(`Path traversal detected in pathInProject: ${input.pathInProject}`);
      }

      let isDirectory: boolean;
      try {
        isDirectory = (await stat(target)).isDirectory();
      } catch {
        return failedResult(`File does not exist: ${toProjectPath(project.projectDir, target)}`);
      }
      if (isDirectory) {
        return failedResult(`Path refers to a directory, not a file: ${toProjectPath(project.projectDir, target)}`);
      }

      let content: string;
      try {
        content = await readFile(target, "utf8");
      } catch (error) {
        logger.error("project_file_read_failed", {
          path: target,
          message: error instanceof Error ? error.message : String(error),
        });
        return failedResult(`Failed to read file: ${error instanceof Error ? error.message : String(error)}`);
      }

      const lines = content.split(/\r?\n/);
      if (lines.length > 0 && lines[lines.length - 1] === "") {
        lines.pop();
      }
      const selected = input.maxLinesCount === undefined ? lines : lines.slice(0, input.maxLinesCount);
      logger.debug("project_file_read", { path: target, lines: selected.length });
      return statusResult({
        status: "success",
        text: selected.join("\n"),
        linesRead: selected.length,
        message: `Successfully read from file: ${toProjectPath(project.projectDir, target)}`,
      });
    },
  );
}
